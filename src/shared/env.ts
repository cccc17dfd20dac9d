import { config } from 'dotenv'
import * as cron from 'node-cron'
import { z } from 'zod'

const isKnownTimeZone = (value: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value })
    return true
  } catch {
    return false
  }
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1')

// Zod schema for environment variable validation
/* eslint-disable @typescript-eslint/naming-convention */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']),
  DB_HOST: z.string().min(1),
  DB_PORT: z.coerce.number().int().positive(),
  DB_USER: z.string().min(1),
  DB_PASSWORD: z.string().min(1),
  DB_NAME: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  PORT: z.coerce.number().int().positive().default(7000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  VENUE_TIMEZONE: z
    .string()
    .min(1)
    .default('Europe/Paris')
    .refine(isKnownTimeZone, { message: 'Unknown IANA timezone' }),
  EVENT_FEED_URL: z.string().url(),
  ACTION_ENDPOINT_URL: z.string().url(),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  ACTION_LEAD_SECONDS: z.coerce.number().int().nonnegative().default(180),
  ACTION_MISFIRE_GRACE_SECONDS: z.coerce.number().int().positive().default(60),
  REFRESH_ENABLED: booleanFlag,
  REFRESH_HORIZON_HOURS: z.coerce.number().int().positive().default(24),
  REFRESH_SAFETY_BUFFER_SECONDS: z.coerce.number().int().nonnegative().default(180),
  REFRESH_ACTION_DURATION_SECONDS: z.coerce.number().int().nonnegative().default(600),
  REFRESH_IMMEDIATE_DELAY_SECONDS: z.coerce.number().int().nonnegative().default(5),
  REFRESH_MISFIRE_GRACE_SECONDS: z.coerce.number().int().positive().default(300),
  REFRESH_FALLBACK_HOUR_UTC: z.coerce.number().int().min(0).max(23).default(1),
  PERIODIC_CHECK_CRON: z
    .string()
    .default('0 * * * *')
    .refine((value) => cron.validate(value), { message: 'Invalid cron expression' }),
  STARTUP_CHECK_DELAY_SECONDS: z.coerce.number().int().nonnegative().default(30),
  SCHEDULER_TICK_MS: z.coerce.number().int().positive().default(1000),
  MAX_CONCURRENT_FIRES: z.coerce.number().int().positive().default(4),
})
/* eslint-enable @typescript-eslint/naming-convention */

// Infer TypeScript type from schema
export type Env = z.infer<typeof envSchema>

export class EnvValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Environment validation failed: ${issues.join('; ')}`)
    this.name = 'EnvValidationError'
  }
}

/**
 * Validate a raw environment map. Pure: does not touch `process.env` and does
 * not exit, so it can be exercised directly from tests.
 */
export const parseEnv = (source: NodeJS.ProcessEnv): Env => {
  const result = envSchema.safeParse(source)

  if (!result.success) {
    throw new EnvValidationError(
      result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`)
    )
  }

  return result.data
}

/**
 * Load `.env`, validate `process.env` and exit the process on failure.
 * Called once by the composition root.
 */
export const loadEnv = (): Env => {
  config()

  try {
    return parseEnv(process.env)
  } catch (error) {
    // Logger is configured from the validated env, so it cannot be used here
    if (error instanceof EnvValidationError) {
      console.error('Environment validation failed:')
      error.issues.forEach((issue) => {
        console.error(`  - ${issue}`)
      })
      process.exit(1)
    }
    throw error
  }
}

// Build DATABASE_URL from validated components (pure function)
export const buildDatabaseUrl = (envConfig: Env, database?: string): string => {
  const dbName = database ?? envConfig.DB_NAME
  return `postgresql://${envConfig.DB_USER}:${envConfig.DB_PASSWORD}@${envConfig.DB_HOST}:${String(envConfig.DB_PORT)}/${dbName}`
}
