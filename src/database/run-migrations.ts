import { Pool } from 'pg'
import format from 'pg-format'
import type { Logger } from 'pino'
import { buildDatabaseUrl, type Env } from '../shared/env.js'
import { runMigrations } from './migrate.js'

const createDatabaseIfNotExists = async (
  envConfig: Env,
  logger: Logger
): Promise<void> => {
  const dbName = envConfig.DB_NAME

  // Connect to postgres database to check if target database exists
  const adminPool = new Pool({
    connectionString: buildDatabaseUrl(envConfig, 'postgres'),
  })

  adminPool.on('error', (err) => {
    logger.error({ err }, 'Unexpected admin pool error')
  })

  try {
    const result = await adminPool.query<{ exists: boolean }>(
      'SELECT EXISTS(SELECT 1 FROM pg_database WHERE datname = $1) as exists',
      [dbName]
    )

    if (result.rows[0]?.exists === false) {
      logger.info({ database: dbName }, 'Creating database')
      // pg-format escapes the identifier; CREATE DATABASE takes no parameters
      await adminPool.query(format('CREATE DATABASE %I', dbName))
    } else {
      logger.info({ database: dbName }, 'Database already exists')
    }
  } finally {
    await adminPool.end()
  }
}

export const executeMigrations = async (
  envConfig: Env,
  logger: Logger
): Promise<void> => {
  await createDatabaseIfNotExists(envConfig, logger)

  const pool = new Pool({
    connectionString: buildDatabaseUrl(envConfig),
  })

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database pool error')
  })

  try {
    logger.info('Starting database migrations')
    const results = await runMigrations(pool, logger)
    const successCount = results.filter((r) => r.success).length
    logger.info(
      `Completed ${String(successCount)}/${String(results.length)} migrations successfully`
    )
  } finally {
    await pool.end()
  }
}
