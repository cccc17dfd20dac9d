import * as pino from 'pino'
import type { Env } from './env.js'

export type { Logger } from 'pino'

export const createLogger = (
  envConfig: Pick<Env, 'LOG_LEVEL' | 'NODE_ENV'>
): pino.Logger =>
  pino.pino({
    level: envConfig.LOG_LEVEL,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      env: envConfig.NODE_ENV,
    },
  })
