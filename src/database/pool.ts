import type { PoolClient, PoolConfig } from 'pg'
import { Pool } from 'pg'
import type { Logger } from 'pino'
import { buildDatabaseUrl, type Env } from '../shared/env.js'

export interface DatabaseHandle {
  pool: Pool
  poolConfig: PoolConfig
  close: (reason?: string) => Promise<void>
}

export const createPool = (
  envConfig: Env,
  logger: Logger
): DatabaseHandle => {
  const poolConfig: PoolConfig = {
    connectionString: buildDatabaseUrl(envConfig),
    max: envConfig.DB_POOL_MAX,
    min: 1,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 2_000,
  }

  const pool = new Pool(poolConfig)

  pool.on('error', (err) => {
    logger.error({ err }, 'PostgreSQL pool error')
  })

  logger.info(
    {
      pool: {
        max: poolConfig.max,
        min: poolConfig.min,
        idleTimeoutMillis: poolConfig.idleTimeoutMillis,
        connectionTimeoutMillis: poolConfig.connectionTimeoutMillis,
      },
    },
    'PostgreSQL pool configured'
  )

  let closePromise: Promise<void> | null = null

  const close = async (reason = 'manual'): Promise<void> => {
    closePromise ??= (async () => {
      try {
        await pool.end()
        logger.info({ reason }, 'PostgreSQL pool closed')
      } catch (err) {
        logger.error({ err, reason }, 'Error closing PostgreSQL pool')
      }
    })()

    await closePromise
  }

  return { pool, poolConfig, close }
}

/**
 * Transaction wrapper that borrows a pooled client, executes work in
 * BEGIN/COMMIT, and ensures ROLLBACK + connection release on error.
 */
export const withTransaction = async <T>(
  pool: Pool,
  work: (client: PoolClient) => Promise<T>
): Promise<T> => {
  const client = await pool.connect()

  try {
    await client.query('BEGIN')
    const result = await work(client)
    await client.query('COMMIT')
    return result
  } catch (error) {
    await client.query('ROLLBACK')
    throw error
  } finally {
    client.release()
  }
}
