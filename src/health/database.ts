import type { Pool } from 'pg'

export interface DatabaseHealth {
  healthy: boolean
  message?: string
}

export const checkDatabase = async (pool: Pick<Pool, 'query'>): Promise<DatabaseHealth> => {
  try {
    const result = await pool.query('SELECT 1')
    return { healthy: result.rowCount === 1 }
  } catch (err) {
    return { healthy: false, message: err instanceof Error ? err.message : String(err) }
  }
}
