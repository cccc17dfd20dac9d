import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { Pool } from 'pg'
import type { Logger } from 'pino'

interface MigrationResult {
  file: string
  success: boolean
  error?: string
}

// src/database and dist/database both sit two levels below the repo root
export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(
  new URL('../../database/migrations', import.meta.url)
)

export const runMigrations = async (
  pool: Pool,
  logger: Logger,
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR
): Promise<MigrationResult[]> => {
  const files = await readdir(migrationsDir)
  const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort()

  const results: MigrationResult[] = []

  for (const file of sqlFiles) {
    try {
      const sql = await readFile(join(migrationsDir, file), 'utf-8')
      await pool.query(sql)
      results.push({ file, success: true })
      logger.info({ event: 'migration_applied', file }, 'Migration executed')
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error'
      results.push({ file, success: false, error: errorMessage })
      logger.error(
        { event: 'migration_failed', file, error: errorMessage },
        'Migration failed'
      )
      throw error // Stop on first failure
    }
  }

  return results
}
