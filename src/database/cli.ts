import { loadEnv } from '../shared/env.js'
import { createLogger } from '../shared/logger.js'
import { executeMigrations } from './run-migrations.js'

// CLI wrapper for migration execution
// Handles process.exit for command-line usage
const main = async (): Promise<void> => {
  const env = loadEnv()
  const logger = createLogger(env)

  try {
    await executeMigrations(env, logger)
    process.exit(0)
  } catch (error) {
    logger.error({ err: error }, 'Migration failed')
    process.exit(1)
  }
}

await main()
