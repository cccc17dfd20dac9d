import { Router, type Request, type Response } from 'express'
import type { Pool } from 'pg'
import type { Logger } from 'pino'
import { checkDatabase } from '../../health/database.js'
import type { SchedulerState } from '../../scheduler/types.js'

export interface HealthRouterDependencies {
  pool: Pick<Pool, 'query'>
  getSchedulerState: () => SchedulerState
  logger: Logger
}

export const createHealthRouter = (deps: HealthRouterDependencies): Router => {
  const router = Router()

  router.get('/', async (_req: Request, res: Response): Promise<void> => {
    const dbHealth = await checkDatabase(deps.pool)
    const scheduler = deps.getSchedulerState()

    if (!dbHealth.healthy) {
      const errorMessage = dbHealth.message ?? 'Unknown error'
      deps.logger.error(
        { err: new Error(errorMessage) },
        'Health check failed: database unhealthy'
      )

      res.status(503).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: dbHealth.message ?? 'Database connection failed',
        scheduler,
      })
      return
    }

    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      database: 'connected',
      scheduler,
    })
  })

  return router
}
