import compression from 'compression'
import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from 'express'
import helmet from 'helmet'
import type { Pool } from 'pg'
import type { Logger } from 'pino'
import type { AdminService } from '../admin/admin-service.js'
import type { SchedulerState } from '../scheduler/types.js'
import { serializeError } from '../shared/errors.js'
import { createAdminRouter } from './routes/admin.js'
import { createHealthRouter } from './routes/health.js'

export interface ServerDependencies {
  admin: AdminService
  pool: Pick<Pool, 'query'>
  getSchedulerState: () => SchedulerState
  logger: Logger
}

export const createServer = (deps: ServerDependencies): Express => {
  const app = express()

  // Security middleware
  app.use(helmet())

  // Compression middleware
  app.use(compression())

  // JSON parsing middleware
  app.use(express.json())

  app.use(
    '/health',
    createHealthRouter({
      pool: deps.pool,
      getSchedulerState: deps.getSchedulerState,
      logger: deps.logger,
    })
  )
  app.use('/api', createAdminRouter(deps.admin))

  // Express recognises error handlers by arity
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    deps.logger.error(
      { event: 'api_request_failed', path: req.path, error: serializeError(err) },
      'Admin request failed'
    )
    res.status(500).json({ error: 'Internal server error' })
  })

  return app
}
