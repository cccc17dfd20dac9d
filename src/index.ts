import type { Server } from 'node:http'
import { AdminService } from './admin/admin-service.js'
import { createServer } from './api/server.js'
import { HttpActionExecutor } from './clients/action-executor.js'
import { HttpEventFeed } from './clients/event-feed.js'
import { createHttpClient } from './clients/http.js'
import { createPool } from './database/pool.js'
import { createActionHandler } from './events/action-handler.js'
import { EventScheduler } from './events/event-scheduler.js'
import { PgEventStore } from './events/pg-event-store.js'
import { MaintenanceCoordinator } from './maintenance/coordinator.js'
import { PgMaintenanceRunStore } from './maintenance/pg-run-store.js'
import { SafeWindowPlanner } from './maintenance/safe-window.js'
import { FirePool, TriggerScheduler } from './scheduler/index.js'
import { buildConfig } from './shared/config.js'
import { loadEnv } from './shared/env.js'
import { createLogger } from './shared/logger.js'
import { PgScheduleStore } from './triggers/pg-schedule-store.js'
import { TriggerRegistry } from './triggers/registry.js'

const env = loadEnv()
const config = buildConfig(env)
const logger = createLogger(env)
const database = createPool(env, logger)

const eventStore = new PgEventStore(database.pool, logger)
const runStore = new PgMaintenanceRunStore(database.pool)
const registry = new TriggerRegistry({
  store: new PgScheduleStore(database.pool),
  logger,
})

const httpClient = createHttpClient({ timeoutMs: config.http.timeoutMs })
const feed = new HttpEventFeed(httpClient, logger, {
  url: config.http.eventFeedUrl,
  venueTimeZone: config.venueTimeZone,
})
const executor = new HttpActionExecutor(httpClient, eventStore, logger, {
  url: config.http.actionEndpointUrl,
})

const eventScheduler = new EventScheduler({ store: eventStore, registry, logger }, config.events)
const planner = new SafeWindowPlanner({ store: eventStore, logger }, config.safeWindow)
const coordinator = new MaintenanceCoordinator(
  { registry, planner, eventScheduler, eventStore, feed, runStore, logger },
  config.maintenance
)

const firePool = new FirePool(logger, { concurrency: config.maxConcurrentFires })
const scheduler = new TriggerScheduler(
  {
    registry,
    pool: firePool,
    handlers: {
      ...coordinator.handlers(),
      // eslint-disable-next-line @typescript-eslint/naming-convention
      per_event_action: createActionHandler(executor, logger),
    },
    logger,
  },
  config.scheduler
)

const admin = new AdminService(
  { coordinator, eventScheduler, executor, registry, eventStore, runStore, logger },
  config.venueTimeZone
)

const app = createServer({
  admin,
  pool: database.pool,
  getSchedulerState: () => scheduler.getState(),
  logger,
})

try {
  await coordinator.installPeriodicChecks()
} catch (err) {
  logger.fatal({ err }, 'Failed to install periodic refresh checks')
  await database.close('startup_failure')
  process.exit(1)
}

scheduler.start()

const server: Server = app.listen(config.port, '0.0.0.0', () => {
  logger.info({ port: config.port }, `Server listening on port ${String(config.port)}`)
  logger.info('Health endpoint available at /health')
})

// Graceful shutdown
let isShuttingDown = false

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  if (isShuttingDown) {
    logger.warn({ signal }, 'Shutdown already in progress')
    return
  }
  isShuttingDown = true

  logger.info({ signal }, 'Shutting down gracefully')

  try {
    await new Promise<void>((resolve, reject) => {
      server.close((err?: Error | null) => {
        if (err != null) {
          reject(err)
          return
        }
        logger.info('Express server closed')
        resolve()
      })
    })
  } catch (err) {
    logger.error({ err }, 'Error closing Express server')
  }

  await scheduler.stop()
  await database.close(signal)

  process.exit(0)
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM')
})

process.on('SIGINT', () => {
  void shutdown('SIGINT')
})
