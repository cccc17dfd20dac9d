import type { EventSchedulerOptions } from '../events/event-scheduler.js'
import type { MaintenanceCoordinatorOptions } from '../maintenance/coordinator.js'
import type { SafeWindowOptions } from '../maintenance/safe-window.js'
import type { SchedulerOptions } from '../scheduler/types.js'
import type { Env } from './env.js'

const SECOND_MS = 1000

export interface AppConfig {
  port: number
  venueTimeZone: string
  http: {
    timeoutMs: number
    eventFeedUrl: string
    actionEndpointUrl: string
  }
  events: EventSchedulerOptions
  safeWindow: SafeWindowOptions & { venueTimeZone: string }
  maintenance: MaintenanceCoordinatorOptions
  scheduler: SchedulerOptions
  maxConcurrentFires: number
}

/**
 * Map the validated environment onto explicit per-component options.
 */
export const buildConfig = (env: Env): AppConfig => ({
  port: env.PORT,
  venueTimeZone: env.VENUE_TIMEZONE,
  http: {
    timeoutMs: env.HTTP_TIMEOUT_MS,
    eventFeedUrl: env.EVENT_FEED_URL,
    actionEndpointUrl: env.ACTION_ENDPOINT_URL,
  },
  events: {
    venueTimeZone: env.VENUE_TIMEZONE,
    leadTimeMs: env.ACTION_LEAD_SECONDS * SECOND_MS,
    misfireGraceSeconds: env.ACTION_MISFIRE_GRACE_SECONDS,
  },
  safeWindow: {
    venueTimeZone: env.VENUE_TIMEZONE,
    horizonMs: env.REFRESH_HORIZON_HOURS * 3600 * SECOND_MS,
    safetyBufferMs: env.REFRESH_SAFETY_BUFFER_SECONDS * SECOND_MS,
    actionDurationMs: env.REFRESH_ACTION_DURATION_SECONDS * SECOND_MS,
    fallbackHourUtc: env.REFRESH_FALLBACK_HOUR_UTC,
  },
  maintenance: {
    refreshEnabled: env.REFRESH_ENABLED,
    immediateDelayMs: env.REFRESH_IMMEDIATE_DELAY_SECONDS * SECOND_MS,
    refreshMisfireGraceSeconds: env.REFRESH_MISFIRE_GRACE_SECONDS,
    actionLeadTimeMs: env.ACTION_LEAD_SECONDS * SECOND_MS,
    actionMisfireGraceSeconds: env.ACTION_MISFIRE_GRACE_SECONDS,
    periodicCheckCron: env.PERIODIC_CHECK_CRON,
    startupCheckDelayMs: env.STARTUP_CHECK_DELAY_SECONDS * SECOND_MS,
  },
  scheduler: {
    tickIntervalMs: env.SCHEDULER_TICK_MS,
  },
  maxConcurrentFires: env.MAX_CONCURRENT_FIRES,
})
