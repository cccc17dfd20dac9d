import pLimit, { type LimitFunction } from 'p-limit'
import type { Logger } from 'pino'
import type { EventFeed } from '../clients/event-feed.js'
import type { EventScheduler } from '../events/event-scheduler.js'
import type { EventStore } from '../events/types.js'
import { nextCronOccurrence } from '../scheduler/cron.js'
import type { TriggerHandlers } from '../scheduler/types.js'
import { serializeError } from '../shared/errors.js'
import type { TriggerRegistry } from '../triggers/registry.js'
import { EVENT_SET_TARGET, triggerIdFor } from '../triggers/trigger-id.js'
import { REFRESH_PURPOSES, type TriggerPurpose } from '../triggers/types.js'
import type { SafeInstant, SafeWindowPlanner } from './safe-window.js'
import type {
  MaintenanceRun,
  MaintenanceRunCounts,
  MaintenanceRunStatus,
  MaintenanceRunStore,
} from './types.js'

export const HOURLY_CHECK_ID = triggerIdFor('periodic_check', 'hourly')
export const STARTUP_CHECK_ID = triggerIdFor('periodic_check', 'startup')

export interface MaintenanceCoordinatorDependencies {
  registry: TriggerRegistry
  planner: SafeWindowPlanner
  eventScheduler: EventScheduler
  eventStore: EventStore
  feed: EventFeed
  runStore: MaintenanceRunStore
  logger: Logger
  now?: () => Date
}

export interface MaintenanceCoordinatorOptions {
  refreshEnabled: boolean
  immediateDelayMs: number
  refreshMisfireGraceSeconds: number
  actionLeadTimeMs: number
  actionMisfireGraceSeconds: number
  periodicCheckCron: string
  startupCheckDelayMs: number
}

export type RefreshReason = 'now' | Exclude<SafeInstant, { kind: 'now' }>['reason']

export interface RefreshPlan {
  triggerId: string
  purpose: Extract<TriggerPurpose, 'immediate_refresh' | 'delayed_refresh'>
  fireAt: Date
  reason: RefreshReason
}

const emptyCounts = (): MaintenanceRunCounts => ({
  eventsDeleted: 0,
  eventsFetched: 0,
  eventsUpserted: 0,
  triggersScheduled: 0,
  eventsSkipped: 0,
})

/**
 * Decides when the event set may be wiped and refetched, and does it.
 *
 * `requestRefresh` is serialised on its own queue so cancel, plan and register
 * happen as one step: two concurrent requests leave exactly one live refresh
 * trigger behind. It also waits for a running refresh to finish, so it never
 * plans against the empty event set left between wipe and refetch.
 */
export class MaintenanceCoordinator {
  private readonly deps: MaintenanceCoordinatorDependencies
  private readonly options: MaintenanceCoordinatorOptions
  private readonly now: () => Date
  private readonly exclusive: LimitFunction = pLimit(1)
  private refreshInFlight: Promise<MaintenanceRun> | null = null

  constructor(deps: MaintenanceCoordinatorDependencies, options: MaintenanceCoordinatorOptions) {
    this.deps = deps
    this.options = options
    this.now = deps.now ?? (() => new Date())
  }

  async requestRefresh(): Promise<RefreshPlan> {
    return this.exclusive(async () => {
      const running = this.refreshInFlight
      if (running !== null) {
        this.deps.logger.debug(
          { event: 'refresh_request_waiting' },
          'Waiting for the running refresh before planning'
        )
        // Its outcome is reported by its own caller
        await Promise.allSettled([running])
      }

      const cancelled = await this.deps.registry.cancelByPurpose(REFRESH_PURPOSES)
      if (cancelled.length > 0) {
        this.deps.logger.debug(
          {
            event: 'refresh_superseded',
            triggerIds: cancelled.map((trigger) => trigger.id),
          },
          'Cancelled pending refresh triggers'
        )
      }

      const now = this.now()
      const safe = await this.deps.planner.nextSafeInstant(now)

      const plan: RefreshPlan =
        safe.kind === 'now'
          ? {
              triggerId: triggerIdFor('immediate_refresh', EVENT_SET_TARGET),
              purpose: 'immediate_refresh',
              fireAt: new Date(now.getTime() + this.options.immediateDelayMs),
              reason: 'now',
            }
          : {
              triggerId: triggerIdFor('delayed_refresh', EVENT_SET_TARGET),
              purpose: 'delayed_refresh',
              fireAt: safe.at,
              reason: safe.reason,
            }

      await this.deps.registry.registerIfAbsent({
        id: plan.triggerId,
        purpose: plan.purpose,
        fireAt: plan.fireAt,
        payload: null,
        misfireGraceSeconds: this.options.refreshMisfireGraceSeconds,
      })

      this.deps.logger.info(
        {
          event: 'refresh_scheduled',
          triggerId: plan.triggerId,
          purpose: plan.purpose,
          fireAt: plan.fireAt.toISOString(),
          reason: plan.reason,
        },
        plan.purpose === 'immediate_refresh'
          ? 'Immediate refresh scheduled'
          : 'Refresh deferred to next safe window'
      )

      return plan
    })
  }

  /**
   * Wipe events, their details and pending action triggers, refetch today's
   * events and re-derive their triggers. The outcome is appended to the run
   * log; failures are recorded there and not retried here.
   */
  async performRefresh(): Promise<MaintenanceRun> {
    const refresh = this.runRefresh()
    this.refreshInFlight = refresh

    try {
      return await refresh
    } finally {
      if (this.refreshInFlight === refresh) {
        this.refreshInFlight = null
      }
    }
  }

  private async runRefresh(): Promise<MaintenanceRun> {
    const startedAt = this.now()
    const counts = emptyCounts()

    if (!this.options.refreshEnabled) {
      this.deps.logger.info({ event: 'refresh_disabled' }, 'Refresh disabled; nothing wiped')
      return this.recordRun(startedAt, 'disabled', 'Refresh disabled by configuration', counts)
    }

    this.deps.logger.info({ event: 'refresh_started' }, 'Starting event refresh')

    let status: MaintenanceRunStatus = 'ok'
    let message: string | null = null

    try {
      const cancelled = await this.deps.registry.cancelByPurpose(['per_event_action'])
      const wiped = await this.deps.eventStore.deleteAll()
      counts.eventsDeleted = wiped.events

      this.deps.logger.info(
        {
          event: 'refresh_wiped',
          eventsDeleted: wiped.events,
          detailsDeleted: wiped.details,
          actionTriggersCancelled: cancelled.length,
        },
        'Event set cleared'
      )

      const records = await this.deps.feed.fetchToday()
      counts.eventsFetched = records.length

      const { events, rejected } = await this.deps.eventScheduler.upsertEvents(records)
      counts.eventsUpserted = events.length

      const summary = await this.deps.eventScheduler.scheduleActionsFor(
        events,
        this.options.actionLeadTimeMs,
        this.options.actionMisfireGraceSeconds
      )
      counts.triggersScheduled = summary.scheduled

      const unschedulable = rejected + summary.unresolvable + summary.failed
      counts.eventsSkipped = unschedulable + summary.stale

      if (unschedulable > 0) {
        status = 'partial'
        message = `${String(unschedulable)} event(s) could not be scheduled`
      }
    } catch (error) {
      status = 'error'
      message = error instanceof Error ? error.message : String(error)
      this.deps.logger.error(
        { event: 'refresh_failed', error: serializeError(error) },
        'Event refresh failed'
      )
    }

    return this.recordRun(startedAt, status, message, counts)
  }

  /** Drop refresh triggers whose time passed unclaimed, then plan a new refresh. */
  async periodicCheck(): Promise<RefreshPlan> {
    const stale = await this.deps.registry.cancelStale(REFRESH_PURPOSES, this.now())

    this.deps.logger.info(
      {
        event: 'periodic_check',
        staleCancelled: stale.map((trigger) => trigger.id),
      },
      'Periodic refresh check'
    )

    return this.requestRefresh()
  }

  /**
   * Register the recurring periodic check and the one-shot check shortly after
   * start. The startup check replaces any leftover from a previous process.
   */
  async installPeriodicChecks(): Promise<void> {
    const now = this.now()

    await this.deps.registry.registerIfAbsent({
      id: HOURLY_CHECK_ID,
      purpose: 'periodic_check',
      fireAt: nextCronOccurrence(this.options.periodicCheckCron, now),
      payload: null,
      misfireGraceSeconds: this.options.refreshMisfireGraceSeconds,
      cronExpression: this.options.periodicCheckCron,
    })

    await this.deps.registry.cancel(STARTUP_CHECK_ID)
    await this.deps.registry.registerIfAbsent({
      id: STARTUP_CHECK_ID,
      purpose: 'periodic_check',
      fireAt: new Date(now.getTime() + this.options.startupCheckDelayMs),
      payload: null,
      misfireGraceSeconds: this.options.refreshMisfireGraceSeconds,
    })

    this.deps.logger.info(
      {
        event: 'periodic_checks_installed',
        cron: this.options.periodicCheckCron,
        startupDelayMs: this.options.startupCheckDelayMs,
      },
      'Periodic refresh checks installed'
    )
  }

  /** Callbacks the scheduling loop invokes for maintenance trigger purposes. */
  handlers(): TriggerHandlers {
    const refresh = async (): Promise<void> => {
      await this.performRefresh()
    }

    /* eslint-disable @typescript-eslint/naming-convention */
    return {
      immediate_refresh: refresh,
      delayed_refresh: refresh,
      periodic_check: async () => {
        await this.periodicCheck()
      },
    }
    /* eslint-enable @typescript-eslint/naming-convention */
  }

  private async recordRun(
    startedAt: Date,
    status: MaintenanceRunStatus,
    message: string | null,
    counts: MaintenanceRunCounts
  ): Promise<MaintenanceRun> {
    const run = await this.deps.runStore.append({
      type: 'refresh',
      startedAt,
      finishedAt: this.now(),
      status,
      message,
      ...counts,
    })

    this.deps.logger.info(
      { event: 'refresh_completed', runId: run.id, status, message, ...counts },
      'Refresh run recorded'
    )

    return run
  }
}
