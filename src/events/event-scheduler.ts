import type { Logger } from 'pino'
import {
  PersistenceError,
  TimezoneResolutionError,
  serializeError,
} from '../shared/errors.js'
import { resolveToUtc } from '../shared/timezone.js'
import type { TriggerRegistry } from '../triggers/registry.js'
import { actionTriggerId } from '../triggers/trigger-id.js'
import { EventRecordSchema, type Event, type EventRecord, type EventStore } from './types.js'

export interface EventSchedulerDependencies {
  store: EventStore
  registry: TriggerRegistry
  logger: Logger
  now?: () => Date
}

export interface EventSchedulerOptions {
  venueTimeZone: string
  /** Default lead time for `rescheduleAll`. */
  leadTimeMs: number
  /** Default misfire grace for `rescheduleAll`. */
  misfireGraceSeconds: number
}

export interface ScheduleSummary {
  scheduled: number
  alreadyScheduled: number
  stale: number
  unresolvable: number
  failed: number
}

export interface UpsertSummary {
  events: Event[]
  rejected: number
}

const emptySummary = (): ScheduleSummary => ({
  scheduled: 0,
  alreadyScheduled: 0,
  stale: 0,
  unresolvable: 0,
  failed: 0,
})

export class EventScheduler {
  private readonly deps: EventSchedulerDependencies
  private readonly options: EventSchedulerOptions
  private readonly now: () => Date

  constructor(deps: EventSchedulerDependencies, options: EventSchedulerOptions) {
    this.deps = deps
    this.options = options
    this.now = deps.now ?? (() => new Date())
  }

  /**
   * Insert new events and update existing ones matched by `externalId`.
   * Events missing from `records` are left alone. Invalid records are logged
   * and dropped.
   */
  async upsertEvents(records: readonly unknown[]): Promise<UpsertSummary> {
    const valid: EventRecord[] = []
    let rejected = 0

    for (const [index, raw] of records.entries()) {
      const parsed = EventRecordSchema.safeParse(raw)
      if (parsed.success) {
        valid.push(parsed.data)
        continue
      }

      rejected += 1
      this.deps.logger.warn(
        {
          event: 'event_record_rejected',
          index,
          issues: parsed.error.issues.map(
            (issue) => `${issue.path.join('.')}: ${issue.message}`
          ),
        },
        'Skipping invalid event record'
      )
    }

    const events = await this.deps.store.upsertMany(valid, this.now())

    this.deps.logger.info(
      {
        event: 'events_upserted',
        received: records.length,
        persisted: events.length,
        rejected,
      },
      'Events upserted'
    )

    return { events, rejected }
  }

  /**
   * Register one per-event action trigger `leadTimeMs` before each event's
   * start. Already-registered and already-past triggers are skipped.
   *
   * @throws PersistenceError when the trigger registry itself fails
   */
  async scheduleActionsFor(
    events: readonly Event[],
    leadTimeMs: number,
    misfireGraceSeconds: number
  ): Promise<ScheduleSummary> {
    const summary = emptySummary()
    const now = this.now()

    for (const event of events) {
      let fireAt: Date
      try {
        fireAt = new Date(
          resolveToUtc(event.startTime, this.options.venueTimeZone).getTime() - leadTimeMs
        )
      } catch (error) {
        if (!(error instanceof TimezoneResolutionError)) {
          summary.failed += 1
          this.deps.logger.error(
            { event: 'event_schedule_failed', eventId: event.id, error: serializeError(error) },
            'Failed to resolve event start time'
          )
          continue
        }
        summary.unresolvable += 1
        this.deps.logger.warn(
          {
            event: 'event_schedule_unresolvable',
            eventId: event.id,
            startTime: event.startTime,
            timeZone: this.options.venueTimeZone,
            reason: error.message,
          },
          'Skipping event with unresolvable start time'
        )
        continue
      }

      if (fireAt.getTime() <= now.getTime()) {
        summary.stale += 1
        this.deps.logger.info(
          {
            event: 'event_schedule_stale',
            eventId: event.id,
            fireAt: fireAt.toISOString(),
          },
          'Action fire time already passed; not scheduling'
        )
        continue
      }

      try {
        const result = await this.deps.registry.registerIfAbsent({
          id: actionTriggerId(event.id),
          purpose: 'per_event_action',
          fireAt,
          payload: event.id,
          misfireGraceSeconds,
        })

        if (result.status === 'exists') {
          summary.alreadyScheduled += 1
          continue
        }

        summary.scheduled += 1
        this.deps.logger.info(
          {
            event: 'event_action_scheduled',
            eventId: event.id,
            triggerId: result.trigger.id,
            fireAt: fireAt.toISOString(),
            startTime: event.startTime,
            leadTimeMs,
          },
          'Event action scheduled'
        )
      } catch (error) {
        if (error instanceof PersistenceError) {
          throw error
        }
        summary.failed += 1
        this.deps.logger.error(
          {
            event: 'event_schedule_failed',
            eventId: event.id,
            error: serializeError(error),
          },
          'Failed to schedule event action'
        )
      }
    }

    this.deps.logger.info(
      { event: 'event_actions_scheduled', total: events.length, ...summary },
      'Event action scheduling completed'
    )

    return summary
  }

  /** Re-derive action triggers for every persisted event. */
  async rescheduleAll(): Promise<ScheduleSummary> {
    const events = await this.deps.store.listAll()
    return this.scheduleActionsFor(
      events,
      this.options.leadTimeMs,
      this.options.misfireGraceSeconds
    )
  }
}
