import type { Logger } from 'pino'
import type { ActionExecutor } from '../clients/action-executor.js'
import type { EventScheduler } from '../events/event-scheduler.js'
import type { Event, EventDetail, EventStore } from '../events/types.js'
import type { MaintenanceCoordinator } from '../maintenance/coordinator.js'
import type { MaintenanceRun, MaintenanceRunStore } from '../maintenance/types.js'
import { TimezoneResolutionError, serializeError } from '../shared/errors.js'
import { resolveToUtc, toVenueLocal } from '../shared/timezone.js'
import type { TriggerRegistry } from '../triggers/registry.js'
import type { TriggerPurpose } from '../triggers/types.js'

export interface TriggerListing {
  id: string
  purpose: TriggerPurpose
  /** Only set for per-event actions. */
  eventId: number | null
  nextFireTime: string
}

export interface EventListing {
  id: number
  externalId: string
  name: string
  groupName: string
  startTime: string
  startTimeUtc: string | null
  startTimeVenue: string | null
  surface: string | null
  distanceMeters: number | null
}

export type EventDetailLookup =
  | { status: 'event_not_found' }
  | { status: 'detail_pending'; event: Event }
  | { status: 'found'; event: Event; detail: EventDetail }

export interface AdminServiceDependencies {
  coordinator: MaintenanceCoordinator
  eventScheduler: EventScheduler
  executor: ActionExecutor
  registry: TriggerRegistry
  eventStore: EventStore
  runStore: MaintenanceRunStore
  logger: Logger
}

/**
 * Operations behind the admin routes. The two mutating ones return as soon as
 * the work is started; outcomes show up in the logs, the trigger list and the
 * run log.
 */
export class AdminService {
  constructor(
    private readonly deps: AdminServiceDependencies,
    private readonly venueTimeZone: string
  ) {}

  triggerRefreshNow(): void {
    this.deps.logger.info({ event: 'admin_refresh_requested' }, 'Manual refresh requested')

    void this.deps.coordinator.requestRefresh().catch((error: unknown) => {
      this.deps.logger.error(
        { event: 'admin_refresh_failed', error: serializeError(error) },
        'Manual refresh request failed'
      )
    })
  }

  requestReschedule(): void {
    this.deps.logger.info({ event: 'admin_reschedule_requested' }, 'Manual reschedule requested')

    void this.deps.eventScheduler.rescheduleAll().catch((error: unknown) => {
      this.deps.logger.error(
        { event: 'admin_reschedule_failed', error: serializeError(error) },
        'Manual reschedule failed'
      )
    })
  }

  /**
   * Run the action for one event now, outside its trigger. Returns false
   * when the event does not exist; otherwise the action is started and not
   * awaited.
   */
  async triggerEventAction(eventId: number): Promise<boolean> {
    const event = await this.deps.eventStore.getById(eventId)
    if (event === null) {
      return false
    }

    this.deps.logger.info(
      { event: 'admin_action_requested', eventId },
      'Manual event action requested'
    )

    void this.deps.executor.execute(eventId).catch((error: unknown) => {
      this.deps.logger.error(
        { event: 'admin_action_failed', eventId, error: serializeError(error) },
        'Manual event action failed'
      )
    })

    return true
  }

  async getEventDetail(eventId: number): Promise<EventDetailLookup> {
    const event = await this.deps.eventStore.getById(eventId)
    if (event === null) {
      return { status: 'event_not_found' }
    }

    const detail = await this.deps.eventStore.getDetail(eventId)
    return detail === null
      ? { status: 'detail_pending', event }
      : { status: 'found', event, detail }
  }

  async listTriggers(): Promise<TriggerListing[]> {
    const triggers = await this.deps.registry.list()
    return triggers.map((trigger) => ({
      id: trigger.id,
      purpose: trigger.purpose,
      eventId: trigger.purpose === 'per_event_action' ? trigger.payload : null,
      nextFireTime: trigger.fireAt.toISOString(),
    }))
  }

  async listRuns(limit: number): Promise<MaintenanceRun[]> {
    return this.deps.runStore.listRecent(limit)
  }

  async listEvents(): Promise<EventListing[]> {
    const events = await this.deps.eventStore.listAll()

    return events.map((event) => {
      let startTimeUtc: Date | null = null
      try {
        startTimeUtc = resolveToUtc(event.startTime, this.venueTimeZone)
      } catch (error) {
        if (!(error instanceof TimezoneResolutionError)) {
          throw error
        }
        // Listed with its raw start time only
      }

      return {
        id: event.id,
        externalId: event.externalId,
        name: event.name,
        groupName: event.groupName,
        startTime: event.startTime,
        startTimeUtc: startTimeUtc?.toISOString() ?? null,
        startTimeVenue:
          startTimeUtc === null ? null : toVenueLocal(startTimeUtc, this.venueTimeZone),
        surface: event.surface,
        distanceMeters: event.distanceMeters,
      }
    })
  }
}
