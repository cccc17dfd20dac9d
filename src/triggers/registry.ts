import { randomUUID } from 'node:crypto'
import pLimit, { type LimitFunction } from 'p-limit'
import type { Logger } from 'pino'
import { PersistenceError } from '../shared/errors.js'
import type {
  NewTrigger,
  RegistrationResult,
  ScheduleStore,
  Trigger,
  TriggerPurpose,
} from './types.js'

export interface TriggerRegistryDependencies {
  store: ScheduleStore
  logger: Logger
  now?: () => Date
  newInstanceId?: () => string
}

/**
 * Single-writer front for the schedule store.
 *
 * Every mutation runs through one p-limit(1) queue, so check-and-insert under
 * a deterministic id is a single critical section even when the periodic
 * check, a manual refresh and post-refresh rescheduling race each other.
 */
export class TriggerRegistry {
  private readonly store: ScheduleStore
  private readonly logger: Logger
  private readonly now: () => Date
  private readonly newInstanceId: () => string
  private readonly exclusive: LimitFunction = pLimit(1)

  constructor(deps: TriggerRegistryDependencies) {
    this.store = deps.store
    this.logger = deps.logger
    this.now = deps.now ?? (() => new Date())
    this.newInstanceId = deps.newInstanceId ?? randomUUID
  }

  async registerIfAbsent(input: NewTrigger): Promise<RegistrationResult> {
    return this.exclusive(async (): Promise<RegistrationResult> => {
      const existing = await this.store.get(input.id)
      if (existing !== null) {
        return { status: 'exists', trigger: existing }
      }

      const trigger: Trigger = {
        ...input,
        cronExpression: input.cronExpression ?? null,
        instanceId: this.newInstanceId(),
        createdAt: this.now(),
      }

      const inserted = await this.store.insert(trigger)
      if (!inserted) {
        // Another process won the race on the primary key
        const winner = await this.store.get(input.id)
        if (winner === null) {
          throw new PersistenceError(
            `Trigger ${input.id} conflicted on insert but could not be read back`
          )
        }
        return { status: 'exists', trigger: winner }
      }

      this.logger.debug(
        {
          event: 'trigger_registered',
          triggerId: trigger.id,
          instanceId: trigger.instanceId,
          purpose: trigger.purpose,
          fireAt: trigger.fireAt.toISOString(),
        },
        'Trigger registered'
      )

      return { status: 'created', trigger }
    })
  }

  /** Cancel a not-yet-fired trigger. Fired triggers are gone from the store. */
  async cancel(id: string): Promise<boolean> {
    return this.exclusive(async () => this.store.remove(id))
  }

  async cancelByPurpose(purposes: readonly TriggerPurpose[]): Promise<Trigger[]> {
    return this.exclusive(async () => this.store.removeByPurpose(purposes))
  }

  /**
   * Cancel triggers of the given purposes whose fire time has already passed
   * without the scheduler claiming them.
   */
  async cancelStale(purposes: readonly TriggerPurpose[], now: Date): Promise<Trigger[]> {
    return this.exclusive(async () => {
      const stale = (await this.store.list()).filter(
        (trigger) =>
          purposes.includes(trigger.purpose) &&
          trigger.fireAt.getTime() < now.getTime()
      )

      for (const trigger of stale) {
        await this.store.remove(trigger.id)
      }

      return stale
    })
  }

  async get(id: string): Promise<Trigger | null> {
    return this.store.get(id)
  }

  async list(): Promise<Trigger[]> {
    return this.store.list()
  }

  /** Atomically move every due trigger from Scheduled to Fired. */
  async claimDue(now: Date): Promise<Trigger[]> {
    return this.exclusive(async () => this.store.takeDue(now))
  }
}
