import { serializeError } from '../shared/errors.js'
import type { Trigger } from '../triggers/types.js'
import { nextCronOccurrence } from './cron.js'
import type {
  MissedFire,
  SchedulerDependencies,
  SchedulerOptions,
  SchedulerState,
  TimerControls,
} from './types.js'

const DEFAULT_TICK_INTERVAL_MS = 1_000
const DEFAULT_MISSED_FIRE_HISTORY = 50

const defaultTimers: TimerControls = {
  setInterval: (handler, timeout) => setInterval(handler, timeout),
  clearInterval: (handle) => {
    clearInterval(handle)
  },
}

const defaultNow = (): Date => new Date()

/**
 * The scheduling loop.
 *
 * Each tick claims every due trigger from the registry (claiming deletes it),
 * drops the ones that are later than their misfire grace, and hands the rest
 * to the fire pool without awaiting them. A tick that is still running when
 * the next one is due is skipped.
 */
export class TriggerScheduler {
  private readonly deps: SchedulerDependencies
  private readonly timers: TimerControls
  private readonly now: () => Date
  private readonly tickIntervalMs: number
  private readonly missedFireHistory: number
  private readonly cronTimeZone: string
  private readonly recentMissed: MissedFire[] = []

  private tickHandle?: NodeJS.Timeout
  private running = false
  private inflightTick: Promise<void> | null = null
  private lastTickAt: Date | null = null
  private firedCount = 0
  private missedCount = 0

  constructor(deps: SchedulerDependencies, options: SchedulerOptions = {}) {
    this.deps = deps
    this.timers = deps.timers ?? defaultTimers
    this.now = deps.now ?? defaultNow
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS
    this.missedFireHistory = options.missedFireHistory ?? DEFAULT_MISSED_FIRE_HISTORY
    this.cronTimeZone = options.cronTimeZone ?? 'UTC'
  }

  start(): void {
    if (this.running) {
      return
    }

    this.running = true
    void this.runTick()
    this.tickHandle = this.timers.setInterval(() => {
      void this.runTick()
    }, this.tickIntervalMs)

    this.deps.logger.info(
      { event: 'scheduler_started', tickIntervalMs: this.tickIntervalMs },
      'Trigger scheduler started'
    )
  }

  /** Run a tick now, or wait for the one already in flight. */
  async evaluateNow(): Promise<void> {
    if (this.inflightTick !== null) {
      await this.inflightTick
      return
    }
    await this.runTick()
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return
    }

    this.running = false

    if (this.tickHandle !== undefined) {
      this.timers.clearInterval(this.tickHandle)
      this.tickHandle = undefined
    }

    if (this.inflightTick !== null) {
      await this.inflightTick
    }
    await this.deps.pool.shutdown()

    this.deps.logger.info(
      { event: 'scheduler_stopped', firedCount: this.firedCount, missedCount: this.missedCount },
      'Trigger scheduler stopped'
    )
  }

  getState(): SchedulerState {
    return {
      isRunning: this.running,
      lastTickAt: this.lastTickAt?.toISOString() ?? null,
      firedCount: this.firedCount,
      missedCount: this.missedCount,
      recentMissed: [...this.recentMissed],
      pool: this.deps.pool.getMetrics(),
    }
  }

  private async runTick(): Promise<void> {
    if (!this.running || this.inflightTick !== null) {
      return
    }

    this.inflightTick = this.tick()
    try {
      await this.inflightTick
    } finally {
      this.inflightTick = null
    }
  }

  private async tick(): Promise<void> {
    const tickStartedAt = this.now()
    this.lastTickAt = tickStartedAt

    try {
      const due = await this.deps.registry.claimDue(tickStartedAt)

      for (const trigger of due) {
        const latenessMs = tickStartedAt.getTime() - trigger.fireAt.getTime()

        if (latenessMs > trigger.misfireGraceSeconds * 1000) {
          this.recordMissed(trigger, tickStartedAt, latenessMs)
        } else {
          this.dispatch(trigger, latenessMs)
        }

        if (trigger.cronExpression !== null) {
          await this.registerNextOccurrence(trigger, trigger.cronExpression, tickStartedAt)
        }
      }
    } catch (err) {
      this.deps.logger.error(
        { event: 'scheduler_tick_failed', error: serializeError(err) },
        'Scheduler tick failed'
      )
    }
  }

  private dispatch(trigger: Trigger, latenessMs: number): void {
    const handler = this.deps.handlers[trigger.purpose]

    if (handler === undefined) {
      this.deps.logger.warn(
        { event: 'scheduler_trigger_unhandled', triggerId: trigger.id, purpose: trigger.purpose },
        'No handler registered for trigger purpose'
      )
      return
    }

    const accepted = this.deps.pool.submit({
      id: trigger.id,
      run: async () => handler(trigger),
    })

    if (!accepted) {
      return
    }

    this.firedCount += 1
    this.deps.logger.info(
      {
        event: 'scheduler_trigger_fired',
        triggerId: trigger.id,
        instanceId: trigger.instanceId,
        purpose: trigger.purpose,
        fireAt: trigger.fireAt.toISOString(),
        latenessMs: Math.max(latenessMs, 0),
      },
      'Trigger fired'
    )
  }

  private recordMissed(trigger: Trigger, detectedAt: Date, latenessMs: number): void {
    const missed: MissedFire = {
      triggerId: trigger.id,
      instanceId: trigger.instanceId,
      purpose: trigger.purpose,
      fireAt: trigger.fireAt.toISOString(),
      detectedAt: detectedAt.toISOString(),
      latenessMs,
    }

    this.missedCount += 1
    this.recentMissed.push(missed)
    if (this.recentMissed.length > this.missedFireHistory) {
      this.recentMissed.shift()
    }

    this.deps.logger.warn(
      {
        event: 'scheduler_trigger_missed',
        ...missed,
        misfireGraceSeconds: trigger.misfireGraceSeconds,
      },
      'Trigger missed its fire time beyond the misfire grace; skipping'
    )
  }

  private async registerNextOccurrence(
    trigger: Trigger,
    cronExpression: string,
    after: Date
  ): Promise<void> {
    try {
      const fireAt = nextCronOccurrence(cronExpression, after, this.cronTimeZone)
      await this.deps.registry.registerIfAbsent({
        id: trigger.id,
        purpose: trigger.purpose,
        fireAt,
        payload: trigger.payload,
        misfireGraceSeconds: trigger.misfireGraceSeconds,
        cronExpression,
      })
    } catch (err) {
      this.deps.logger.error(
        {
          event: 'scheduler_recurrence_failed',
          triggerId: trigger.id,
          cronExpression,
          error: serializeError(err),
        },
        'Failed to register next occurrence of recurring trigger'
      )
    }
  }
}
