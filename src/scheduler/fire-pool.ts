import pLimit, { type LimitFunction } from 'p-limit'
import type { Logger } from 'pino'
import { serializeError } from '../shared/errors.js'

export interface FirePoolMetrics {
  concurrency: number
  activeCount: number
  pendingCount: number
  completed: number
  failed: number
}

export interface FirePoolOptions {
  concurrency: number
}

export interface FireTask {
  /** Trigger id, used for log correlation. */
  id: string
  run: () => Promise<void>
}

/**
 * Bounded pool for trigger callbacks.
 *
 * `submit` never blocks the caller: the task is queued on p-limit and its
 * failure is logged, never rethrown. `drain` resolves once everything queued
 * before it has settled.
 */
export class FirePool {
  private readonly limit: LimitFunction
  private readonly logger: Logger
  private readonly inflight = new Set<Promise<void>>()
  private completed = 0
  private failed = 0
  private isShuttingDown = false

  constructor(logger: Logger, options: FirePoolOptions) {
    this.logger = logger
    this.limit = pLimit(Math.max(1, options.concurrency))

    this.logger.info(
      { event: 'fire_pool_initialized', concurrency: this.limit.concurrency },
      'Fire pool initialized'
    )
  }

  submit(task: FireTask): boolean {
    if (this.isShuttingDown) {
      this.logger.warn(
        { event: 'fire_pool_rejected', triggerId: task.id },
        'Fire pool is shutting down; task not accepted'
      )
      return false
    }

    const settled = this.limit(async () => {
      const startedAt = performance.now()
      try {
        await task.run()
        this.completed += 1
        this.logger.debug(
          {
            event: 'fire_pool_task_completed',
            triggerId: task.id,
            duration_ms: Math.round(performance.now() - startedAt),
          },
          'Trigger callback completed'
        )
      } catch (error) {
        this.failed += 1
        this.logger.error(
          {
            event: 'fire_pool_task_failed',
            triggerId: task.id,
            duration_ms: Math.round(performance.now() - startedAt),
            error: serializeError(error),
          },
          'Trigger callback failed'
        )
      }
    })

    this.inflight.add(settled)
    void settled.finally(() => {
      this.inflight.delete(settled)
    })

    return true
  }

  getMetrics(): FirePoolMetrics {
    return {
      concurrency: this.limit.concurrency,
      activeCount: this.limit.activeCount,
      pendingCount: this.limit.pendingCount,
      completed: this.completed,
      failed: this.failed,
    }
  }

  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled(Array.from(this.inflight))
    }
  }

  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return
    }
    this.isShuttingDown = true

    this.logger.info(
      {
        event: 'fire_pool_shutdown_start',
        inflight: this.inflight.size,
        pending: this.limit.pendingCount,
      },
      'Draining fire pool'
    )

    await this.drain()

    this.logger.info({ event: 'fire_pool_shutdown_complete' }, 'Fire pool shutdown complete')
  }
}
