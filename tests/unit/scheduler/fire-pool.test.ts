import { setImmediate as flushIo } from 'node:timers/promises'
import { describe, expect, it } from 'vitest'
import { FirePool } from '../../../src/scheduler/fire-pool.js'
import { createMockLogger } from '../../helpers/fakes.js'

const deferred = () => {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((done) => {
    resolve = done
  })
  return { promise, resolve }
}

describe('FirePool', () => {
  it('bounds concurrency and queues the rest', async () => {
    const pool = new FirePool(createMockLogger(), { concurrency: 2 })
    const gates = Array.from({ length: 5 }, () => deferred())

    gates.forEach((gate, index) => {
      pool.submit({ id: `action:${String(index)}`, run: async () => gate.promise })
    })
    await flushIo()

    expect(pool.getMetrics()).toMatchObject({
      concurrency: 2,
      activeCount: 2,
      pendingCount: 3,
      completed: 0,
    })

    gates.forEach((gate) => {
      gate.resolve()
    })
    await pool.drain()

    expect(pool.getMetrics()).toMatchObject({ activeCount: 0, pendingCount: 0, completed: 5 })
  })

  it('logs a failed task without rejecting the submitter', async () => {
    const logger = createMockLogger()
    const pool = new FirePool(logger, { concurrency: 1 })

    pool.submit({
      id: 'action:9',
      run: async () => Promise.reject(new Error('downstream unavailable')),
    })
    await pool.drain()

    expect(pool.getMetrics()).toMatchObject({ completed: 0, failed: 1 })
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({
        event: 'fire_pool_task_failed',
        triggerId: 'action:9',
        error: expect.objectContaining({ message: 'downstream unavailable' }),
      }),
      'Trigger callback failed'
    )
  })

  it('drains in-flight work on shutdown and then refuses new tasks', async () => {
    const pool = new FirePool(createMockLogger(), { concurrency: 1 })
    const gate = deferred()
    let finished = false

    pool.submit({
      id: 'action:1',
      run: async () => {
        await gate.promise
        finished = true
      },
    })

    const shutdown = pool.shutdown()
    gate.resolve()
    await shutdown

    expect(finished).toBe(true)
    expect(pool.submit({ id: 'action:2', run: async () => Promise.resolve() })).toBe(false)
  })
})
