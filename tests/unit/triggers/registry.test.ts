import { describe, expect, it, vi } from 'vitest'
import { PersistenceError } from '../../../src/shared/errors.js'
import { TriggerRegistry } from '../../../src/triggers/registry.js'
import { triggerIdFor } from '../../../src/triggers/trigger-id.js'
import type { NewTrigger } from '../../../src/triggers/types.js'
import { InMemoryScheduleStore, createMockLogger } from '../../helpers/fakes.js'

const now = new Date('2026-06-01T10:00:00Z')

const refreshTrigger = (overrides: Partial<NewTrigger> = {}): NewTrigger => ({
  id: triggerIdFor('immediate_refresh', 'events'),
  purpose: 'immediate_refresh',
  fireAt: new Date(now.getTime() + 5_000),
  payload: null,
  misfireGraceSeconds: 300,
  ...overrides,
})

const createRegistry = (store = new InMemoryScheduleStore()) => {
  let sequence = 0
  const registry = new TriggerRegistry({
    store,
    logger: createMockLogger(),
    now: () => now,
    newInstanceId: () => `instance-${String(++sequence)}`,
  })
  return { registry, store }
}

describe('trigger ids', () => {
  it('derives ids from purpose and target only', () => {
    expect(triggerIdFor('per_event_action', 42)).toBe('action:42')
    expect(triggerIdFor('immediate_refresh', 'events')).toBe('refresh-immediate:events')
    expect(triggerIdFor('delayed_refresh', 'events')).toBe('refresh-delayed:events')
    expect(triggerIdFor('periodic_check', 'hourly')).toBe('periodic-check:hourly')
  })
})

describe('TriggerRegistry', () => {
  it('creates a trigger with a fresh instance id', async () => {
    const { registry } = createRegistry()

    const result = await registry.registerIfAbsent(refreshTrigger())

    expect(result.status).toBe('created')
    expect(result.trigger).toEqual({
      ...refreshTrigger(),
      cronExpression: null,
      instanceId: 'instance-1',
      createdAt: now,
    })
  })

  it('treats a second registration under the same id as a no-op', async () => {
    const { registry, store } = createRegistry()

    await registry.registerIfAbsent(refreshTrigger())
    const second = await registry.registerIfAbsent(
      refreshTrigger({ fireAt: new Date(now.getTime() + 60_000) })
    )

    expect(second.status).toBe('exists')
    expect(second.trigger.instanceId).toBe('instance-1')
    expect(store.triggers.size).toBe(1)
  })

  it('keeps exactly one trigger when registrations race', async () => {
    const { registry, store } = createRegistry()

    const results = await Promise.all([
      registry.registerIfAbsent(refreshTrigger()),
      registry.registerIfAbsent(refreshTrigger()),
      registry.registerIfAbsent(refreshTrigger()),
    ])

    expect(results.map((result) => result.status)).toEqual(['created', 'exists', 'exists'])
    expect(store.triggers.size).toBe(1)
  })

  it('issues a new instance id when an id is registered again after cancellation', async () => {
    const { registry } = createRegistry()

    await registry.registerIfAbsent(refreshTrigger())
    await expect(registry.cancel('refresh-immediate:events')).resolves.toBe(true)
    const again = await registry.registerIfAbsent(refreshTrigger())

    expect(again).toMatchObject({ status: 'created', trigger: { instanceId: 'instance-2' } })
    await expect(registry.cancel('refresh-immediate:events')).resolves.toBe(true)
    await expect(registry.cancel('refresh-immediate:events')).resolves.toBe(false)
  })

  it('reads back the winner when the store reports a conflicting insert', async () => {
    const store = new InMemoryScheduleStore()
    const { registry } = createRegistry(store)
    const winner = {
      ...refreshTrigger(),
      cronExpression: null,
      instanceId: 'other-process',
      createdAt: now,
    }
    vi.spyOn(store, 'get').mockResolvedValueOnce(null).mockResolvedValueOnce(winner)
    vi.spyOn(store, 'insert').mockResolvedValueOnce(false)

    await expect(registry.registerIfAbsent(refreshTrigger())).resolves.toEqual({
      status: 'exists',
      trigger: winner,
    })
  })

  it('fails when a conflicting insert cannot be read back', async () => {
    const store = new InMemoryScheduleStore()
    const { registry } = createRegistry(store)
    vi.spyOn(store, 'insert').mockResolvedValueOnce(false)

    await expect(registry.registerIfAbsent(refreshTrigger())).rejects.toBeInstanceOf(
      PersistenceError
    )
  })

  it('cancels by purpose and only stale triggers of the given purposes', async () => {
    const { registry, store } = createRegistry()
    await registry.registerIfAbsent(
      refreshTrigger({ fireAt: new Date(now.getTime() - 60_000) })
    )
    await registry.registerIfAbsent(
      refreshTrigger({
        id: 'refresh-delayed:events',
        purpose: 'delayed_refresh',
        fireAt: new Date(now.getTime() + 60_000),
      })
    )
    await registry.registerIfAbsent({
      id: 'action:7',
      purpose: 'per_event_action',
      fireAt: new Date(now.getTime() - 60_000),
      payload: 7,
      misfireGraceSeconds: 60,
    })

    const stale = await registry.cancelStale(['immediate_refresh', 'delayed_refresh'], now)
    expect(stale.map((trigger) => trigger.id)).toEqual(['refresh-immediate:events'])

    const cancelled = await registry.cancelByPurpose(['delayed_refresh'])
    expect(cancelled.map((trigger) => trigger.id)).toEqual(['refresh-delayed:events'])
    expect(Array.from(store.triggers.keys())).toEqual(['action:7'])
  })

  it('claims due triggers in fire-time order and removes them', async () => {
    const { registry } = createRegistry()
    await registry.registerIfAbsent({
      id: 'action:2',
      purpose: 'per_event_action',
      fireAt: new Date(now.getTime() - 1_000),
      payload: 2,
      misfireGraceSeconds: 60,
    })
    await registry.registerIfAbsent({
      id: 'action:1',
      purpose: 'per_event_action',
      fireAt: new Date(now.getTime() - 5_000),
      payload: 1,
      misfireGraceSeconds: 60,
    })
    await registry.registerIfAbsent({
      id: 'action:3',
      purpose: 'per_event_action',
      fireAt: new Date(now.getTime() + 5_000),
      payload: 3,
      misfireGraceSeconds: 60,
    })

    const due = await registry.claimDue(now)

    expect(due.map((trigger) => trigger.id)).toEqual(['action:1', 'action:2'])
    expect((await registry.list()).map((trigger) => trigger.id)).toEqual(['action:3'])
  })
})
