import type { Pool } from 'pg'
import { describe, expect, it, vi } from 'vitest'
import { PersistenceError } from '../../../src/shared/errors.js'
import { PgScheduleStore } from '../../../src/triggers/pg-schedule-store.js'
import type { Trigger } from '../../../src/triggers/types.js'

const createPool = () => {
  const query = vi.fn()
  return { pool: { query } as unknown as Pool, query }
}

const trigger: Trigger = {
  id: 'action:12',
  instanceId: '7a0c8c52-0000-4000-8000-000000000001',
  purpose: 'per_event_action',
  fireAt: new Date('2026-06-01T11:57:00Z'),
  payload: 12,
  misfireGraceSeconds: 60,
  cronExpression: null,
  createdAt: new Date('2026-06-01T10:00:00Z'),
}

const row = (overrides: Record<string, unknown> = {}) => ({
  id: 'action:12',
  instanceId: trigger.instanceId,
  purpose: 'per_event_action',
  fireAt: new Date('2026-06-01T11:57:00Z'),
  payload: '12',
  misfireGraceSeconds: 60,
  cronExpression: null,
  createdAt: new Date('2026-06-01T10:00:00Z'),
  ...overrides,
})

describe('PgScheduleStore', () => {
  it('inserts with ON CONFLICT DO NOTHING and reports whether a row was written', async () => {
    const { pool, query } = createPool()
    query.mockResolvedValueOnce({ rows: [row()] }).mockResolvedValueOnce({ rows: [] })
    const store = new PgScheduleStore(pool)

    await expect(store.insert(trigger)).resolves.toBe(true)
    await expect(store.insert(trigger)).resolves.toBe(false)

    const [sql, values] = query.mock.calls[0] ?? []
    expect(sql).toContain('ON CONFLICT (id) DO NOTHING')
    expect(values).toEqual([
      'action:12',
      trigger.instanceId,
      'per_event_action',
      '2026-06-01T11:57:00.000Z',
      12,
      60,
      null,
      '2026-06-01T10:00:00.000Z',
    ])
  })

  it('maps rows back to triggers, converting BIGINT payloads', async () => {
    const { pool, query } = createPool()
    query.mockResolvedValueOnce({ rows: [row()] })
    const store = new PgScheduleStore(pool)

    await expect(store.get('action:12')).resolves.toEqual(trigger)
  })

  it('returns null for an unknown id', async () => {
    const { pool, query } = createPool()
    query.mockResolvedValueOnce({ rows: [] })

    await expect(new PgScheduleStore(pool).get('action:404')).resolves.toBeNull()
  })

  it('claims due triggers with a single DELETE ... RETURNING, oldest first', async () => {
    const { pool, query } = createPool()
    query.mockResolvedValueOnce({
      rows: [
        row({ id: 'action:2', payload: '2', fireAt: '2026-06-01T11:59:00.000Z' }),
        row({ id: 'action:1', payload: '1', fireAt: '2026-06-01T11:58:00.000Z' }),
      ],
    })
    const store = new PgScheduleStore(pool)

    const due = await store.takeDue(new Date('2026-06-01T12:00:00Z'))

    expect(due.map((item) => [item.id, item.payload])).toEqual([
      ['action:1', 1],
      ['action:2', 2],
    ])
    expect(query).toHaveBeenCalledWith(
      expect.stringContaining('DELETE FROM triggers WHERE fire_at <= $1::timestamptz'),
      ['2026-06-01T12:00:00.000Z']
    )
  })

  it('removes by purpose with one array parameter and skips empty input', async () => {
    const { pool, query } = createPool()
    query.mockResolvedValueOnce({ rows: [row({ id: 'refresh-delayed:events', payload: null })] })
    const store = new PgScheduleStore(pool)

    await expect(store.removeByPurpose([])).resolves.toEqual([])
    const removed = await store.removeByPurpose(['immediate_refresh', 'delayed_refresh'])

    expect(removed.map((item) => item.payload)).toEqual([null])
    expect(query).toHaveBeenCalledTimes(1)
    expect(query.mock.calls[0]?.[1]).toEqual([['immediate_refresh', 'delayed_refresh']])
  })

  it('wraps driver errors in PersistenceError', async () => {
    const { pool, query } = createPool()
    const driverError = new Error('connection terminated')
    query.mockRejectedValueOnce(driverError)

    const failure = await new PgScheduleStore(pool).list().catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(PersistenceError)
    expect(failure).toMatchObject({ message: 'Trigger store list failed', cause: driverError })
  })
})
