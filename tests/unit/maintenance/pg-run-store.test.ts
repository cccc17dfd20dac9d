import type { Pool } from 'pg'
import { describe, expect, it, vi } from 'vitest'
import { PgMaintenanceRunStore } from '../../../src/maintenance/pg-run-store.js'
import { PersistenceError } from '../../../src/shared/errors.js'

const startedAt = new Date('2026-06-01T10:00:05Z')
const finishedAt = new Date('2026-06-01T10:00:09Z')

const run = {
  type: 'refresh' as const,
  startedAt,
  finishedAt,
  status: 'partial' as const,
  message: '1 event(s) could not be scheduled',
  eventsDeleted: 10,
  eventsFetched: 12,
  eventsUpserted: 12,
  triggersScheduled: 11,
  eventsSkipped: 1,
}

describe('PgMaintenanceRunStore', () => {
  it('appends a run and returns it with its numeric id', async () => {
    const query = vi.fn().mockResolvedValueOnce({ rows: [{ ...run, id: '41' }] })
    const store = new PgMaintenanceRunStore({ query } as unknown as Pool)

    await expect(store.append(run)).resolves.toEqual({ ...run, id: 41 })
    expect(query.mock.calls[0]?.[1]).toEqual([
      'refresh',
      '2026-06-01T10:00:05.000Z',
      '2026-06-01T10:00:09.000Z',
      'partial',
      '1 event(s) could not be scheduled',
      10,
      12,
      12,
      11,
      1,
    ])
  })

  it('lists the most recent runs first', async () => {
    const query = vi.fn().mockResolvedValueOnce({ rows: [{ ...run, id: '2' }, { ...run, id: '1' }] })
    const store = new PgMaintenanceRunStore({ query } as unknown as Pool)

    const runs = await store.listRecent(2)

    expect(runs.map((item) => item.id)).toEqual([2, 1])
    expect(String(query.mock.calls[0]?.[0])).toContain('ORDER BY started_at DESC, id DESC LIMIT $1')
    expect(query.mock.calls[0]?.[1]).toEqual([2])
  })

  it('wraps driver errors in PersistenceError', async () => {
    const query = vi.fn().mockRejectedValueOnce(new Error('relation does not exist'))
    const store = new PgMaintenanceRunStore({ query } as unknown as Pool)

    await expect(store.listRecent(5)).rejects.toBeInstanceOf(PersistenceError)
  })
})
