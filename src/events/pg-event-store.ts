import type { Pool } from 'pg'
import type { Logger } from 'pino'
import { withTransaction } from '../database/pool.js'
import { PersistenceError } from '../shared/errors.js'
import type { Event, EventDetail, EventRecord, EventStore, WipeResult } from './types.js'

interface EventRow {
  id: string | number
  externalId: string
  name: string
  groupName: string
  startTime: string
  detailUrl: string
  surface: string | null
  distanceMeters: number | null
  fetchedAt: Date | string
}

interface DetailRow {
  eventId: string | number
  payload: unknown
  createdAt: Date | string
}

const EVENT_COLUMNS = `
  id,
  external_id AS "externalId",
  name,
  group_name AS "groupName",
  start_time AS "startTime",
  detail_url AS "detailUrl",
  surface,
  distance_meters AS "distanceMeters",
  fetched_at AS "fetchedAt"
`

const COLUMNS_PER_ROW = 8

const toEvent = (row: EventRow): Event => ({
  id: Number(row.id),
  externalId: row.externalId,
  name: row.name,
  groupName: row.groupName,
  startTime: row.startTime,
  detailUrl: row.detailUrl,
  surface: row.surface,
  distanceMeters: row.distanceMeters,
  fetchedAt: row.fetchedAt instanceof Date ? row.fetchedAt : new Date(row.fetchedAt),
})

/**
 * PostgreSQL-backed event store.
 *
 * `upsertMany` is one multi-row INSERT...ON CONFLICT on `external_id`, so ids
 * of existing events are preserved and BIGSERIAL never hands out an old id.
 */
export class PgEventStore implements EventStore {
  constructor(
    private readonly pool: Pool,
    private readonly logger: Logger
  ) {}

  async upsertMany(records: EventRecord[], fetchedAt: Date): Promise<Event[]> {
    if (records.length === 0) {
      return []
    }

    // One row per external id; ON CONFLICT cannot touch the same row twice
    const byExternalId = new Map<string, EventRecord>()
    for (const record of records) {
      byExternalId.set(record.externalId, record)
    }
    const unique = Array.from(byExternalId.values())

    const startTime = performance.now()
    const values: unknown[] = []
    const valueRows: string[] = []
    let paramIndex = 1

    for (const record of unique) {
      const placeholders = Array.from(
        { length: COLUMNS_PER_ROW },
        (_, offset) => `$${String(paramIndex + offset)}`
      )
      valueRows.push(`(${placeholders.join(', ')})`)
      values.push(
        record.externalId,
        record.name,
        record.groupName,
        record.startTime,
        record.detailUrl,
        record.surface ?? null,
        record.distanceMeters ?? null,
        fetchedAt.toISOString()
      )
      paramIndex += COLUMNS_PER_ROW
    }

    const sql = `
      INSERT INTO events (
        external_id, name, group_name, start_time, detail_url, surface, distance_meters, fetched_at
      ) VALUES ${valueRows.join(', ')}
      ON CONFLICT (external_id) DO UPDATE SET
        name = EXCLUDED.name,
        group_name = EXCLUDED.group_name,
        start_time = EXCLUDED.start_time,
        detail_url = EXCLUDED.detail_url,
        surface = EXCLUDED.surface,
        distance_meters = EXCLUDED.distance_meters,
        fetched_at = EXCLUDED.fetched_at
      RETURNING ${EVENT_COLUMNS}
    `

    let rows: EventRow[]
    try {
      rows = await withTransaction(this.pool, async (client) => {
        const result = await client.query<EventRow>(sql, values)
        return result.rows
      })
    } catch (error) {
      throw new PersistenceError('Event upsert failed', { cause: error })
    }

    this.logger.info(
      {
        table: 'events',
        rowCount: rows.length,
        write_ms: Math.round(performance.now() - startTime),
      },
      'Bulk UPSERT events completed'
    )

    const persisted = new Map(rows.map((row) => [row.externalId, toEvent(row)]))
    return unique.flatMap((record) => {
      const event = persisted.get(record.externalId)
      return event === undefined ? [] : [event]
    })
  }

  async listAll(): Promise<Event[]> {
    try {
      const { rows } = await this.pool.query<EventRow>(
        `SELECT ${EVENT_COLUMNS} FROM events ORDER BY id ASC`
      )
      return rows.map(toEvent)
    } catch (error) {
      throw new PersistenceError('Event listing failed', { cause: error })
    }
  }

  async getById(id: number): Promise<Event | null> {
    try {
      const { rows } = await this.pool.query<EventRow>(
        `SELECT ${EVENT_COLUMNS} FROM events WHERE id = $1 LIMIT 1`,
        [id]
      )
      const [row] = rows
      return row === undefined ? null : toEvent(row)
    } catch (error) {
      throw new PersistenceError(`Event lookup failed for ${String(id)}`, { cause: error })
    }
  }

  async deleteAll(): Promise<WipeResult> {
    try {
      return await withTransaction(this.pool, async (client) => {
        const details = await client.query('DELETE FROM event_details')
        const events = await client.query('DELETE FROM events')
        return {
          events: events.rowCount ?? 0,
          details: details.rowCount ?? 0,
        }
      })
    } catch (error) {
      throw new PersistenceError('Event wipe failed', { cause: error })
    }
  }

  async saveDetail(eventId: number, payload: unknown): Promise<void> {
    try {
      await this.pool.query(
        'INSERT INTO event_details (event_id, payload) VALUES ($1, $2::jsonb)',
        [eventId, JSON.stringify(payload ?? null)]
      )
    } catch (error) {
      throw new PersistenceError(`Saving detail for event ${String(eventId)} failed`, {
        cause: error,
      })
    }
  }

  async getDetail(eventId: number): Promise<EventDetail | null> {
    try {
      const { rows } = await this.pool.query<DetailRow>(
        `SELECT event_id AS "eventId", payload, created_at AS "createdAt"
         FROM event_details
         WHERE event_id = $1
         ORDER BY created_at DESC, id DESC
         LIMIT 1`,
        [eventId]
      )
      const [row] = rows
      if (row === undefined) {
        return null
      }
      return {
        eventId: Number(row.eventId),
        payload: row.payload,
        createdAt: row.createdAt instanceof Date ? row.createdAt : new Date(row.createdAt),
      }
    } catch (error) {
      throw new PersistenceError(`Detail lookup failed for event ${String(eventId)}`, {
        cause: error,
      })
    }
  }
}
