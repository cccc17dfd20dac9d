import type { Pool } from 'pg'
import { PersistenceError } from '../shared/errors.js'
import type { ScheduleStore, Trigger, TriggerPurpose } from './types.js'

interface TriggerRow {
  id: string
  instanceId: string
  purpose: TriggerPurpose
  fireAt: Date | string
  payload: string | number | null
  misfireGraceSeconds: number
  cronExpression: string | null
  createdAt: Date | string
}

const TRIGGER_COLUMNS = `
  id,
  instance_id AS "instanceId",
  purpose,
  fire_at AS "fireAt",
  payload,
  misfire_grace_seconds AS "misfireGraceSeconds",
  cron_expression AS "cronExpression",
  created_at AS "createdAt"
`

const toDate = (value: Date | string): Date =>
  value instanceof Date ? value : new Date(value)

// BIGINT arrives as a string from pg
const toTrigger = (row: TriggerRow): Trigger => ({
  id: row.id,
  instanceId: row.instanceId,
  purpose: row.purpose,
  fireAt: toDate(row.fireAt),
  payload: row.payload === null ? null : Number(row.payload),
  misfireGraceSeconds: row.misfireGraceSeconds,
  cronExpression: row.cronExpression,
  createdAt: toDate(row.createdAt),
})

export class PgScheduleStore implements ScheduleStore {
  constructor(private readonly pool: Pool) {}

  async get(id: string): Promise<Trigger | null> {
    const rows = await this.query(
      'get',
      `SELECT ${TRIGGER_COLUMNS} FROM triggers WHERE id = $1 LIMIT 1`,
      [id]
    )
    const [row] = rows
    return row === undefined ? null : toTrigger(row)
  }

  async insert(trigger: Trigger): Promise<boolean> {
    const rows = await this.query(
      'insert',
      `
        INSERT INTO triggers (
          id, instance_id, purpose, fire_at, payload, misfire_grace_seconds, cron_expression, created_at
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
        ON CONFLICT (id) DO NOTHING
        RETURNING ${TRIGGER_COLUMNS}
      `,
      [
        trigger.id,
        trigger.instanceId,
        trigger.purpose,
        trigger.fireAt.toISOString(),
        trigger.payload,
        trigger.misfireGraceSeconds,
        trigger.cronExpression,
        trigger.createdAt.toISOString(),
      ]
    )
    return rows.length === 1
  }

  async remove(id: string): Promise<boolean> {
    const rows = await this.query(
      'remove',
      `DELETE FROM triggers WHERE id = $1 RETURNING ${TRIGGER_COLUMNS}`,
      [id]
    )
    return rows.length > 0
  }

  async removeByPurpose(purposes: readonly TriggerPurpose[]): Promise<Trigger[]> {
    if (purposes.length === 0) {
      return []
    }

    const rows = await this.query(
      'removeByPurpose',
      `DELETE FROM triggers WHERE purpose = ANY($1::text[]) RETURNING ${TRIGGER_COLUMNS}`,
      [purposes]
    )
    return rows.map(toTrigger)
  }

  async list(): Promise<Trigger[]> {
    const rows = await this.query(
      'list',
      `SELECT ${TRIGGER_COLUMNS} FROM triggers ORDER BY fire_at ASC, id ASC`,
      []
    )
    return rows.map(toTrigger)
  }

  async takeDue(now: Date): Promise<Trigger[]> {
    const rows = await this.query(
      'takeDue',
      `DELETE FROM triggers WHERE fire_at <= $1::timestamptz RETURNING ${TRIGGER_COLUMNS}`,
      [now.toISOString()]
    )
    return rows.map(toTrigger).sort((a, b) => a.fireAt.getTime() - b.fireAt.getTime())
  }

  private async query(
    operation: string,
    sql: string,
    values: unknown[]
  ): Promise<TriggerRow[]> {
    try {
      const { rows } = await this.pool.query<TriggerRow>(sql, values)
      return rows
    } catch (error) {
      throw new PersistenceError(`Trigger store ${operation} failed`, { cause: error })
    }
  }
}
