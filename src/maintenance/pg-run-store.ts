import type { Pool } from 'pg'
import { PersistenceError } from '../shared/errors.js'
import type {
  MaintenanceRun,
  MaintenanceRunStatus,
  MaintenanceRunStore,
  NewMaintenanceRun,
} from './types.js'

interface RunRow {
  id: string | number
  type: 'refresh'
  startedAt: Date
  finishedAt: Date
  status: MaintenanceRunStatus
  message: string | null
  eventsDeleted: number
  eventsFetched: number
  eventsUpserted: number
  triggersScheduled: number
  eventsSkipped: number
}

const RUN_COLUMNS = `
  id,
  type,
  started_at AS "startedAt",
  finished_at AS "finishedAt",
  status,
  message,
  events_deleted AS "eventsDeleted",
  events_fetched AS "eventsFetched",
  events_upserted AS "eventsUpserted",
  triggers_scheduled AS "triggersScheduled",
  events_skipped AS "eventsSkipped"
`

const toRun = (row: RunRow): MaintenanceRun => ({ ...row, id: Number(row.id) })

export class PgMaintenanceRunStore implements MaintenanceRunStore {
  constructor(private readonly pool: Pool) {}

  async append(run: NewMaintenanceRun): Promise<MaintenanceRun> {
    try {
      const { rows } = await this.pool.query<RunRow>(
        `
          INSERT INTO maintenance_runs (
            type, started_at, finished_at, status, message,
            events_deleted, events_fetched, events_upserted, triggers_scheduled, events_skipped
          ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
          RETURNING ${RUN_COLUMNS}
        `,
        [
          run.type,
          run.startedAt.toISOString(),
          run.finishedAt.toISOString(),
          run.status,
          run.message,
          run.eventsDeleted,
          run.eventsFetched,
          run.eventsUpserted,
          run.triggersScheduled,
          run.eventsSkipped,
        ]
      )
      const [row] = rows
      if (row === undefined) {
        throw new Error('INSERT returned no row')
      }
      return toRun(row)
    } catch (error) {
      throw new PersistenceError('Appending maintenance run failed', { cause: error })
    }
  }

  async listRecent(limit: number): Promise<MaintenanceRun[]> {
    try {
      const { rows } = await this.pool.query<RunRow>(
        `SELECT ${RUN_COLUMNS} FROM maintenance_runs ORDER BY started_at DESC, id DESC LIMIT $1`,
        [limit]
      )
      return rows.map(toRun)
    } catch (error) {
      throw new PersistenceError('Listing maintenance runs failed', { cause: error })
    }
  }
}
