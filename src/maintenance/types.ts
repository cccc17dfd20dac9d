export type MaintenanceRunStatus = 'ok' | 'error' | 'disabled' | 'partial'

export interface MaintenanceRunCounts {
  eventsDeleted: number
  eventsFetched: number
  eventsUpserted: number
  triggersScheduled: number
  eventsSkipped: number
}

export interface NewMaintenanceRun extends MaintenanceRunCounts {
  type: 'refresh'
  startedAt: Date
  finishedAt: Date
  status: MaintenanceRunStatus
  message: string | null
}

export interface MaintenanceRun extends NewMaintenanceRun {
  id: number
}

/** Append-only: runs are written once, after they finish. */
export interface MaintenanceRunStore {
  append: (run: NewMaintenanceRun) => Promise<MaintenanceRun>
  listRecent: (limit: number) => Promise<MaintenanceRun[]>
}
