import type { Logger } from 'pino'
import type { TriggerRegistry } from '../triggers/registry.js'
import type { Trigger, TriggerPurpose } from '../triggers/types.js'
import type { FirePool, FirePoolMetrics } from './fire-pool.js'

export interface TimerControls {
  setInterval: (handler: () => void, timeout: number) => NodeJS.Timeout
  clearInterval: (handle: NodeJS.Timeout) => void
}

export type TriggerHandler = (trigger: Trigger) => Promise<void>

export type TriggerHandlers = Partial<Record<TriggerPurpose, TriggerHandler>>

export interface SchedulerDependencies {
  registry: TriggerRegistry
  pool: FirePool
  handlers: TriggerHandlers
  logger: Logger
  timers?: TimerControls
  now?: () => Date
}

export interface SchedulerOptions {
  tickIntervalMs?: number
  /** How many missed fires `getState` keeps. */
  missedFireHistory?: number
  /** Timezone recurring cron triggers are evaluated in. */
  cronTimeZone?: string
}

export interface MissedFire {
  triggerId: string
  instanceId: string
  purpose: TriggerPurpose
  fireAt: string
  detectedAt: string
  latenessMs: number
}

export interface SchedulerState {
  isRunning: boolean
  lastTickAt: string | null
  firedCount: number
  missedCount: number
  recentMissed: MissedFire[]
  pool: FirePoolMetrics
}
