export { nextCronOccurrence } from './cron.js'
export { FirePool } from './fire-pool.js'
export type { FirePoolMetrics, FirePoolOptions } from './fire-pool.js'
export { TriggerScheduler } from './trigger-scheduler.js'
export type {
  MissedFire,
  SchedulerDependencies,
  SchedulerOptions,
  SchedulerState,
  TimerControls,
  TriggerHandler,
  TriggerHandlers,
} from './types.js'
