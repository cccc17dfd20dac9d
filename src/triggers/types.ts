export const TRIGGER_PURPOSES = [
  'per_event_action',
  'immediate_refresh',
  'delayed_refresh',
  'periodic_check',
] as const

export type TriggerPurpose = (typeof TRIGGER_PURPOSES)[number]

export const REFRESH_PURPOSES: readonly TriggerPurpose[] = [
  'immediate_refresh',
  'delayed_refresh',
]

export interface Trigger {
  /** Deterministic: derived from (target, purpose) only. */
  id: string
  /** Unique per registration; a fired or cancelled trigger is never reused. */
  instanceId: string
  purpose: TriggerPurpose
  fireAt: Date
  /** Internal event id for per-event actions, otherwise null. */
  payload: number | null
  misfireGraceSeconds: number
  /** Recurring periodic checks only. */
  cronExpression: string | null
  createdAt: Date
}

export type NewTrigger = Omit<Trigger, 'instanceId' | 'createdAt' | 'cronExpression'> & {
  cronExpression?: string | null
}

/**
 * Durable persistence contract for triggers. Implementations are not required
 * to be safe against concurrent check-and-insert; `TriggerRegistry` serialises
 * access.
 */
export interface ScheduleStore {
  get: (id: string) => Promise<Trigger | null>
  /** Returns false when a trigger with the same id already exists. */
  insert: (trigger: Trigger) => Promise<boolean>
  remove: (id: string) => Promise<boolean>
  removeByPurpose: (purposes: readonly TriggerPurpose[]) => Promise<Trigger[]>
  /** All live triggers, ordered by fire time. */
  list: () => Promise<Trigger[]>
  /** Delete and return every trigger with `fireAt <= now`. */
  takeDue: (now: Date) => Promise<Trigger[]>
}

export type RegistrationResult =
  | { status: 'created'; trigger: Trigger }
  | { status: 'exists'; trigger: Trigger }
