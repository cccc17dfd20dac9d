import type { TriggerPurpose } from './types.js'

const PREFIXES: Record<TriggerPurpose, string> = {
  per_event_action: 'action',
  immediate_refresh: 'refresh-immediate',
  delayed_refresh: 'refresh-delayed',
  periodic_check: 'periodic-check',
}

/** The event set as a whole; target of every refresh trigger. */
export const EVENT_SET_TARGET = 'events'

export const triggerIdFor = (
  purpose: TriggerPurpose,
  targetEntityId: string | number
): string => `${PREFIXES[purpose]}:${String(targetEntityId)}`

export const actionTriggerId = (eventId: number): string =>
  triggerIdFor('per_event_action', eventId)
