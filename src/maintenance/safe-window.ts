import type { Logger } from 'pino'
import type { EventStore } from '../events/types.js'
import { TimezoneResolutionError } from '../shared/errors.js'
import { nextUtcDayAt, resolveToUtc } from '../shared/timezone.js'

const MINUTE_MS = 60_000

export interface SafeWindowOptions {
  horizonMs: number
  safetyBufferMs: number
  /** How long an event keeps the system busy once it starts. */
  actionDurationMs: number
  fallbackHourUtc: number
}

export const DEFAULT_SAFE_WINDOW_OPTIONS: SafeWindowOptions = {
  horizonMs: 24 * 60 * MINUTE_MS,
  safetyBufferMs: 3 * MINUTE_MS,
  actionDurationMs: 10 * MINUTE_MS,
  fallbackHourUtc: 1,
}

export type SafeInstant =
  | { kind: 'now' }
  | { kind: 'at'; at: Date; reason: 'gap' | 'after_last' | 'fallback' }

/**
 * Earliest instant at which maintenance does not collide with an imminent
 * event. Only starts in `(now, now + horizon]` are considered.
 *
 * Walks the sorted starts and returns the end of the first busy period that
 * is followed by a gap of at least the safety buffer; later gaps are never
 * preferred.
 */
export const findSafeInstant = (
  startsUtc: readonly Date[],
  now: Date,
  options: Partial<SafeWindowOptions> = {}
): SafeInstant => {
  const { horizonMs, safetyBufferMs, actionDurationMs, fallbackHourUtc } = {
    ...DEFAULT_SAFE_WINDOW_OPTIONS,
    ...options,
  }
  const nowMs = now.getTime()

  const upcoming = startsUtc
    .map((start) => start.getTime())
    .filter((start) => start > nowMs && start <= nowMs + horizonMs)
    .sort((a, b) => a - b)

  const [earliest] = upcoming
  if (earliest === undefined || earliest > nowMs + safetyBufferMs) {
    return { kind: 'now' }
  }

  for (const [index, start] of upcoming.entries()) {
    const busyEnd = start + actionDurationMs
    const next = upcoming[index + 1]

    if (next === undefined) {
      return { kind: 'at', at: new Date(busyEnd), reason: 'after_last' }
    }

    if (next - busyEnd >= safetyBufferMs) {
      return { kind: 'at', at: new Date(busyEnd), reason: 'gap' }
    }
  }

  return { kind: 'at', at: nextUtcDayAt(now, fallbackHourUtc), reason: 'fallback' }
}

export interface SafeWindowPlannerDependencies {
  store: EventStore
  logger: Logger
}

/**
 * Loads the current event set, resolves every start time through the venue
 * timezone, and delegates to `findSafeInstant`.
 */
export class SafeWindowPlanner {
  constructor(
    private readonly deps: SafeWindowPlannerDependencies,
    private readonly options: SafeWindowOptions & { venueTimeZone: string }
  ) {}

  async nextSafeInstant(now: Date): Promise<SafeInstant> {
    const events = await this.deps.store.listAll()
    const starts: Date[] = []

    for (const event of events) {
      try {
        starts.push(resolveToUtc(event.startTime, this.options.venueTimeZone))
      } catch (error) {
        if (!(error instanceof TimezoneResolutionError)) {
          throw error
        }
        this.deps.logger.warn(
          {
            event: 'safe_window_event_unresolvable',
            eventId: event.id,
            startTime: event.startTime,
            reason: error.message,
          },
          'Ignoring event with unresolvable start time while planning'
        )
      }
    }

    const result = findSafeInstant(starts, now, this.options)

    if (result.kind === 'now') {
      this.deps.logger.info(
        { event: 'safe_window_now', eventsConsidered: starts.length },
        'No event within the safety buffer; refresh can run now'
      )
    } else {
      this.deps.logger.info(
        {
          event: 'safe_window_deferred',
          at: result.at.toISOString(),
          reason: result.reason,
          eventsConsidered: starts.length,
        },
        'Event imminent; refresh deferred to safe window'
      )
    }

    return result
  }
}
