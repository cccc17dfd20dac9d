/**
 * Timezone utilities for venue-local race times
 *
 * Race start times are stored exactly as the feed delivered them. Some carry
 * an explicit UTC offset, others are bare wall-clock times at the venue. Every
 * place that needs an instant goes through `resolveToUtc`, which applies the
 * venue timezone only when the stored text has no offset of its own.
 *
 * DST handling uses the Intl API; no fixed offsets are assumed anywhere.
 */
import { TimezoneResolutionError } from './errors.js'

const MINUTE_MS = 60_000
const DAY_MS = 24 * 60 * MINUTE_MS

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/

interface WallClock {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

interface ParsedTimestamp extends WallClock {
  millisecond: number
  offsetMinutes: number | null
}

const formatterCache = new Map<string, Intl.DateTimeFormat>()

const getFormatter = (timeZone: string): Intl.DateTimeFormat => {
  let formatter = formatterCache.get(timeZone)
  if (formatter === undefined) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    })
    formatterCache.set(timeZone, formatter)
  }
  return formatter
}

const wallClockAt = (instant: Date, timeZone: string): WallClock => {
  const parts = getFormatter(timeZone).formatToParts(instant)
  const partsMap = new Map(parts.map((part) => [part.type, part.value]))

  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const value = partsMap.get(type)
    if (value === undefined) {
      throw new Error(`Missing ${type} while formatting ${instant.toISOString()} in ${timeZone}`)
    }
    return Number(value)
  }

  return {
    year: read('year'),
    month: read('month'),
    day: read('day'),
    hour: read('hour'),
    minute: read('minute'),
    second: read('second'),
  }
}

const sameWallClock = (a: WallClock, b: WallClock): boolean =>
  a.year === b.year &&
  a.month === b.month &&
  a.day === b.day &&
  a.hour === b.hour &&
  a.minute === b.minute &&
  a.second === b.second

const parseOffset = (raw: string): number => {
  if (raw === 'Z') {
    return 0
  }
  const sign = raw.startsWith('-') ? -1 : 1
  const digits = raw.slice(1).replace(':', '')
  const hours = Number(digits.slice(0, 2))
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0
  return sign * (hours * 60 + minutes)
}

const parseTimestamp = (value: string, timeZone: string): ParsedTimestamp => {
  const match = TIMESTAMP_PATTERN.exec(value.trim())

  if (match === null) {
    throw new TimezoneResolutionError(
      `Unrecognised start time format: "${value}"`,
      value,
      timeZone
    )
  }

  const [, year, month, day, hour, minute, second, fraction, offset] = match
  const parsed: ParsedTimestamp = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second ?? '0'),
    // Sub-millisecond digits are truncated
    millisecond: Number((fraction ?? '0').padEnd(3, '0').slice(0, 3)),
    offsetMinutes: offset === undefined ? null : parseOffset(offset),
  }

  // Date.UTC silently rolls 2025-02-30 into March; reject instead
  const check = new Date(wallClockAsUtc(parsed))
  if (
    check.getUTCFullYear() !== parsed.year ||
    check.getUTCMonth() + 1 !== parsed.month ||
    check.getUTCDate() !== parsed.day ||
    check.getUTCHours() !== parsed.hour ||
    check.getUTCMinutes() !== parsed.minute ||
    check.getUTCSeconds() !== parsed.second
  ) {
    throw new TimezoneResolutionError(
      `Start time is not a valid calendar time: "${value}"`,
      value,
      timeZone
    )
  }

  return parsed
}

const wallClockAsUtc = (wall: WallClock & { millisecond?: number }): number =>
  Date.UTC(
    wall.year,
    wall.month - 1,
    wall.day,
    wall.hour,
    wall.minute,
    wall.second,
    wall.millisecond ?? 0
  )

/**
 * Offset of `timeZone` from UTC at `instant`, in minutes (east positive).
 */
export const getZoneOffsetMinutes = (instant: Date, timeZone: string): number => {
  const wholeSeconds = Math.floor(instant.getTime() / 1000) * 1000
  const wallAsUtc = wallClockAsUtc(wallClockAt(instant, timeZone))
  return Math.round((wallAsUtc - wholeSeconds) / MINUTE_MS)
}

export const formatOffset = (offsetMinutes: number): string => {
  const sign = offsetMinutes >= 0 ? '+' : '-'
  const absolute = Math.abs(offsetMinutes)
  const hours = String(Math.floor(absolute / 60)).padStart(2, '0')
  const minutes = String(absolute % 60).padStart(2, '0')
  return `${sign}${hours}:${minutes}`
}

/**
 * Resolve a stored start time to a UTC instant.
 *
 * Text with an explicit offset (`Z`, `+02:00`) is taken as-is. Bare wall-clock
 * text is interpreted in `venueTimeZone`. A wall-clock time that does not exist
 * (spring-forward gap) or exists twice (fall-back overlap) is rejected rather
 * than guessed.
 *
 * @throws TimezoneResolutionError
 */
export const resolveToUtc = (value: string, venueTimeZone: string): Date => {
  const parsed = parseTimestamp(value, venueTimeZone)
  const wallAsUtc = wallClockAsUtc(parsed)

  if (parsed.offsetMinutes !== null) {
    return new Date(wallAsUtc - parsed.offsetMinutes * MINUTE_MS)
  }

  // Offsets in force a day either side cover any single transition
  const candidateOffsets = new Set([
    getZoneOffsetMinutes(new Date(wallAsUtc - DAY_MS), venueTimeZone),
    getZoneOffsetMinutes(new Date(wallAsUtc + DAY_MS), venueTimeZone),
  ])

  const matches = Array.from(candidateOffsets)
    .map((offset) => new Date(wallAsUtc - offset * MINUTE_MS))
    .filter((instant) => sameWallClock(wallClockAt(instant, venueTimeZone), parsed))

  const [first, second] = matches

  if (first === undefined) {
    throw new TimezoneResolutionError(
      `Start time "${value}" does not exist in ${venueTimeZone} (DST gap)`,
      value,
      venueTimeZone
    )
  }

  if (second !== undefined) {
    throw new TimezoneResolutionError(
      `Start time "${value}" is ambiguous in ${venueTimeZone} (DST overlap)`,
      value,
      venueTimeZone
    )
  }

  return first
}

/**
 * Format a UTC instant as venue-local ISO 8601 text with its offset, e.g.
 * `2026-03-29T03:30:00+02:00`, with milliseconds only when non-zero. Inverse of
 * `resolveToUtc` for display.
 */
export const toVenueLocal = (instant: Date, venueTimeZone: string): string => {
  const wall = wallClockAt(instant, venueTimeZone)
  const offset = getZoneOffsetMinutes(instant, venueTimeZone)
  const pad = (value: number): string => String(value).padStart(2, '0')
  const millisecond = instant.getUTCMilliseconds()
  const fraction = millisecond === 0 ? '' : `.${String(millisecond).padStart(3, '0')}`

  return `${String(wall.year).padStart(4, '0')}-${pad(wall.month)}-${pad(wall.day)}T${pad(wall.hour)}:${pad(wall.minute)}:${pad(wall.second)}${fraction}${formatOffset(offset)}`
}

/**
 * The next UTC calendar day at `hourUtc`:00:00.000.
 */
export const nextUtcDayAt = (reference: Date, hourUtc: number): Date =>
  new Date(
    Date.UTC(
      reference.getUTCFullYear(),
      reference.getUTCMonth(),
      reference.getUTCDate() + 1,
      hourUtc
    )
  )
