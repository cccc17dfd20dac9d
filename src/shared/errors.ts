/**
 * Raised when the event feed cannot be fetched or its payload fails validation.
 * A refresh run that hits it is recorded with `status=error`; the next periodic
 * check retries.
 */
export class FeedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'FeedError'
  }
}

/**
 * A stored event start time that cannot be mapped to exactly one UTC instant:
 * unparseable text, a wall-clock time skipped by a DST jump, or one repeated
 * by a DST fall-back.
 */
export class TimezoneResolutionError extends Error {
  constructor(
    message: string,
    readonly value: string,
    readonly timeZone: string
  ) {
    super(message)
    this.name = 'TimezoneResolutionError'
  }
}

/**
 * Failure of a durable store. Scheduling without durability is meaningless, so
 * this is always propagated to the caller.
 */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PersistenceError'
  }
}

export const serializeError = (error: unknown): Record<string, unknown> => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  return { message: String(error) }
}
