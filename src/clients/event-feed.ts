import type { AxiosInstance } from 'axios'
import type { Logger } from 'pino'
import { z } from 'zod'
import type { EventRecord } from '../events/types.js'
import { FeedError } from '../shared/errors.js'
import { toVenueLocal } from '../shared/timezone.js'
import { describeHttpError } from './http.js'

export interface EventFeed {
  /** Today's raw event records. */
  fetchToday: () => Promise<EventRecord[]>
}

const FeedResponseSchema = z.object({
  events: z.array(z.unknown()),
})

/**
 * One item of the feed. Start time arrives either as text (with or without an
 * offset) or as epoch milliseconds; distance either in metres or as text such
 * as "2100m".
 */
const FeedItemSchema = z
  .object({
    externalId: z.union([z.string().min(1), z.number().int()]).transform(String),
    name: z.string().min(1),
    groupName: z.string().min(1),
    startTime: z.string().min(1).optional(),
    startEpochMs: z.number().int().nonnegative().optional(),
    detailUrl: z.string().url(),
    surface: z.string().nullish(),
    distance: z.union([z.number(), z.string()]).nullish(),
  })
  .passthrough()

type FeedItem = z.infer<typeof FeedItemSchema>

const METRES_PATTERN = /^(\d+)\s*m$/i

export const parseDistanceMeters = (distance: FeedItem['distance']): number | null => {
  if (typeof distance === 'number') {
    return Number.isInteger(distance) && distance > 0 ? distance : null
  }
  if (typeof distance !== 'string') {
    return null
  }
  const match = METRES_PATTERN.exec(distance.trim())
  const metres = match?.[1]
  return metres === undefined ? null : Number(metres)
}

export interface HttpEventFeedOptions {
  url: string
  venueTimeZone: string
}

export class HttpEventFeed implements EventFeed {
  constructor(
    private readonly client: AxiosInstance,
    private readonly logger: Logger,
    private readonly options: HttpEventFeedOptions
  ) {}

  /**
   * @throws FeedError when the request fails or the envelope is malformed.
   * Individual malformed items are skipped with a warning.
   */
  async fetchToday(): Promise<EventRecord[]> {
    const startedAt = Date.now()
    let body: unknown

    try {
      const response = await this.client.get<unknown>(this.options.url)
      body = response.data
    } catch (error) {
      const details = describeHttpError(error)
      this.logger.error(
        { event: 'feed_fetch_failed', url: this.options.url, ...details },
        'Event feed request failed'
      )
      throw new FeedError(`Event feed request failed: ${details.message}`, { cause: error })
    }

    const envelope = FeedResponseSchema.safeParse(body)
    if (!envelope.success) {
      this.logger.error(
        { event: 'feed_validation_error', validationErrors: envelope.error.errors },
        'Event feed payload failed validation'
      )
      throw new FeedError('Event feed payload failed validation', { cause: envelope.error })
    }

    const records: EventRecord[] = []
    for (const [index, raw] of envelope.data.events.entries()) {
      const item = FeedItemSchema.safeParse(raw)
      if (!item.success) {
        this.logger.warn(
          { event: 'feed_item_rejected', index, validationErrors: item.error.errors },
          'Skipping malformed feed item'
        )
        continue
      }

      const record = this.toRecord(item.data)
      if (record === null) {
        this.logger.warn(
          { event: 'feed_item_rejected', index, externalId: item.data.externalId },
          'Skipping feed item without a start time'
        )
        continue
      }
      records.push(record)
    }

    this.logger.info(
      {
        event: 'feed_fetch_success',
        received: envelope.data.events.length,
        accepted: records.length,
        duration: Date.now() - startedAt,
      },
      'Event feed fetched'
    )

    return records
  }

  private toRecord(item: FeedItem): EventRecord | null {
    const startTime =
      item.startTime ??
      (item.startEpochMs === undefined
        ? undefined
        : toVenueLocal(new Date(item.startEpochMs), this.options.venueTimeZone))

    if (startTime === undefined) {
      return null
    }

    return {
      externalId: item.externalId,
      name: item.name,
      groupName: item.groupName,
      startTime,
      detailUrl: item.detailUrl,
      surface: item.surface ?? null,
      distanceMeters: parseDistanceMeters(item.distance),
    }
  }
}
