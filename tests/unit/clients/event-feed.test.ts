import { AxiosError, AxiosHeaders, type AxiosInstance, type AxiosRequestConfig } from 'axios'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { Mock } from 'vitest'
import { HttpEventFeed, parseDistanceMeters } from '../../../src/clients/event-feed.js'
import { FeedError } from '../../../src/shared/errors.js'
import { createMockLogger } from '../../helpers/fakes.js'

const FEED_URL = 'https://feed.test/today'

type MockAxiosGet = Mock<(url: string, config?: AxiosRequestConfig) => Promise<{ data: unknown }>>

const feedItem = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  externalId: 'ext-1',
  name: 'Prix Test',
  groupName: 'R1 Test Meeting',
  startTime: '2026-06-01T14:00:00',
  detailUrl: 'https://feed.test/events/ext-1',
  surface: 'turf',
  distance: '2100m',
  ...overrides,
})

describe('parseDistanceMeters', () => {
  it('strips the metre suffix from text distances', () => {
    expect(parseDistanceMeters('2100m')).toBe(2100)
    expect(parseDistanceMeters('1600 M')).toBe(1600)
  })

  it('keeps positive integer distances', () => {
    expect(parseDistanceMeters(2400)).toBe(2400)
  })

  it('returns null for anything else', () => {
    expect(parseDistanceMeters('about a mile')).toBeNull()
    expect(parseDistanceMeters(0)).toBeNull()
    expect(parseDistanceMeters(12.5)).toBeNull()
    expect(parseDistanceMeters(null)).toBeNull()
    expect(parseDistanceMeters(undefined)).toBeNull()
  })
})

describe('HttpEventFeed', () => {
  const get: MockAxiosGet = vi.fn()
  const client = { get } as unknown as AxiosInstance
  let logger: ReturnType<typeof createMockLogger>
  let feed: HttpEventFeed

  beforeEach(() => {
    vi.clearAllMocks()
    logger = createMockLogger()
    feed = new HttpEventFeed(client, logger, { url: FEED_URL, venueTimeZone: 'Europe/Paris' })
  })

  it('maps feed items to event records', async () => {
    get.mockResolvedValueOnce({ data: { events: [feedItem()] } })

    const records = await feed.fetchToday()

    expect(get).toHaveBeenCalledWith(FEED_URL)
    expect(records).toEqual([
      {
        externalId: 'ext-1',
        name: 'Prix Test',
        groupName: 'R1 Test Meeting',
        startTime: '2026-06-01T14:00:00',
        detailUrl: 'https://feed.test/events/ext-1',
        surface: 'turf',
        distanceMeters: 2100,
      },
    ])
  })

  it('converts epoch start times to venue-local text', async () => {
    get.mockResolvedValueOnce({
      data: {
        events: [
          feedItem({
            externalId: 42,
            startTime: undefined,
            startEpochMs: Date.UTC(2026, 5, 1, 12, 30),
            distance: 1800,
            surface: null,
          }),
        ],
      },
    })

    const [record] = await feed.fetchToday()

    expect(record).toMatchObject({
      externalId: '42',
      startTime: '2026-06-01T14:30:00+02:00',
      surface: null,
      distanceMeters: 1800,
    })
  })

  it('skips malformed items and keeps the rest', async () => {
    get.mockResolvedValueOnce({
      data: {
        events: [
          feedItem({ detailUrl: 'not a url' }),
          feedItem({ externalId: 'ext-2', startTime: undefined }),
          feedItem({ externalId: 'ext-3' }),
        ],
      },
    })

    const records = await feed.fetchToday()

    expect(records.map((record) => record.externalId)).toEqual(['ext-3'])
    expect(logger.warn).toHaveBeenCalledTimes(2)
    expect(logger.warn).toHaveBeenCalledWith(
      { event: 'feed_item_rejected', index: 1, externalId: 'ext-2' },
      'Skipping feed item without a start time'
    )
  })

  it('throws FeedError when the envelope is malformed', async () => {
    get.mockResolvedValueOnce({ data: { races: [] } })

    await expect(feed.fetchToday()).rejects.toThrow(
      new FeedError('Event feed payload failed validation')
    )
  })

  it('throws FeedError with the request failure message', async () => {
    get.mockRejectedValueOnce(new Error('socket hang up'))

    await expect(feed.fetchToday()).rejects.toThrow('Event feed request failed: socket hang up')
    expect(logger.error).toHaveBeenCalledWith(
      { event: 'feed_fetch_failed', url: FEED_URL, message: 'socket hang up' },
      'Event feed request failed'
    )
  })

  it('logs the status code of HTTP failures', async () => {
    const config = { headers: new AxiosHeaders() }
    get.mockRejectedValueOnce(
      new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', config, null, {
        data: { error: 'maintenance' },
        status: 503,
        statusText: 'Service Unavailable',
        headers: {},
        config,
      })
    )

    await expect(feed.fetchToday()).rejects.toBeInstanceOf(FeedError)
    expect(logger.error).toHaveBeenCalledWith(
      {
        event: 'feed_fetch_failed',
        url: FEED_URL,
        message: 'Request failed with status code 503',
        statusCode: 503,
        responseExcerpt: '{"error":"maintenance"}',
      },
      'Event feed request failed'
    )
  })
})
