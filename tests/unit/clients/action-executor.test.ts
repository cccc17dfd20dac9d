import type { AxiosInstance, AxiosRequestConfig } from 'axios'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { Mock } from 'vitest'
import { HttpActionExecutor } from '../../../src/clients/action-executor.js'
import { createMockLogger, eventRecord, InMemoryEventStore } from '../../helpers/fakes.js'

const ACTION_URL = 'https://actions.test/run'

type MockAxiosPost = Mock<
  (url: string, data?: unknown, config?: AxiosRequestConfig) => Promise<{ data: unknown; status: number }>
>

describe('HttpActionExecutor', () => {
  const post: MockAxiosPost = vi.fn()
  const client = { post } as unknown as AxiosInstance
  let store: InMemoryEventStore
  let logger: ReturnType<typeof createMockLogger>
  let executor: HttpActionExecutor

  beforeEach(async () => {
    vi.clearAllMocks()
    store = new InMemoryEventStore()
    logger = createMockLogger()
    executor = new HttpActionExecutor(client, store, logger, { url: ACTION_URL })
    await store.upsertMany([eventRecord()], new Date('2026-06-01T08:00:00Z'))
  })

  it('posts the event and stores the response as its detail', async () => {
    post.mockResolvedValueOnce({ data: { runners: 12 }, status: 200 })

    await executor.execute(1)

    expect(post).toHaveBeenCalledWith(ACTION_URL, {
      eventId: 1,
      externalId: 'ext-1',
      name: 'Prix Test',
      groupName: 'R1 Test Meeting',
      startTime: '2026-06-01T14:00:00+02:00',
      detailUrl: 'https://feed.test/events/ext-1',
    })
    expect(store.details.get(1)).toEqual([{ runners: 12 }])
  })

  it('skips events that no longer exist', async () => {
    await executor.execute(99)

    expect(post).not.toHaveBeenCalled()
    expect(logger.warn).toHaveBeenCalledWith(
      { event: 'action_event_missing', eventId: 99 },
      'Event no longer exists; skipping action'
    )
  })

  it('rethrows request failures without saving a detail', async () => {
    post.mockRejectedValueOnce(new Error('connect ECONNREFUSED'))

    await expect(executor.execute(1)).rejects.toThrow('connect ECONNREFUSED')
    expect(store.details.has(1)).toBe(false)
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'action_failed', eventId: 1, message: 'connect ECONNREFUSED' }),
      'Event action failed'
    )
  })
})
