import type { AxiosInstance } from 'axios'
import type { Logger } from 'pino'
import type { EventStore } from '../events/types.js'
import { describeHttpError } from './http.js'

export interface ActionExecutor {
  /** At-least-once: may run more than once for the same event. */
  execute: (eventId: number) => Promise<void>
}

export interface HttpActionExecutorOptions {
  url: string
}

/**
 * Forwards the event to the downstream action endpoint and keeps the response
 * body as the event's detail artifact. No retries: a failed call is logged and
 * rethrown to the fire pool.
 */
export class HttpActionExecutor implements ActionExecutor {
  constructor(
    private readonly client: AxiosInstance,
    private readonly store: EventStore,
    private readonly logger: Logger,
    private readonly options: HttpActionExecutorOptions
  ) {}

  async execute(eventId: number): Promise<void> {
    const event = await this.store.getById(eventId)

    // Wiped by a refresh after the trigger was claimed
    if (event === null) {
      this.logger.warn(
        { event: 'action_event_missing', eventId },
        'Event no longer exists; skipping action'
      )
      return
    }

    const startedAt = Date.now()
    try {
      const response = await this.client.post<unknown>(this.options.url, {
        eventId: event.id,
        externalId: event.externalId,
        name: event.name,
        groupName: event.groupName,
        startTime: event.startTime,
        detailUrl: event.detailUrl,
      })

      await this.store.saveDetail(event.id, response.data)

      this.logger.info(
        {
          event: 'action_executed',
          eventId,
          externalId: event.externalId,
          statusCode: response.status,
          duration: Date.now() - startedAt,
        },
        'Event action executed'
      )
    } catch (error) {
      this.logger.error(
        {
          event: 'action_failed',
          eventId,
          duration: Date.now() - startedAt,
          ...describeHttpError(error),
        },
        'Event action failed'
      )
      throw error
    }
  }
}
