import { describe, expect, it, vi } from 'vitest'
import type { ActionExecutor } from '../../../src/clients/action-executor.js'
import { createActionHandler } from '../../../src/events/action-handler.js'
import type { Trigger } from '../../../src/triggers/types.js'
import { createMockLogger } from '../../helpers/fakes.js'

const trigger = (payload: number | null): Trigger => ({
  id: 'action:7',
  instanceId: 'instance-1',
  purpose: 'per_event_action',
  fireAt: new Date('2026-06-01T11:50:00Z'),
  payload,
  misfireGraceSeconds: 60,
  cronExpression: null,
  createdAt: new Date('2026-06-01T08:00:00Z'),
})

describe('createActionHandler', () => {
  it('runs the executor for the event named by the payload', async () => {
    const execute = vi.fn<ActionExecutor['execute']>().mockResolvedValue(undefined)
    const handler = createActionHandler({ execute }, createMockLogger())

    await handler(trigger(7))

    expect(execute).toHaveBeenCalledWith(7)
  })

  it('warns and does nothing when the payload is empty', async () => {
    const execute = vi.fn<ActionExecutor['execute']>()
    const logger = createMockLogger()
    const handler = createActionHandler({ execute }, logger)

    await handler(trigger(null))

    expect(execute).not.toHaveBeenCalled()
    expect(logger.warn).toHaveBeenCalledWith(
      { event: 'action_trigger_without_event', triggerId: 'action:7' },
      'Per-event action trigger carries no event id'
    )
  })

  it('propagates executor failures', async () => {
    const execute = vi.fn<ActionExecutor['execute']>().mockRejectedValue(new Error('boom'))
    const handler = createActionHandler({ execute }, createMockLogger())

    await expect(handler(trigger(7))).rejects.toThrow('boom')
  })
})
