import type { Logger } from 'pino'
import type { ActionExecutor } from '../clients/action-executor.js'
import type { TriggerHandler } from '../scheduler/types.js'

export const createActionHandler =
  (executor: ActionExecutor, logger: Logger): TriggerHandler =>
  async (trigger) => {
    if (trigger.payload === null) {
      logger.warn(
        { event: 'action_trigger_without_event', triggerId: trigger.id },
        'Per-event action trigger carries no event id'
      )
      return
    }

    await executor.execute(trigger.payload)
  }
