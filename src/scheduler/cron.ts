import { CronExpressionParser } from 'cron-parser'

/**
 * Next occurrence of `expression` strictly after `after`, evaluated in `timeZone`.
 */
export const nextCronOccurrence = (
  expression: string,
  after: Date,
  timeZone = 'UTC'
): Date => {
  const interval = CronExpressionParser.parse(expression, {
    currentDate: after,
    tz: timeZone,
  })
  return interval.next().toDate()
}
