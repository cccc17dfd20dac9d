import { Router, type NextFunction, type Request, type Response } from 'express'
import { z } from 'zod'
import type { AdminService } from '../../admin/admin-service.js'

const RunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(20),
})

const EventParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
})

export const createAdminRouter = (admin: AdminService): Router => {
  const router = Router()

  router.post('/refresh', (_req: Request, res: Response): void => {
    admin.triggerRefreshNow()
    res.status(202).json({ status: 'accepted', operation: 'refresh' })
  })

  router.post('/reschedule', (_req: Request, res: Response): void => {
    admin.requestReschedule()
    res.status(202).json({ status: 'accepted', operation: 'reschedule' })
  })

  router.get(
    '/triggers',
    async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        res.json(await admin.listTriggers())
      } catch (error) {
        next(error)
      }
    }
  )

  router.get(
    '/runs',
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      const query = RunsQuerySchema.safeParse(req.query)
      if (!query.success) {
        res.status(400).json({
          error: 'Invalid query parameters',
          details: query.error.errors.map((issue) => issue.message),
        })
        return
      }

      try {
        res.json(await admin.listRuns(query.data.limit))
      } catch (error) {
        next(error)
      }
    }
  )

  router.get(
    '/events',
    async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        res.json(await admin.listEvents())
      } catch (error) {
        next(error)
      }
    }
  )

  router.post(
    '/events/:id/action',
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      const params = EventParamsSchema.safeParse(req.params)
      if (!params.success) {
        res.status(400).json({ error: 'Invalid event id' })
        return
      }

      try {
        const started = await admin.triggerEventAction(params.data.id)
        if (!started) {
          res.status(404).json({ error: 'Event not found' })
          return
        }
        res.status(202).json({ status: 'accepted', operation: 'action', eventId: params.data.id })
      } catch (error) {
        next(error)
      }
    }
  )

  router.get(
    '/events/:id/detail',
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      const params = EventParamsSchema.safeParse(req.params)
      if (!params.success) {
        res.status(400).json({ error: 'Invalid event id' })
        return
      }

      try {
        const lookup = await admin.getEventDetail(params.data.id)
        switch (lookup.status) {
          case 'event_not_found':
            res.status(404).json({ error: 'Event not found' })
            return
          case 'detail_pending':
            res.status(404).json({ error: 'Event detail not yet available' })
            return
          case 'found':
            res.json({
              event: lookup.event,
              detail: lookup.detail.payload,
              detailCreatedAt: lookup.detail.createdAt.toISOString(),
            })
        }
      } catch (error) {
        next(error)
      }
    }
  )

  return router
}
