import { z } from 'zod'

/**
 * A raw race record as delivered by the event feed. `startTime` is kept as
 * text: either ISO 8601 with an offset, or venue-local wall-clock time.
 */
export const EventRecordSchema = z.object({
  externalId: z.string().trim().min(1),
  name: z.string().trim().min(1),
  groupName: z.string().trim(),
  startTime: z.string().trim().min(1),
  detailUrl: z.string().url(),
  surface: z.string().trim().min(1).nullable().optional(),
  distanceMeters: z.number().int().positive().nullable().optional(),
})

export type EventRecord = z.infer<typeof EventRecordSchema>

export interface Event {
  id: number
  externalId: string
  name: string
  groupName: string
  /** As sourced; never rewritten by timezone conversion. */
  startTime: string
  detailUrl: string
  surface: string | null
  distanceMeters: number | null
  fetchedAt: Date
}

/** Latest payload the action executor stored for an event. */
export interface EventDetail {
  eventId: number
  payload: unknown
  createdAt: Date
}

export interface WipeResult {
  events: number
  details: number
}

export interface EventStore {
  /** Insert or update by `externalId`; returns the persisted rows in input order. */
  upsertMany: (records: EventRecord[], fetchedAt: Date) => Promise<Event[]>
  listAll: () => Promise<Event[]>
  getById: (id: number) => Promise<Event | null>
  /** Remove every event and its derived details. */
  deleteAll: () => Promise<WipeResult>
  saveDetail: (eventId: number, payload: unknown) => Promise<void>
  /** Most recently saved detail, or null before the first action ran. */
  getDetail: (eventId: number) => Promise<EventDetail | null>
}
