import { z } from 'zod'

/**
 * Raw SABnzbd API payloads. Only the fields the tracker reads are declared;
 * numeric fields arrive as strings from most SABnzbd versions.
 */
const numericString = z.union([z.string(), z.number()]).optional()

export const SabnzbdQueueSlotSchema = z
  .object({
    nzo_id: z.string(),
    filename: z.string().default(''),
    status: z.string().default(''),
    percentage: numericString,
    mb: numericString,
    mbleft: numericString,
    timeleft: z.string().optional(),
    cat: z.string().nullable().optional(),
    priority: z.union([z.string(), z.number()]).nullable().optional(),
  })
  .passthrough()

export const SabnzbdQueueResponseSchema = z.object({
  queue: z
    .object({
      paused: z.boolean().optional(),
      kbpersec: numericString,
      speed: z.string().optional(),
      slots: z.array(SabnzbdQueueSlotSchema).default([]),
    })
    .passthrough(),
})

export const SabnzbdHistorySlotSchema = z
  .object({
    nzo_id: z.string(),
    name: z.string().default(''),
    status: z.string().default(''),
    fail_message: z.string().nullable().optional(),
    bytes: numericString,
    category: z.string().nullable().optional(),
    completed: numericString,
  })
  .passthrough()

export const SabnzbdHistoryResponseSchema = z.object({
  history: z
    .object({
      slots: z.array(SabnzbdHistorySlotSchema).default([]),
    })
    .passthrough(),
})

export type SabnzbdQueueSlot = z.infer<typeof SabnzbdQueueSlotSchema>
export type SabnzbdQueueResponse = z.infer<typeof SabnzbdQueueResponseSchema>
export type SabnzbdHistorySlot = z.infer<typeof SabnzbdHistorySlotSchema>
export type SabnzbdHistoryResponse = z.infer<
  typeof SabnzbdHistoryResponseSchema
>

export interface SabnzbdConfiguration {
  url: string
  apiKey: string
  historyLimit: number
  requestTimeoutMs: number
}

/**
 * A queue slot after parsing. `rawPriority` is kept as reported; the
 * reconciliation engine normalizes it.
 */
export interface QueueItem {
  externalId: string
  name: string
  /** 1-based position in the queue */
  position: number
  paused: boolean
  detailedStatus: string
  progress: number
  /** MB/s, only non-zero for the active slot */
  speed: number
  sizeTotal: number
  sizeLeft: number
  timeLeft: string | null
  category: string | null
  rawPriority: string | number | null
}

export type HistoryOutcome = 'completed' | 'failed' | 'processing'

export interface HistoryItem {
  externalId: string
  name: string
  outcome: HistoryOutcome
  detailedStatus: string
  sizeTotal: number
  category: string | null
  failureReason: string | null
  /** ISO timestamp from the slot's `completed` epoch, if present */
  completedAt: string | null
}

export interface DownloadSnapshot {
  queue: QueueItem[]
  history: HistoryItem[]
}

/**
 * Shape SABnzbd uses to report a rejected call, with HTTP 200
 */
export const SabnzbdErrorResponseSchema = z
  .object({
    status: z.boolean().optional(),
    error: z.string().nullable().optional(),
  })
  .passthrough()

export const SabnzbdVersionResponseSchema = z.object({
  version: z.string(),
})
