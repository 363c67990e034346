import { z } from 'zod'

export const ResetPosterFlagsResponseSchema = z.object({
  success: z.boolean(),
  count: z.number(),
  message: z.string(),
})

export const SyncResponseSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('completed'),
    inserted: z.number(),
    updated: z.number(),
    deleted: z.number(),
    queueCount: z.number(),
    historyCount: z.number(),
    durationMs: z.number(),
  }),
  z.object({ status: z.literal('skipped') }),
  z.object({ status: z.literal('aborted'), error: z.string() }),
])

export const CleanupResponseSchema = z.object({
  removed: z.number(),
  kept: z.number(),
  removedItems: z.array(
    z.object({
      name: z.string(),
      status: z.enum(['completed', 'failed']),
      ageHours: z.number(),
    }),
  ),
})
