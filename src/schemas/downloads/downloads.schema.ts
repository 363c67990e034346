import { z } from 'zod'
import { PRIORITY_LABELS } from '@utils/priority.js'

export const DownloadStatusSchema = z.enum(['queued', 'downloading', 'completed', 'failed'])

export const PriorityLabelSchema = z.enum(['Force', 'High', 'Normal', 'Low'])

export const DownloadSchema = z.object({
  id: z.number(),
  externalId: z.string(),
  name: z.string(),
  status: DownloadStatusSchema,
  detailedStatus: z.string().nullable(),
  progress: z.number(),
  speed: z.number(),
  sizeTotal: z.number().nullable(),
  sizeLeft: z.number().nullable(),
  timeLeft: z.string().nullable(),
  queuePosition: z.number().nullable(),
  category: z.string().nullable(),
  priority: PriorityLabelSchema.nullable(),
  failureReason: z.string().nullable(),
  completedAt: z.string().nullable(),
  consecutiveMisses: z.number(),
  mediaTitle: z.string().nullable(),
  mediaType: z.enum(['movie', 'tv']).nullable(),
  year: z.number().nullable(),
  season: z.number().nullable(),
  episode: z.number().nullable(),
  posterUrl: z.string().nullable(),
  sourceInstance: z.string().nullable(),
  posterAttempted: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string(),
})

export const DownloadListSchema = z.array(DownloadSchema)

export const DownloadListQuerySchema = z.object({
  status: DownloadStatusSchema.optional(),
})

export const DownloadStatusParamsSchema = z.object({
  status: DownloadStatusSchema,
})

export const DownloadIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
})

export const PriorityUpdateBodySchema = z.object({
  priority: z
    .string()
    .min(1)
    .describe(`One of ${PRIORITY_LABELS.join(', ')} (case-insensitive)`),
})

export const PriorityUpdateResponseSchema = z.object({
  success: z.literal(true),
  download: DownloadSchema,
})

export type Download = z.infer<typeof DownloadSchema>
export type PriorityUpdateBody = z.infer<typeof PriorityUpdateBodySchema>
