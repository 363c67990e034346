import { z } from 'zod'

export const DownloadStatsSchema = z.object({
  queued: z.number(),
  downloading: z.number(),
  completed: z.number(),
  failed: z.number(),
  total: z.number(),
  /** MB/s across downloading records */
  totalSpeed: z.number(),
})

export type DownloadStatsResponse = z.infer<typeof DownloadStatsSchema>
