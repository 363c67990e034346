import { z } from 'zod'

export const HealthCheckResponseSchema = z.object({
  status: z.enum(['healthy', 'degraded', 'unhealthy']),
  timestamp: z.string().datetime(),
  checks: z.object({
    database: z.enum(['ok', 'failed']),
    sabnzbd: z.enum(['ok', 'failed']),
  }),
  error: z.string().optional(),
})

export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>
