import { z } from 'zod'

export const JobRunInfoSchema = z.object({
  time: z.string(),
  status: z.enum(['completed', 'failed', 'skipped', 'pending']),
  error: z.string().optional(),
  durationMs: z.number().optional(),
  estimated: z.boolean().optional(),
})

export const IntervalConfigSchema = z.object({
  days: z.number().optional(),
  hours: z.number().optional(),
  minutes: z.number().optional(),
  seconds: z.number().optional(),
  runImmediately: z.boolean().optional(),
})

export const JobStatusSchema = z.object({
  name: z.string(),
  config: IntervalConfigSchema,
  enabled: z.boolean(),
  running: z.boolean(),
  last_run: JobRunInfoSchema.nullable(),
  next_run: JobRunInfoSchema.nullable(),
})

export const JobStatusListSchema = z.array(JobStatusSchema)

export type JobStatusResponse = z.infer<typeof JobStatusSchema>
