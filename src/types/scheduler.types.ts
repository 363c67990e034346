/**
 * Type for job run status information
 */
export interface JobRunInfo {
  time: string
  status: 'completed' | 'failed' | 'skipped' | 'pending'
  error?: string
  durationMs?: number
  estimated?: boolean
}

/**
 * Type for configuration of interval jobs
 */
export interface IntervalConfig {
  days?: number
  hours?: number
  minutes?: number
  seconds?: number
  runImmediately?: boolean
}

export interface JobStatus {
  name: string
  config: IntervalConfig
  enabled: boolean
  running: boolean
  last_run: JobRunInfo | null
  next_run: JobRunInfo | null
}

/**
 * Time source shared by the scheduler and the sync services,
 * swapped for a fixed clock in tests
 */
export interface Clock {
  now(): Date
}

export const systemClock: Clock = {
  now: () => new Date(),
}
