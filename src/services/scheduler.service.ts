/**
 * Scheduler Service
 *
 * Interval job scheduling on top of toad-scheduler. Every job runs with
 * `preventOverrun`, so a tick that lands while the previous run is still
 * going is dropped rather than queued.
 *
 * Responsible for:
 * - Registering interval jobs and their handlers
 * - Recording the last and next run of each job
 * - Running a job on demand
 * - Stopping every job on shutdown
 *
 * Run bookkeeping reads time from the injected Clock; the timers themselves
 * are toad-scheduler's, which tests drive with fake timers.
 *
 * @example
 * const scheduler = new SchedulerService(log)
 * scheduler.scheduleJob('download-sync', { seconds: 5, runImmediately: true }, async () => {
 *   const result = await downloadSync.syncDownloads()
 *   return result.status === 'skipped' ? 'skipped' : undefined
 * })
 */
import type { FastifyBaseLogger } from 'fastify'
import { AsyncTask, SimpleIntervalJob, ToadScheduler } from 'toad-scheduler'
import {
  systemClock,
  type Clock,
  type IntervalConfig,
  type JobRunInfo,
  type JobStatus,
} from '@root/types/scheduler.types.js'

/**
 * Handler function type for scheduled jobs. Returning `'skipped'` records the
 * run as skipped instead of completed.
 */
export type JobHandler = (jobName: string) => Promise<'skipped' | undefined | void>

interface RegisteredJob {
  config: IntervalConfig
  handler: JobHandler
  job: SimpleIntervalJob | null
  running: boolean
  lastRun: JobRunInfo | null
  nextRun: JobRunInfo | null
}

function intervalMs(config: IntervalConfig): number {
  return (
    (config.days ?? 0) * 86_400_000 +
    (config.hours ?? 0) * 3_600_000 +
    (config.minutes ?? 0) * 60_000 +
    (config.seconds ?? 0) * 1_000
  )
}

export class SchedulerService {
  /** The scheduler instance */
  private readonly scheduler = new ToadScheduler()

  /** Map of job names to their job instances and run bookkeeping */
  private readonly jobs = new Map<string, RegisteredJob>()

  /**
   * Creates a new SchedulerService instance
   *
   * @param log - Fastify logger for recording operations
   * @param clock - Time source for run bookkeeping
   */
  constructor(
    private readonly log: FastifyBaseLogger,
    private readonly clock: Clock = systemClock,
  ) {
    this.log.info('Scheduler service initialized')
  }

  /**
   * Runs the handler once and records the outcome
   *
   * @returns true when the handler completed without throwing
   */
  private async execute(name: string, entry: RegisteredJob): Promise<boolean> {
    const startedAt = this.clock.now()
    entry.running = true

    try {
      this.log.debug(`Running scheduled job: ${name}`)
      const outcome = await entry.handler(name)

      entry.lastRun = {
        time: startedAt.toISOString(),
        status: outcome === 'skipped' ? 'skipped' : 'completed',
        durationMs: this.clock.now().getTime() - startedAt.getTime(),
      }
      this.log.debug(`Job ${name} ${entry.lastRun.status}`)
      return true
    } catch (error) {
      this.log.error({ error }, `Error in job ${name}`)
      entry.lastRun = {
        time: startedAt.toISOString(),
        status: 'failed',
        error: error instanceof Error ? error.message : String(error),
        durationMs: this.clock.now().getTime() - startedAt.getTime(),
      }
      return false
    } finally {
      entry.running = false
      if (entry.job) {
        entry.nextRun = this.estimateNextRun(entry.config)
      }
    }
  }

  private estimateNextRun(config: IntervalConfig): JobRunInfo {
    return {
      time: new Date(
        this.clock.now().getTime() + intervalMs(config),
      ).toISOString(),
      status: 'pending',
      estimated: true,
    }
  }

  /**
   * Creates an interval job wrapping the handler
   *
   * @param name - Unique name for the job
   * @param entry - Registration holding the handler and its config
   * @returns The created job instance
   */
  private createJob(name: string, entry: RegisteredJob): SimpleIntervalJob {
    const task = new AsyncTask(
      `${name}-task`,
      async () => {
        await this.execute(name, entry)
      },
      (error) => {
        this.log.error({ error }, `Job task error for ${name}`)
      },
    )

    return new SimpleIntervalJob(
      {
        ...entry.config,
        runImmediately: entry.config.runImmediately ?? false,
      },
      task,
      {
        id: name,
        preventOverrun: true,
      },
    )
  }

  /**
   * Register a job handler and start its interval
   *
   * @param name - Unique name for the job
   * @param config - Interval at which the job runs
   * @param handler - Function to execute when the job runs
   * @returns true if the job was scheduled
   */
  scheduleJob(name: string, config: IntervalConfig, handler: JobHandler): boolean {
    if (intervalMs(config) <= 0) {
      this.log.error({ config }, `Refusing to schedule job ${name} without an interval`)
      return false
    }

    const existing = this.jobs.get(name)
    if (existing?.job) {
      this.scheduler.removeById(name)
    }

    const entry: RegisteredJob = {
      config,
      handler,
      job: null,
      running: false,
      lastRun: existing?.lastRun ?? null,
      nextRun: null,
    }
    this.jobs.set(name, entry)

    entry.job = this.createJob(name, entry)
    entry.nextRun = config.runImmediately
      ? { time: this.clock.now().toISOString(), status: 'pending', estimated: true }
      : this.estimateNextRun(config)
    this.scheduler.addSimpleIntervalJob(entry.job)

    this.log.info(
      existing
        ? `Rescheduled job: ${name}`
        : `Job ${name} scheduled successfully`,
    )
    return true
  }

  /**
   * Remove a job from the scheduler
   *
   * @param name - Name of the job to remove
   * @returns true if the job existed
   */
  unscheduleJob(name: string): boolean {
    const entry = this.jobs.get(name)
    if (!entry) {
      return false
    }
    if (entry.job) {
      this.scheduler.removeById(name)
    }
    this.jobs.delete(name)
    this.log.info(`Job ${name} unscheduled successfully`)
    return true
  }

  /**
   * Run a job immediately, outside of its schedule
   *
   * @param name - Name of the job to run
   * @returns true if the job ran without throwing
   */
  async runJobNow(name: string): Promise<boolean> {
    const entry = this.jobs.get(name)
    if (!entry) {
      return false
    }

    this.log.info(`Manually running job: ${name}`)
    return this.execute(name, entry)
  }

  getJobStatus(name: string): JobStatus | null {
    const entry = this.jobs.get(name)
    if (!entry) {
      return null
    }
    return {
      name,
      config: entry.config,
      enabled: entry.job !== null,
      running: entry.running,
      last_run: entry.lastRun,
      next_run: entry.nextRun,
    }
  }

  /**
   * Get the current status of every registered job
   */
  getJobStatuses(): JobStatus[] {
    const statuses: JobStatus[] = []
    for (const name of this.jobs.keys()) {
      const status = this.getJobStatus(name)
      if (status) statuses.push(status)
    }
    return statuses
  }

  /**
   * Stop all jobs
   *
   * Should be called during application shutdown. Runs already in progress
   * finish on their own.
   */
  stopAll(): void {
    this.log.info('Stopping all scheduled jobs')
    this.scheduler.stop()
    for (const entry of this.jobs.values()) {
      entry.job = null
      entry.nextRun = null
    }
  }
}
