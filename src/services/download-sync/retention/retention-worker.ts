import type { FastifyBaseLogger } from 'fastify'
import type { CleanupResult } from '@root/types/download-sync.types.js'
import type { Clock } from '@root/types/scheduler.types.js'
import type { DatabaseService } from '@services/database.service.js'

export interface RetentionWorkerDeps {
  db: DatabaseService
  logger: FastifyBaseLogger
  clock: Clock
  retentionHours: number
}

const HOUR_MS = 60 * 60 * 1000

/**
 * Evicts completed and failed downloads once they are older than the
 * retention window. Queued and downloading records are never touched.
 */
export class RetentionWorker {
  constructor(private readonly deps: RetentionWorkerDeps) {}

  cutoff(): Date {
    return new Date(
      this.deps.clock.now().getTime() - this.deps.retentionHours * HOUR_MS,
    )
  }

  async runCleanup(): Promise<CleanupResult> {
    const { db, logger, clock, retentionHours } = this.deps
    const now = clock.now()
    const cutoff = this.cutoff()

    const result = await db.deleteExpiredDownloads(cutoff, now)

    if (result.removed > 0) {
      logger.info(
        {
          removed: result.removed,
          kept: result.kept,
          retentionHours,
          items: result.removedItems,
        },
        `Removed ${result.removed} download(s) older than ${retentionHours}h`,
      )
    } else {
      logger.debug({ kept: result.kept }, 'No expired downloads to remove')
    }

    return result
  }
}
