/**
 * Download Sync Service
 *
 * Runs the fetch → plan → apply cycle against SABnzbd and hands records that
 * still need metadata to the media matcher. Also the entry point for priority
 * changes, forced rematches and the retention sweep.
 *
 * Only one cycle runs at a time; a call made while a cycle is in flight
 * returns `{ status: 'skipped' }` instead of queueing.
 */
import type { FastifyBaseLogger } from 'fastify'
import type {
  CleanupResult,
  EnrichmentOutcome,
  PriorityUpdateResult,
  SyncResult,
} from '@root/types/download-sync.types.js'
import { DownloadClientError } from '@root/types/errors.js'
import type { DownloadSnapshot } from '@root/types/sabnzbd.types.js'
import { systemClock, type Clock } from '@root/types/scheduler.types.js'
import type { ArrManagerService } from '@services/arr-manager.service.js'
import type { DatabaseService } from '@services/database.service.js'
import { MediaMatcher } from '@services/download-sync/media-matching/index.js'
import { updatePriority } from '@services/download-sync/priority/priority-updater.js'
import {
  buildReconciliationPlan,
  isEmptyPlan,
} from '@services/download-sync/reconciliation/index.js'
import { RetentionWorker } from '@services/download-sync/retention/retention-worker.js'
import type { SabnzbdService } from '@services/sabnzbd.service.js'

export interface DownloadSyncConfig {
  missingCycleThreshold: number
  retentionHours: number
  maxConcurrentLookups: number
  matchThreshold: number
}

export interface DownloadSyncDeps {
  db: DatabaseService
  sabnzbd: SabnzbdService
  arrManager: ArrManagerService
  logger: FastifyBaseLogger
  config: DownloadSyncConfig
  clock?: Clock
}

export class DownloadSyncService {
  private readonly log: FastifyBaseLogger
  private readonly clock: Clock
  private readonly matcher: MediaMatcher
  private readonly retention: RetentionWorker
  private isSyncing = false
  private enrichment: Promise<EnrichmentOutcome[]> | null = null

  constructor(private readonly deps: DownloadSyncDeps) {
    this.log = deps.logger
    this.clock = deps.clock ?? systemClock
    this.matcher = new MediaMatcher({
      db: deps.db,
      arrManager: deps.arrManager,
      logger: deps.logger,
      config: deps.config,
      clock: this.clock,
    })
    this.retention = new RetentionWorker({
      db: deps.db,
      logger: deps.logger,
      clock: this.clock,
      retentionHours: deps.config.retentionHours,
    })
  }

  get syncing(): boolean {
    return this.isSyncing
  }

  /**
   * Runs one reconciliation cycle.
   *
   * A SABnzbd failure aborts the cycle before anything is written. A store
   * failure is rethrown so the scheduler records the run as failed.
   */
  async syncDownloads(): Promise<SyncResult> {
    if (this.isSyncing) {
      this.log.debug('Download sync already in progress, skipping')
      return { status: 'skipped' }
    }

    this.isSyncing = true
    const startedAt = this.clock.now()

    try {
      let snapshot: DownloadSnapshot
      try {
        snapshot = await this.deps.sabnzbd.fetchSnapshot()
      } catch (error) {
        if (error instanceof DownloadClientError || error instanceof TypeError) {
          this.log.warn(
            { error: error.message },
            'Download sync aborted: SABnzbd unavailable',
          )
          return { status: 'aborted', error: error.message }
        }
        throw error
      }

      const records = await this.deps.db.getAllDownloads()
      const now = this.clock.now()
      const plan = buildReconciliationPlan(
        snapshot,
        records,
        {
          now,
          missingCycleThreshold: this.deps.config.missingCycleThreshold,
          retentionHours: this.deps.config.retentionHours,
        },
        this.log,
      )

      const applied = isEmptyPlan(plan)
        ? { inserted: 0, updated: 0, deleted: 0 }
        : await this.deps.db.applyReconciliationPlan(plan, now)

      const durationMs = this.clock.now().getTime() - startedAt.getTime()
      if (applied.inserted + applied.updated + applied.deleted > 0) {
        this.log.info(
          { ...applied, queue: snapshot.queue.length, history: snapshot.history.length },
          'Download sync complete',
        )
      } else {
        this.log.debug('Download sync complete, no changes')
      }

      void this.scheduleEnrichment()

      return {
        status: 'completed',
        ...applied,
        queueCount: snapshot.queue.length,
        historyCount: snapshot.history.length,
        durationMs,
      }
    } finally {
      this.isSyncing = false
    }
  }

  /**
   * Enriches every record whose match has not been attempted yet
   */
  async enrichPending(): Promise<EnrichmentOutcome[]> {
    if (this.matcher.stopped) {
      return []
    }
    const pending = await this.deps.db.getDownloadsPendingMatch()
    const fresh = pending.filter((r) => !this.matcher.inFlightIds.has(r.id))
    if (fresh.length === 0) {
      return []
    }
    return this.matcher.enrichAll(fresh)
  }

  /**
   * Starts a background enrichment pass. Resolves with the outcomes of the
   * most recently started pass.
   */
  scheduleEnrichment(): Promise<EnrichmentOutcome[]> {
    const run = this.enrichPending().catch((error: unknown) => {
      this.log.error({ error }, 'Media enrichment pass failed')
      return []
    })
    this.enrichment = run
    void run.finally(() => {
      if (this.enrichment === run) {
        this.enrichment = null
      }
    })
    return run
  }

  /**
   * Resolves once the latest background enrichment pass has settled
   */
  async waitForEnrichment(): Promise<void> {
    while (this.enrichment) {
      await this.enrichment
    }
  }

  async updatePriority(
    id: number,
    priority: string,
  ): Promise<PriorityUpdateResult> {
    return updatePriority(id, priority, {
      db: this.deps.db,
      sabnzbd: this.deps.sabnzbd,
      logger: this.log,
      clock: this.clock,
    })
  }

  /**
   * Clears every match flag, drops cached libraries and starts a new
   * enrichment pass
   *
   * @returns Number of records reset
   */
  async resetPosterFlags(): Promise<number> {
    const count = await this.deps.db.resetPosterFlags(this.clock.now())
    this.deps.arrManager.invalidateCaches()
    void this.scheduleEnrichment()
    return count
  }

  async runCleanup(): Promise<CleanupResult> {
    return this.retention.runCleanup()
  }

  /**
   * Aborts in-flight lookups and waits for the matcher to drain
   */
  async stop(): Promise<void> {
    this.matcher.stop()
    await this.waitForEnrichment()
  }
}
