import type {
  DownloadRecord,
  DownloadStats,
  DownloadStatus,
  MediaMatchChanges,
  PriorityLabel,
} from '@root/types/download.types.js'
import type {
  AppliedReconciliation,
  CleanupResult,
  ReconciliationPlan,
} from '@root/types/download-sync.types.js'

declare module '@services/database.service.js' {
  interface DatabaseService {
    // DOWNLOAD QUERIES
    /**
     * Retrieves every download record, queue order first
     */
    getAllDownloads(): Promise<DownloadRecord[]>

    /**
     * Retrieves download records with the given status
     */
    getDownloadsByStatus(status: DownloadStatus): Promise<DownloadRecord[]>

    /**
     * Retrieves a download record by its internal id
     * @returns The record, or null when no such record exists
     */
    getDownloadById(id: number): Promise<DownloadRecord | null>

    /**
     * Retrieves a download record by its SABnzbd nzo_id
     */
    getDownloadByExternalId(externalId: string): Promise<DownloadRecord | null>

    /**
     * Counts records per status plus the combined speed of active downloads
     */
    getDownloadStats(): Promise<DownloadStats>

    // RECONCILIATION
    /**
     * Applies every insert, update and delete of a plan in one transaction.
     * Either the whole plan lands or none of it does.
     * @param plan - Mutations computed by the reconciliation planner
     * @param now - Timestamp written to created_at/updated_at
     */
    applyReconciliationPlan(
      plan: ReconciliationPlan,
      now: Date,
    ): Promise<AppliedReconciliation>

    // MEDIA MATCHING
    /**
     * Retrieves records whose match has not been attempted,
     * downloading first, then completed, then queued
     */
    getDownloadsPendingMatch(limit?: number): Promise<DownloadRecord[]>

    /**
     * Atomically flips poster_attempted from false to true
     * @returns true when this caller won the claim
     */
    claimMatchAttempt(id: number): Promise<boolean>

    /**
     * Writes a match result. Missing records are ignored.
     * @returns true when a row was updated
     */
    updateMediaMatch(
      id: number,
      changes: MediaMatchChanges,
      now: Date,
    ): Promise<boolean>

    /**
     * Clears poster_attempted on every record so that matching runs again
     * @returns Number of records reset
     */
    resetPosterFlags(now: Date): Promise<number>

    // PRIORITY
    /**
     * Stores a confirmed priority label
     * @returns true when a row was updated
     */
    updateDownloadPriority(
      id: number,
      priority: PriorityLabel,
      now: Date,
    ): Promise<boolean>

    // RETENTION
    /**
     * Deletes completed/failed records whose completed_at is older than the cutoff.
     * Non-terminal records and terminal records without completed_at are kept.
     */
    deleteExpiredDownloads(cutoff: Date, now: Date): Promise<CleanupResult>
  }
}
