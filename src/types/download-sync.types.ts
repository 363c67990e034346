import type {
  DownloadRecord,
  DownloadStateChanges,
  NewDownload,
  TerminalStatus,
} from '@root/types/download.types.js'

export interface PlannedUpdate {
  id: number
  externalId: string
  changes: DownloadStateChanges
}

export interface PlannedDeletion {
  id: number
  externalId: string
  reason: 'cancelled'
}

/**
 * Mutations produced by one reconciliation pass. An unchanged snapshot
 * produces an empty plan.
 */
export interface ReconciliationPlan {
  inserts: NewDownload[]
  updates: PlannedUpdate[]
  deletions: PlannedDeletion[]
}

export interface ReconciliationOptions {
  /** Consecutive absent cycles before a terminal transition is inferred */
  missingCycleThreshold: number
  /** History entries that completed before `now` minus this window are not inserted */
  retentionHours: number
  now: Date
}

export interface AppliedReconciliation {
  inserted: number
  updated: number
  deleted: number
}

export type SyncResult =
  | ({
      status: 'completed'
      queueCount: number
      historyCount: number
      durationMs: number
    } & AppliedReconciliation)
  | { status: 'skipped' }
  | { status: 'aborted'; error: string }

export interface RemovedDownloadSummary {
  name: string
  status: TerminalStatus
  ageHours: number
}

export interface CleanupResult {
  removed: number
  kept: number
  removedItems: RemovedDownloadSummary[]
}

export type PriorityRejectionReason =
  | 'invalid_priority'
  | 'not_found'
  | 'invalid_state'
  | 'controller_error'

export type PriorityUpdateResult =
  | { success: true; download: DownloadRecord }
  | { success: false; reason: PriorityRejectionReason; message: string }

export type EnrichmentOutcome =
  | { status: 'matched'; id: number; mediaTitle: string; score: number }
  | { status: 'unmatched'; id: number; reason: string }
  | { status: 'skipped'; id: number; reason: 'in_flight' | 'already_attempted' }
  | { status: 'aborted'; id: number }
