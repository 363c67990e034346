/**
 * Reconciliation Plan Builder
 *
 * Compares one SABnzbd snapshot with the persisted records and computes the
 * inserts, updates and deletions that bring the store in line. Nothing here
 * touches the database; the plan is applied in a single transaction by
 * `DatabaseService.applyReconciliationPlan`.
 */

import type { FastifyBaseLogger } from 'fastify'
import {
  isTerminalStatus,
  type DownloadRecord,
  type DownloadState,
  type DownloadStateChanges,
  type NewDownload,
} from '@root/types/download.types.js'
import type {
  ReconciliationOptions,
  ReconciliationPlan,
} from '@root/types/download-sync.types.js'
import type {
  DownloadSnapshot,
  HistoryItem,
  QueueItem,
} from '@root/types/sabnzbd.types.js'
import {
  MISSING_WITHOUT_HISTORY_REASON,
  historyItemToState,
  queueItemToState,
} from './status-mapper.js'

type SnapshotEntry =
  | { source: 'queue'; item: QueueItem }
  | { source: 'history'; item: HistoryItem }

type DesiredState = Omit<DownloadState, 'priority'> & {
  priority?: DownloadState['priority']
}

const DIFF_FIELDS = [
  'name',
  'status',
  'detailedStatus',
  'progress',
  'speed',
  'sizeTotal',
  'sizeLeft',
  'timeLeft',
  'queuePosition',
  'category',
  'priority',
  'failureReason',
  'completedAt',
  'consecutiveMisses',
] as const satisfies ReadonlyArray<keyof DownloadState>

const HOUR_MS = 60 * 60 * 1000

/**
 * Indexes the snapshot by external id. A queue entry wins over a history
 * entry with the same id.
 */
export function indexSnapshot(
  snapshot: DownloadSnapshot,
): Map<string, SnapshotEntry> {
  const entries = new Map<string, SnapshotEntry>()
  for (const item of snapshot.history) {
    entries.set(item.externalId, { source: 'history', item })
  }
  for (const item of snapshot.queue) {
    entries.set(item.externalId, { source: 'queue', item })
  }
  return entries
}

function desiredState(
  entry: SnapshotEntry,
  now: Date,
  log?: FastifyBaseLogger,
): DesiredState {
  return entry.source === 'queue'
    ? queueItemToState(entry.item, log)
    : historyItemToState(entry.item, now)
}

/**
 * Fields of `desired` that differ from `record`. Keys absent from
 * `desired` are left alone.
 */
export function diffDownloadState(
  record: DownloadRecord,
  desired: DesiredState,
): DownloadStateChanges {
  const changes: DownloadStateChanges = {}
  for (const field of DIFF_FIELDS) {
    const value = desired[field]
    if (value !== undefined && value !== record[field]) {
      Object.assign(changes, { [field]: value })
    }
  }
  return changes
}

/**
 * True for a terminal state that retention would already remove, so an
 * evicted record still listed in history is not inserted again
 */
function isPastRetention(desired: DesiredState, cutoffMs: number): boolean {
  if (!isTerminalStatus(desired.status) || !desired.completedAt) {
    return false
  }
  return Date.parse(desired.completedAt) < cutoffMs
}

function toNewDownload(
  externalId: string,
  desired: DesiredState,
): NewDownload {
  return { ...desired, externalId, priority: desired.priority ?? null }
}

/**
 * Builds the plan for one sync cycle
 *
 * @param snapshot - Queue and history as fetched this cycle
 * @param records - Every persisted download record
 * @param options - Miss threshold, retention window and the cycle's reference time
 * @param log - Receives warnings for unknown priority codes
 */
export function buildReconciliationPlan(
  snapshot: DownloadSnapshot,
  records: DownloadRecord[],
  options: ReconciliationOptions,
  log?: FastifyBaseLogger,
): ReconciliationPlan {
  const { now, missingCycleThreshold, retentionHours } = options
  const retentionCutoff = now.getTime() - retentionHours * HOUR_MS
  const plan: ReconciliationPlan = { inserts: [], updates: [], deletions: [] }
  const entries = indexSnapshot(snapshot)
  const byExternalId = new Map(records.map((r) => [r.externalId, r]))

  for (const [externalId, entry] of entries) {
    const desired = desiredState(entry, now, log)
    const record = byExternalId.get(externalId)

    if (!record) {
      if (isPastRetention(desired, retentionCutoff)) {
        continue
      }
      plan.inserts.push(toNewDownload(externalId, desired))
      continue
    }

    if (isTerminalStatus(record.status)) {
      continue
    }

    // The active item is never sent back to queued; its other fields still move
    if (record.status === 'downloading' && desired.status === 'queued') {
      desired.status = 'downloading'
    }

    const changes = diffDownloadState(record, desired)
    if (Object.keys(changes).length > 0) {
      plan.updates.push({ id: record.id, externalId, changes })
    }
  }

  for (const record of records) {
    if (isTerminalStatus(record.status) || entries.has(record.externalId)) {
      continue
    }

    const misses = record.consecutiveMisses + 1
    if (misses < missingCycleThreshold) {
      plan.updates.push({
        id: record.id,
        externalId: record.externalId,
        changes: { consecutiveMisses: misses },
      })
      continue
    }

    if (record.status === 'queued') {
      plan.deletions.push({
        id: record.id,
        externalId: record.externalId,
        reason: 'cancelled',
      })
    } else {
      plan.updates.push({
        id: record.id,
        externalId: record.externalId,
        changes: {
          status: 'failed',
          failureReason: MISSING_WITHOUT_HISTORY_REASON,
          completedAt: now.toISOString(),
          speed: 0,
          timeLeft: null,
          queuePosition: null,
          consecutiveMisses: misses,
        },
      })
    }
  }

  return plan
}

export function isEmptyPlan(plan: ReconciliationPlan): boolean {
  return (
    plan.inserts.length === 0 &&
    plan.updates.length === 0 &&
    plan.deletions.length === 0
  )
}
