import {
  DOWNLOAD_STATUSES,
  TERMINAL_STATUSES,
  isTerminalStatus,
  type DownloadRecord,
  type DownloadStateChanges,
  type DownloadStats,
  type DownloadStatus,
  type MediaMatchChanges,
  type MediaType,
  type NewDownload,
  type PriorityLabel,
} from '@root/types/download.types.js'
import type {
  AppliedReconciliation,
  CleanupResult,
  ReconciliationPlan,
  RemovedDownloadSummary,
} from '@root/types/download-sync.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { isPriorityLabel, normalizePriorityLabel } from '@utils/priority.js'

const TABLE = 'downloads'

/** Order in which pending records are handed to the media matcher */
const MATCH_ORDER: Record<DownloadStatus, number> = {
  downloading: 0,
  completed: 1,
  queued: 2,
  failed: 3,
}

interface DownloadRow {
  id: number
  external_id: string
  name: string
  status: string
  detailed_status: string | null
  progress: number
  speed: number
  size_total: number | null
  size_left: number | null
  time_left: string | null
  queue_position: number | null
  category: string | null
  priority: string | null
  failure_reason: string | null
  completed_at: string | null
  consecutive_misses: number
  media_title: string | null
  media_type: string | null
  year: number | null
  season: number | null
  episode: number | null
  poster_url: string | null
  source_instance: string | null
  poster_attempted: number | boolean
  created_at: string
  updated_at: string
}

function toStatus(value: string): DownloadStatus {
  const status = DOWNLOAD_STATUSES.find((s) => s === value)
  if (!status) {
    throw new Error(`Invalid download status in store: ${value}`)
  }
  return status
}

function toMediaType(value: string | null): MediaType | null {
  return value === 'movie' || value === 'tv' ? value : null
}

function toPriority(value: string | null): PriorityLabel | null {
  return value !== null && isPriorityLabel(value)
    ? normalizePriorityLabel(value)
    : null
}

/**
 * Maps a database row to a DownloadRecord
 */
function mapRowToDownload(row: DownloadRow): DownloadRecord {
  return {
    id: row.id,
    externalId: row.external_id,
    name: row.name,
    status: toStatus(row.status),
    detailedStatus: row.detailed_status,
    progress: Number(row.progress),
    speed: Number(row.speed),
    sizeTotal: row.size_total,
    sizeLeft: row.size_left,
    timeLeft: row.time_left,
    queuePosition: row.queue_position,
    category: row.category,
    priority: toPriority(row.priority),
    failureReason: row.failure_reason,
    completedAt: row.completed_at,
    consecutiveMisses: row.consecutive_misses,
    mediaTitle: row.media_title,
    mediaType: toMediaType(row.media_type),
    year: row.year,
    season: row.season,
    episode: row.episode,
    posterUrl: row.poster_url,
    sourceInstance: row.source_instance,
    posterAttempted: Boolean(row.poster_attempted),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

/**
 * Maps reconciliation-owned fields to their columns. Keys that are absent
 * from the changes stay absent from the result.
 */
function stateChangesToRow(
  changes: DownloadStateChanges,
): Record<string, string | number | null> {
  const columns: Array<[keyof DownloadStateChanges, string]> = [
    ['name', 'name'],
    ['status', 'status'],
    ['detailedStatus', 'detailed_status'],
    ['progress', 'progress'],
    ['speed', 'speed'],
    ['sizeTotal', 'size_total'],
    ['sizeLeft', 'size_left'],
    ['timeLeft', 'time_left'],
    ['queuePosition', 'queue_position'],
    ['category', 'category'],
    ['priority', 'priority'],
    ['failureReason', 'failure_reason'],
    ['completedAt', 'completed_at'],
    ['consecutiveMisses', 'consecutive_misses'],
  ]

  const row: Record<string, string | number | null> = {}
  for (const [key, column] of columns) {
    const value = changes[key]
    if (value !== undefined) {
      row[column] = value
    }
  }
  return row
}

function newDownloadToRow(download: NewDownload, timestamp: string) {
  return {
    external_id: download.externalId,
    ...stateChangesToRow(download),
    poster_attempted: false,
    created_at: timestamp,
    updated_at: timestamp,
  }
}

/**
 * Retrieves every download record. Queued items come in queue order,
 * terminal items newest first.
 *
 * @returns Promise resolving to all download records
 */
export async function getAllDownloads(
  this: DatabaseService,
): Promise<DownloadRecord[]> {
  const rows = await this.knex(TABLE)
    .select('*')
    .orderByRaw('queue_position IS NULL')
    .orderBy('queue_position', 'asc')
    .orderBy('completed_at', 'desc')
    .orderBy('id', 'desc')

  return rows.map(mapRowToDownload)
}

/**
 * Retrieves download records with the given status
 *
 * @param status - Status to filter by
 * @returns Promise resolving to matching download records
 */
export async function getDownloadsByStatus(
  this: DatabaseService,
  status: DownloadStatus,
): Promise<DownloadRecord[]> {
  const rows = await this.knex(TABLE)
    .where('status', status)
    .orderByRaw('queue_position IS NULL')
    .orderBy('queue_position', 'asc')
    .orderBy('completed_at', 'desc')
    .orderBy('id', 'desc')

  return rows.map(mapRowToDownload)
}

export async function getDownloadById(
  this: DatabaseService,
  id: number,
): Promise<DownloadRecord | null> {
  const row = await this.knex(TABLE).where('id', id).first()
  return row ? mapRowToDownload(row) : null
}

export async function getDownloadByExternalId(
  this: DatabaseService,
  externalId: string,
): Promise<DownloadRecord | null> {
  const row = await this.knex(TABLE).where('external_id', externalId).first()
  return row ? mapRowToDownload(row) : null
}

/**
 * Counts download records per status and sums the speed of active downloads
 *
 * @returns Promise resolving to dashboard statistics
 */
export async function getDownloadStats(
  this: DatabaseService,
): Promise<DownloadStats> {
  const rows = await this.knex(TABLE)
    .select('status')
    .count('* as count')
    .groupBy('status')

  const speedRow = await this.knex(TABLE)
    .where('status', 'downloading')
    .sum('speed as total')
    .first()

  const stats: DownloadStats = {
    queued: 0,
    downloading: 0,
    completed: 0,
    failed: 0,
    total: 0,
    totalSpeed: 0,
  }

  for (const row of rows) {
    const count = Number(row.count)
    stats[toStatus(String(row.status))] = count
    stats.total += count
  }

  stats.totalSpeed = Math.round(Number(speedRow?.total ?? 0) * 100) / 100

  return stats
}

/**
 * Applies a reconciliation plan in one transaction
 *
 * @param plan - Inserts, updates and deletions computed for one sync cycle
 * @param now - Timestamp for created_at/updated_at
 * @returns Promise resolving to the number of rows touched per mutation kind
 */
export async function applyReconciliationPlan(
  this: DatabaseService,
  plan: ReconciliationPlan,
  now: Date,
): Promise<AppliedReconciliation> {
  const timestamp = now.toISOString()

  return this.knex.transaction(async (trx) => {
    let inserted = 0
    let updated = 0
    let deleted = 0

    for (const download of plan.inserts) {
      await trx(TABLE).insert(newDownloadToRow(download, timestamp))
      inserted++
    }

    for (const update of plan.updates) {
      const changes = stateChangesToRow(update.changes)
      if (Object.keys(changes).length === 0) continue

      // terminal rows are frozen
      updated += await trx(TABLE)
        .where('id', update.id)
        .whereNotIn('status', [...TERMINAL_STATUSES])
        .update({ ...changes, updated_at: timestamp })
    }

    if (plan.deletions.length > 0) {
      deleted = await trx(TABLE)
        .whereIn(
          'id',
          plan.deletions.map((d) => d.id),
        )
        .where('status', 'queued')
        .delete()
    }

    return { inserted, updated, deleted }
  })
}

/**
 * Retrieves records whose media match has not been attempted yet
 *
 * @param limit - Optional cap on the number of records returned
 */
export async function getDownloadsPendingMatch(
  this: DatabaseService,
  limit?: number,
): Promise<DownloadRecord[]> {
  const rows: DownloadRow[] = await this.knex(TABLE)
    .where('poster_attempted', false)
    .orderBy('id', 'asc')

  const pending = rows
    .map(mapRowToDownload)
    .sort((a, b) => MATCH_ORDER[a.status] - MATCH_ORDER[b.status])

  return limit === undefined ? pending : pending.slice(0, limit)
}

/**
 * Claims the single match attempt of a record
 *
 * @returns true when this call flipped poster_attempted, false otherwise
 */
export async function claimMatchAttempt(
  this: DatabaseService,
  id: number,
): Promise<boolean> {
  const affected = await this.knex(TABLE)
    .where({ id, poster_attempted: false })
    .update({ poster_attempted: true })

  return affected === 1
}

export async function updateMediaMatch(
  this: DatabaseService,
  id: number,
  changes: MediaMatchChanges,
  now: Date,
): Promise<boolean> {
  const row: Record<string, string | number | null> = {}
  if (changes.mediaTitle !== undefined) row.media_title = changes.mediaTitle
  if (changes.mediaType !== undefined) row.media_type = changes.mediaType
  if (changes.year !== undefined) row.year = changes.year
  if (changes.season !== undefined) row.season = changes.season
  if (changes.episode !== undefined) row.episode = changes.episode
  if (changes.posterUrl !== undefined) row.poster_url = changes.posterUrl
  if (changes.sourceInstance !== undefined) {
    row.source_instance = changes.sourceInstance
  }

  if (Object.keys(row).length === 0) {
    return false
  }

  const affected = await this.knex(TABLE)
    .where('id', id)
    .update({ ...row, updated_at: now.toISOString() })

  return affected > 0
}

/**
 * Clears the match flag on every record
 *
 * @returns Promise resolving to the number of records reset
 */
export async function resetPosterFlags(
  this: DatabaseService,
  now: Date,
): Promise<number> {
  const affected = await this.knex(TABLE)
    .where('poster_attempted', true)
    .update({ poster_attempted: false, updated_at: now.toISOString() })

  this.log.info({ count: affected }, 'Reset poster flags')
  return affected
}

export async function updateDownloadPriority(
  this: DatabaseService,
  id: number,
  priority: PriorityLabel,
  now: Date,
): Promise<boolean> {
  const affected = await this.knex(TABLE)
    .where('id', id)
    .update({ priority, updated_at: now.toISOString() })

  return affected > 0
}

/**
 * Deletes terminal records that completed strictly before the cutoff
 *
 * @param cutoff - Records with completed_at before this instant are removed
 * @param now - Reference time for the reported ages
 * @returns Promise resolving to removed/kept counts and the removed items
 */
export async function deleteExpiredDownloads(
  this: DatabaseService,
  cutoff: Date,
  now: Date,
): Promise<CleanupResult> {
  const cutoffIso = cutoff.toISOString()

  return this.knex.transaction(async (trx) => {
    const totalRow = await trx(TABLE)
      .whereIn('status', [...TERMINAL_STATUSES])
      .count('* as count')
      .first()
    const total = Number(totalRow?.count ?? 0)

    const expired: DownloadRow[] = await trx(TABLE)
      .whereIn('status', [...TERMINAL_STATUSES])
      .whereNotNull('completed_at')
      .where('completed_at', '<', cutoffIso)

    if (expired.length === 0) {
      return { removed: 0, kept: total, removedItems: [] }
    }

    const removed = await trx(TABLE)
      .whereIn(
        'id',
        expired.map((row) => row.id),
      )
      .delete()

    const removedItems: RemovedDownloadSummary[] = []
    for (const row of expired) {
      const record = mapRowToDownload(row)
      if (!isTerminalStatus(record.status) || !record.completedAt) continue
      const ageMs = now.getTime() - new Date(record.completedAt).getTime()
      removedItems.push({
        name: record.name,
        status: record.status,
        ageHours: Math.round((ageMs / 3_600_000) * 10) / 10,
      })
    }

    return { removed, kept: total - removed, removedItems }
  })
}
