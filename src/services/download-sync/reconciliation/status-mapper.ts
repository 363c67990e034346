/**
 * Status Mapping
 *
 * Turns SABnzbd queue and history entries into the reconciliation-owned
 * fields of a download record.
 */

import type { FastifyBaseLogger } from 'fastify'
import type {
  DownloadState,
  DownloadStatus,
  PriorityLabel,
} from '@root/types/download.types.js'
import { PriorityValidationError } from '@root/types/errors.js'
import type { HistoryItem, QueueItem } from '@root/types/sabnzbd.types.js'
import { parsePriority } from '@utils/priority.js'

export const MISSING_WITHOUT_HISTORY_REASON =
  'Removed from SABnzbd without a history entry'

/**
 * `undefined` means the controller reported a value outside the canonical
 * table; the caller decides whether that becomes null or "unchanged".
 */
export function resolveQueuePriority(
  item: QueueItem,
  log?: FastifyBaseLogger,
): PriorityLabel | null | undefined {
  if (item.rawPriority === null || item.rawPriority === '') {
    return null
  }
  try {
    return parsePriority(item.rawPriority)
  } catch (error) {
    if (error instanceof PriorityValidationError) {
      log?.warn(
        { externalId: item.externalId, priority: item.rawPriority },
        'SABnzbd reported an unknown priority',
      )
      return undefined
    }
    throw error
  }
}

export function queueItemStatus(item: QueueItem): DownloadStatus {
  return item.position === 1 && !item.paused ? 'downloading' : 'queued'
}

/**
 * Record fields for a queue entry. `priority` is left out when the
 * controller's value is unknown.
 */
export function queueItemToState(
  item: QueueItem,
  log?: FastifyBaseLogger,
): Omit<DownloadState, 'priority'> & { priority?: PriorityLabel | null } {
  const priority = resolveQueuePriority(item, log)

  return {
    name: item.name,
    status: queueItemStatus(item),
    detailedStatus: item.detailedStatus || null,
    progress: item.progress,
    speed: item.speed,
    sizeTotal: item.sizeTotal,
    sizeLeft: item.sizeLeft,
    timeLeft: item.timeLeft,
    queuePosition: item.position,
    category: item.category,
    ...(priority !== undefined ? { priority } : {}),
    failureReason: null,
    completedAt: null,
    consecutiveMisses: 0,
  }
}

/**
 * Record fields for a history entry. Entries still in post-processing are
 * reported as downloading at 100 %.
 *
 * @param now - Completion time when the entry carries none
 */
export function historyItemToState(
  item: HistoryItem,
  now: Date,
): Omit<DownloadState, 'priority'> {
  const base = {
    name: item.name,
    detailedStatus: item.detailedStatus || null,
    speed: 0,
    sizeTotal: item.sizeTotal,
    timeLeft: null,
    queuePosition: null,
    category: item.category,
    consecutiveMisses: 0,
  }

  switch (item.outcome) {
    case 'processing':
      return {
        ...base,
        status: 'downloading',
        progress: 100,
        sizeLeft: 0,
        failureReason: null,
        completedAt: null,
      }
    case 'completed':
      return {
        ...base,
        status: 'completed',
        progress: 100,
        sizeLeft: 0,
        failureReason: null,
        completedAt: item.completedAt ?? now.toISOString(),
      }
    case 'failed':
      return {
        ...base,
        status: 'failed',
        progress: 0,
        sizeLeft: null,
        failureReason: item.failureReason ?? 'Download failed',
        completedAt: item.completedAt ?? now.toISOString(),
      }
  }
}
