import type { DownloadRecord } from '@root/types/download.types.js'
import type { HistoryItem, QueueItem } from '@root/types/sabnzbd.types.js'

/**
 * Test data builders for downloads as SABnzbd reports them and as the store
 * holds them
 */

export function makeQueueItem(overrides: Partial<QueueItem> = {}): QueueItem {
  return {
    externalId: 'SABnzbd_nzo_q1',
    name: 'Example.Movie.2021.1080p.WEB-DL.x264-GRP',
    position: 1,
    paused: false,
    detailedStatus: 'Downloading',
    progress: 42,
    speed: 12.5,
    sizeTotal: 4096,
    sizeLeft: 2376,
    timeLeft: '0:03:10',
    category: 'movies',
    rawPriority: '0',
    ...overrides,
  }
}

export function makeHistoryItem(
  overrides: Partial<HistoryItem> = {},
): HistoryItem {
  return {
    externalId: 'SABnzbd_nzo_h1',
    name: 'Show.Name.S01E01.720p.HDTV.x264-GRP',
    outcome: 'completed',
    detailedStatus: 'Completed',
    sizeTotal: 800,
    category: 'tv',
    failureReason: null,
    completedAt: '2026-01-01T10:00:00.000Z',
    ...overrides,
  }
}

export function makeRecord(
  overrides: Partial<DownloadRecord> = {},
): DownloadRecord {
  return {
    id: 1,
    externalId: 'SABnzbd_nzo_q1',
    name: 'Example.Movie.2021.1080p.WEB-DL.x264-GRP',
    status: 'queued',
    detailedStatus: 'Queued',
    progress: 0,
    speed: 0,
    sizeTotal: 4096,
    sizeLeft: 4096,
    timeLeft: null,
    queuePosition: 2,
    category: 'movies',
    priority: 'Normal',
    failureReason: null,
    completedAt: null,
    consecutiveMisses: 0,
    mediaTitle: null,
    mediaType: null,
    year: null,
    season: null,
    episode: null,
    posterUrl: null,
    sourceInstance: null,
    posterAttempted: false,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  }
}
