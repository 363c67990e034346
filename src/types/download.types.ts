export type DownloadStatus = 'queued' | 'downloading' | 'completed' | 'failed'

export type TerminalStatus = Extract<DownloadStatus, 'completed' | 'failed'>

export type MediaType = 'movie' | 'tv'

export type PriorityLabel = 'Force' | 'High' | 'Normal' | 'Low'

export const DOWNLOAD_STATUSES: readonly DownloadStatus[] = [
  'queued',
  'downloading',
  'completed',
  'failed',
] as const

export const TERMINAL_STATUSES: readonly TerminalStatus[] = [
  'completed',
  'failed',
] as const

export function isTerminalStatus(
  status: DownloadStatus,
): status is TerminalStatus {
  return status === 'completed' || status === 'failed'
}

/**
 * Metadata resolved from a Radarr/Sonarr library.
 * Written only by the media matcher.
 */
export interface MediaMatch {
  mediaTitle: string | null
  mediaType: MediaType | null
  year: number | null
  season: number | null
  episode: number | null
  posterUrl: string | null
  sourceInstance: string | null
  posterAttempted: boolean
}

/**
 * Fields owned by the reconciliation engine.
 */
export interface DownloadState {
  name: string
  status: DownloadStatus
  detailedStatus: string | null
  progress: number
  speed: number
  sizeTotal: number | null
  sizeLeft: number | null
  timeLeft: string | null
  queuePosition: number | null
  category: string | null
  priority: PriorityLabel | null
  failureReason: string | null
  completedAt: string | null
  consecutiveMisses: number
}

export interface DownloadRecord extends DownloadState, MediaMatch {
  id: number
  externalId: string
  createdAt: string
  updatedAt: string
}

export type NewDownload = DownloadState & { externalId: string }

export type DownloadStateChanges = Partial<DownloadState>

export type MediaMatchChanges = Partial<Omit<MediaMatch, 'posterAttempted'>>

export interface DownloadStats {
  queued: number
  downloading: number
  completed: number
  failed: number
  total: number
  /** Combined speed of downloading records in MB/s */
  totalSpeed: number
}
