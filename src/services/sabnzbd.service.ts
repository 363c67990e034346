/**
 * SABnzbd Service
 *
 * Read side and priority write of the SABnzbd JSON API. Every call is a GET on
 * `{url}/api?apikey=…&output=json&mode=…`; SABnzbd reports most failures with
 * HTTP 200 and a `{ status: false, error }` body, so both are checked.
 */
import type { FastifyBaseLogger } from 'fastify'
import type { z } from 'zod'
import { DownloadClientError, type HealthCheckResult } from '@root/types/errors.js'
import {
  SabnzbdErrorResponseSchema,
  SabnzbdHistoryResponseSchema,
  SabnzbdQueueResponseSchema,
  SabnzbdVersionResponseSchema,
  type DownloadSnapshot,
  type HistoryItem,
  type HistoryOutcome,
  type SabnzbdConfiguration,
  type SabnzbdHistoryResponse,
  type SabnzbdQueueResponse,
  type QueueItem,
} from '@root/types/sabnzbd.types.js'

const POST_PROCESSING_STATUSES = new Set([
  'Extracting',
  'Verifying',
  'Repairing',
  'Moving',
  'Running',
  'Queued',
  'Fetching',
])

const BYTES_PER_MB = 1024 * 1024

function toNumber(value: string | number | undefined | null): number {
  if (value === undefined || value === null || value === '') return 0
  const parsed = typeof value === 'number' ? value : Number.parseFloat(value)
  return Number.isFinite(parsed) ? parsed : 0
}

function round(value: number, digits = 2): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

/**
 * Converts a SABnzbd speed string to MB/s.
 *
 * @example
 * parseSpeedToMb('12.3 MB/s') // 12.3
 * parseSpeedToMb('512 K')     // 0.5
 */
export function parseSpeedToMb(speed: string | undefined): number {
  if (!speed) return 0
  const match = /([\d.]+)\s*(GB\/s|MB\/s|KB\/s|B\/s|G|M|K|B)?/i.exec(speed)
  if (!match) return 0

  const value = Number.parseFloat(match[1])
  if (!Number.isFinite(value)) return 0

  switch ((match[2] ?? 'B').toUpperCase()) {
    case 'GB/S':
    case 'G':
      return value * 1024
    case 'MB/S':
    case 'M':
      return value
    case 'KB/S':
    case 'K':
      return value / 1024
    default:
      return value / BYTES_PER_MB
  }
}

/**
 * Maps a queue response to queue items. Position 1 is the active slot and
 * carries the queue's overall speed; every other slot reports 0.
 */
export function parseQueueResponse(response: SabnzbdQueueResponse): QueueItem[] {
  const { queue } = response
  const queuePaused = queue.paused === true
  const speed =
    queue.kbpersec !== undefined
      ? toNumber(queue.kbpersec) / 1024
      : parseSpeedToMb(queue.speed)

  return queue.slots.map((slot, index) => {
    const position = index + 1
    const paused = queuePaused || slot.status === 'Paused'
    const active = position === 1 && !paused

    return {
      externalId: slot.nzo_id,
      name: slot.filename,
      position,
      paused,
      detailedStatus: slot.status,
      progress: toNumber(slot.percentage),
      speed: active ? round(speed) : 0,
      sizeTotal: round(toNumber(slot.mb)),
      sizeLeft: round(toNumber(slot.mbleft)),
      timeLeft: slot.timeleft ?? null,
      category: slot.cat ?? null,
      rawPriority: slot.priority ?? null,
    }
  })
}

function historyOutcome(status: string, failMessage: string): HistoryOutcome {
  if (status === 'Failed' || failMessage !== '') return 'failed'
  if (POST_PROCESSING_STATUSES.has(status)) return 'processing'
  return 'completed'
}

/**
 * Maps a history response to history items
 */
export function parseHistoryResponse(
  response: SabnzbdHistoryResponse,
): HistoryItem[] {
  return response.history.slots.map((slot) => {
    const failMessage = slot.fail_message?.trim() ?? ''
    const completedEpoch = toNumber(slot.completed)

    return {
      externalId: slot.nzo_id,
      name: slot.name,
      outcome: historyOutcome(slot.status, failMessage),
      detailedStatus: slot.status,
      sizeTotal: round(toNumber(slot.bytes) / BYTES_PER_MB),
      category: slot.category ?? null,
      failureReason: failMessage === '' ? null : failMessage,
      completedAt:
        completedEpoch > 0 ? new Date(completedEpoch * 1000).toISOString() : null,
    }
  })
}

export class SabnzbdService {
  constructor(
    private readonly log: FastifyBaseLogger,
    private readonly config: SabnzbdConfiguration,
  ) {}

  /**
   * Performs one API call and validates the body against `schema`
   *
   * @throws DownloadClientError on network failure, non-2xx status,
   *   an error body or an unexpected payload
   */
  private async request<S extends z.ZodTypeAny>(
    mode: string,
    schema: S,
    params: Record<string, string | number> = {},
  ): Promise<z.infer<S>> {
    const url = new URL(`${this.config.url.replace(/\/+$/, '')}/api`)
    url.searchParams.set('apikey', this.config.apiKey)
    url.searchParams.set('output', 'json')
    url.searchParams.set('mode', mode)
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value))
    }

    let response: Response
    try {
      response = await fetch(url.toString(), {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      })
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `timed out after ${this.config.requestTimeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error)
      throw new DownloadClientError(`SABnzbd request failed (${mode}): ${reason}`, {
        cause: error,
      })
    }

    if (!response.ok) {
      if (response.status === 401 || response.status === 403) {
        throw new DownloadClientError('Authentication failed. Check API key.', {
          statusCode: response.status,
        })
      }
      throw new DownloadClientError(
        `SABnzbd API error: ${response.status} ${response.statusText}`,
        { statusCode: response.status },
      )
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new DownloadClientError(`SABnzbd returned invalid JSON (${mode})`, {
        statusCode: response.status,
        cause: error,
      })
    }

    const failure = SabnzbdErrorResponseSchema.safeParse(body)
    if (
      failure.success &&
      (failure.data.status === false || Boolean(failure.data.error))
    ) {
      throw new DownloadClientError(
        `SABnzbd API error: ${failure.data.error ?? 'request rejected'}`,
        { statusCode: response.status },
      )
    }

    const parsed = schema.safeParse(body)
    if (!parsed.success) {
      throw new DownloadClientError(
        `Unexpected SABnzbd response (${mode}): ${parsed.error.message}`,
        { statusCode: response.status, cause: parsed.error },
      )
    }
    return parsed.data
  }

  async fetchQueue(): Promise<QueueItem[]> {
    const response = await this.request('queue', SabnzbdQueueResponseSchema)
    const items = parseQueueResponse(response)
    this.log.debug({ count: items.length }, 'Fetched SABnzbd queue')
    return items
  }

  async fetchHistory(): Promise<HistoryItem[]> {
    const response = await this.request('history', SabnzbdHistoryResponseSchema, {
      limit: this.config.historyLimit,
    })
    const items = parseHistoryResponse(response)
    this.log.debug({ count: items.length }, 'Fetched SABnzbd history')
    return items
  }

  /**
   * Fetches queue and history together. If either call fails the whole
   * snapshot fails.
   */
  async fetchSnapshot(): Promise<DownloadSnapshot> {
    const [queue, history] = await Promise.all([
      this.fetchQueue(),
      this.fetchHistory(),
    ])
    return { queue, history }
  }

  /**
   * Sets the priority of a queued item
   *
   * @param externalId - SABnzbd nzo_id
   * @param code - Numeric SABnzbd priority code
   */
  async setPriority(externalId: string, code: number): Promise<void> {
    await this.request('queue', SabnzbdErrorResponseSchema, {
      name: 'priority',
      value: externalId,
      value2: code,
    })
    this.log.info({ externalId, code }, 'Updated SABnzbd priority')
  }

  async testConnection(): Promise<HealthCheckResult> {
    try {
      const { version } = await this.request(
        'version',
        SabnzbdVersionResponseSchema,
      )
      this.log.debug({ version }, 'SABnzbd connection test succeeded')
      return { healthy: true }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.log.warn({ error: message }, 'SABnzbd connection test failed')
      return { healthy: false, error: message }
    }
  }
}
