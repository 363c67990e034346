import type { FastifyBaseLogger } from 'fastify'
import {
  ArrLibraryResponseSchema,
  type ArrInstance,
  type ArrLibraryItem,
  type ArrLibraryOptions,
  type LibraryCandidate,
} from '@root/types/arr.types.js'
import { LibraryLookupError } from '@root/types/errors.js'
import { systemClock, type Clock } from '@root/types/scheduler.types.js'
import { cleanTitle, significantWords } from '@utils/title-match.js'

interface CachedLibrary {
  items: ArrLibraryItem[]
  fetchedAt: number
}

/**
 * Library lookup against one Radarr or Sonarr instance.
 *
 * The whole library (`/api/v3/movie` or `/api/v3/series`) is fetched and kept
 * for `cacheTtlSeconds`; concurrent callers share one in-flight request.
 */
export class ArrLibraryService {
  private cache: CachedLibrary | null = null
  private pending: Promise<ArrLibraryItem[]> | null = null

  constructor(
    private readonly log: FastifyBaseLogger,
    readonly instance: ArrInstance,
    private readonly options: ArrLibraryOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  private get baseUrl(): string {
    return this.instance.baseUrl.replace(/\/+$/, '')
  }

  private get endpoint(): string {
    return this.instance.type === 'radarr' ? 'movie' : 'series'
  }

  /**
   * Returns library entries that share at least one significant word with
   * the title. Scoring is left to the caller.
   *
   * @param title - Release title, cleaned or raw
   * @param year - Release year, used only to order equal candidates
   * @param signal - Aborts the library request
   */
  async searchByTitle(
    title: string,
    year?: number | null,
    signal?: AbortSignal,
  ): Promise<LibraryCandidate[]> {
    const queryWords = significantWords(cleanTitle(title))
    if (queryWords.size === 0) {
      return []
    }

    const items = await this.getLibrary(signal)
    const candidates: LibraryCandidate[] = []

    for (const item of items) {
      const itemWords = significantWords(cleanTitle(item.title))
      const shared = [...itemWords].some((word) => queryWords.has(word))
      if (!shared) continue

      candidates.push({
        title: item.title,
        year: item.year ?? null,
        type: this.instance.type === 'radarr' ? 'movie' : 'tv',
        posterUrl: this.getPosterUrl(item),
      })
    }

    if (year) {
      candidates.sort(
        (a, b) =>
          Math.abs((a.year ?? 0) - year) - Math.abs((b.year ?? 0) - year),
      )
    }

    this.log.debug(
      { instance: this.instance.name, title, candidates: candidates.length },
      'Library search complete',
    )
    return candidates
  }

  /**
   * Drops the cached library so that the next search refetches it
   */
  invalidateCache(): void {
    this.cache = null
  }

  private async getLibrary(signal?: AbortSignal): Promise<ArrLibraryItem[]> {
    const now = this.clock.now().getTime()
    if (
      this.cache &&
      now - this.cache.fetchedAt < this.options.cacheTtlSeconds * 1000
    ) {
      return this.cache.items
    }

    if (!this.pending) {
      this.pending = this.fetchLibrary(signal)
        .then((items) => {
          this.cache = { items, fetchedAt: this.clock.now().getTime() }
          return items
        })
        .finally(() => {
          this.pending = null
        })
    }
    return this.pending
  }

  private async fetchLibrary(signal?: AbortSignal): Promise<ArrLibraryItem[]> {
    const url = new URL(`${this.baseUrl}/api/v3/${this.endpoint}`)
    const timeout = AbortSignal.timeout(this.options.requestTimeoutMs)

    let response: Response
    try {
      response = await fetch(url.toString(), {
        method: 'GET',
        headers: {
          'X-Api-Key': this.instance.apiKey,
          Accept: 'application/json',
        },
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      })
    } catch (error) {
      throw new LibraryLookupError(
        this.instance.name,
        `Failed to reach ${this.instance.name}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      )
    }

    if (!response.ok) {
      const message =
        response.status === 401
          ? 'Authentication failed. Check API key.'
          : `${this.instance.type === 'radarr' ? 'Radarr' : 'Sonarr'} API error: ${response.status} ${response.statusText}`
      throw new LibraryLookupError(this.instance.name, message, {
        statusCode: response.status,
      })
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new LibraryLookupError(
        this.instance.name,
        `${this.instance.name} returned invalid JSON`,
        { statusCode: response.status, cause: error },
      )
    }

    const parsed = ArrLibraryResponseSchema.safeParse(body)
    if (!parsed.success) {
      throw new LibraryLookupError(
        this.instance.name,
        `Unexpected library response from ${this.instance.name}`,
        { statusCode: response.status, cause: parsed.error },
      )
    }

    this.log.debug(
      { instance: this.instance.name, count: parsed.data.length },
      'Fetched library',
    )
    return parsed.data
  }

  /**
   * Poster image's remoteUrl, else its url made absolute against the instance
   */
  private getPosterUrl(item: ArrLibraryItem): string | null {
    const poster = item.images?.find((image) => image.coverType === 'poster')
    if (!poster) return null
    if (poster.remoteUrl) return poster.remoteUrl
    if (!poster.url) return null
    return poster.url.startsWith('/') ? `${this.baseUrl}${poster.url}` : poster.url
  }
}
