/**
 * Media Matcher
 *
 * Resolves a download to a Radarr movie or Sonarr series and stores the title,
 * year, poster and season/episode on the record.
 *
 * Each record gets one attempt: the `poster_attempted` claim is taken with a
 * conditional update before any lookup, and an in-memory set of in-flight ids
 * refuses a second enrichment while the first is running. Lookups run through
 * a p-limit pool so a burst of new downloads cannot flood the library APIs.
 */

import type { FastifyBaseLogger } from 'fastify'
import pLimit, { type LimitFunction } from 'p-limit'
import type { LibraryCandidate } from '@root/types/arr.types.js'
import type { DownloadRecord, MediaMatchChanges } from '@root/types/download.types.js'
import type { EnrichmentOutcome } from '@root/types/download-sync.types.js'
import { systemClock, type Clock } from '@root/types/scheduler.types.js'
import type { ArrManagerService } from '@services/arr-manager.service.js'
import type { DatabaseService } from '@services/database.service.js'
import { normalizeParsedRelease, parseReleaseName } from '@utils/release-parser.js'
import { selectBestCandidate } from './candidate-selector.js'

export interface MediaMatcherDeps {
  db: DatabaseService
  arrManager: ArrManagerService
  logger: FastifyBaseLogger
  config: {
    maxConcurrentLookups: number
    matchThreshold: number
  }
  clock?: Clock
}

export class MediaMatcher {
  private readonly inFlight = new Set<number>()
  private readonly limit: LimitFunction
  private readonly controller = new AbortController()
  private readonly clock: Clock

  constructor(private readonly deps: MediaMatcherDeps) {
    this.limit = pLimit(Math.max(1, deps.config.maxConcurrentLookups))
    this.clock = deps.clock ?? systemClock
  }

  get stopped(): boolean {
    return this.controller.signal.aborted
  }

  /** Ids with an enrichment queued or running */
  get inFlightIds(): ReadonlySet<number> {
    return this.inFlight
  }

  /**
   * Enriches several records through the bounded pool.
   * Never rejects: a failed item is reported as unmatched.
   */
  async enrichAll(records: DownloadRecord[]): Promise<EnrichmentOutcome[]> {
    const outcomes = await Promise.all(records.map((r) => this.enrich(r)))

    const matched = outcomes.filter((o) => o.status === 'matched').length
    if (outcomes.length > 0) {
      this.deps.logger.info(
        { total: outcomes.length, matched },
        'Media matching pass complete',
      )
    }
    return outcomes
  }

  /**
   * Enriches one record. A record already in flight is refused at once
   * without touching the store.
   */
  async enrich(record: DownloadRecord): Promise<EnrichmentOutcome> {
    if (this.stopped) {
      return { status: 'aborted', id: record.id }
    }
    if (this.inFlight.has(record.id)) {
      return { status: 'skipped', id: record.id, reason: 'in_flight' }
    }

    this.inFlight.add(record.id)
    try {
      return await this.limit(() => this.process(record))
    } catch (error) {
      this.deps.logger.error(
        { error, id: record.id },
        'Media matching failed',
      )
      return {
        status: 'unmatched',
        id: record.id,
        reason: error instanceof Error ? error.message : String(error),
      }
    } finally {
      this.inFlight.delete(record.id)
    }
  }

  /**
   * Aborts in-flight lookups. Aborted lookups write nothing.
   */
  stop(): void {
    if (this.stopped) return
    // queued tasks still run, see the abort and return without a write
    this.controller.abort()
    this.deps.logger.info(
      { inFlight: this.inFlight.size },
      'Media matcher stopped',
    )
  }

  private async process(record: DownloadRecord): Promise<EnrichmentOutcome> {
    const { db, arrManager, logger, config } = this.deps
    const signal = this.controller.signal

    if (signal.aborted) {
      return { status: 'aborted', id: record.id }
    }

    const claimed = await db.claimMatchAttempt(record.id)
    if (!claimed) {
      return { status: 'skipped', id: record.id, reason: 'already_attempted' }
    }

    const parsed = normalizeParsedRelease(parseReleaseName(record.name))
    const episodeFields: MediaMatchChanges = {
      season: parsed.season,
      episode: parsed.episode,
    }

    const library = arrManager.getInstanceForCategory(record.category)
    if (!library) {
      logger.debug(
        { id: record.id, category: record.category },
        'No library instance for category',
      )
      await this.write(record.id, episodeFields)
      return {
        status: 'unmatched',
        id: record.id,
        reason: record.category
          ? `No instance for category "${record.category}"`
          : 'Download has no category',
      }
    }

    let candidates: LibraryCandidate[]
    try {
      candidates = await library.searchByTitle(parsed.title, parsed.year, signal)
    } catch (error) {
      if (signal.aborted) {
        return { status: 'aborted', id: record.id }
      }
      const message = error instanceof Error ? error.message : String(error)
      logger.warn(
        { id: record.id, instance: library.instance.name, error: message },
        'Library lookup failed',
      )
      await this.write(record.id, episodeFields)
      return { status: 'unmatched', id: record.id, reason: message }
    }
    if (signal.aborted) {
      return { status: 'aborted', id: record.id }
    }

    const best = selectBestCandidate(
      parsed.title,
      parsed.year,
      candidates,
      config.matchThreshold,
    )

    if (!best) {
      logger.debug(
        { id: record.id, title: parsed.title, candidates: candidates.length },
        'No library match above threshold',
      )
      await this.write(record.id, episodeFields)
      return { status: 'unmatched', id: record.id, reason: 'No match' }
    }

    await this.write(record.id, {
      ...episodeFields,
      mediaTitle: best.candidate.title,
      mediaType: best.candidate.type,
      year: best.candidate.year,
      posterUrl: best.candidate.posterUrl,
      sourceInstance: library.instance.name,
    })
    logger.debug(
      {
        id: record.id,
        mediaTitle: best.candidate.title,
        score: best.score,
        instance: library.instance.name,
      },
      'Matched download to library item',
    )
    return {
      status: 'matched',
      id: record.id,
      mediaTitle: best.candidate.title,
      score: best.score,
    }
  }

  /**
   * Store failures propagate to {@link enrich}, which reports the record as
   * unmatched with the store error
   */
  private async write(id: number, changes: MediaMatchChanges): Promise<void> {
    await this.deps.db.updateMediaMatch(id, changes, this.clock.now())
  }
}
