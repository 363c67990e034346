/**
 * Release name parsing
 *
 * Pulls a searchable title, year and season/episode out of a raw release
 * filename such as `Show.Name.S06E18.1080p.WEB-DL.x264-GRP.mkv`.
 *
 * Raw output is loose: multi-episode files yield an
 * episode array and season packs yield an empty one. Callers must pass the
 * result through {@link normalizeParsedRelease} before it reaches the store.
 */

export interface ParsedRelease {
  title: string
  year: number | null
  season: number | number[] | null
  episode: number | number[] | null
  resolution: string | null
}

/**
 * Parser output after normalization: every numeric field is a single
 * integer or null
 */
export interface NormalizedRelease {
  title: string
  year: number | null
  season: number | null
  episode: number | null
}

interface EpisodeMarker {
  index: number
  season: number
  episode: number | number[]
}

const FILE_EXTENSION = /\.(mkv|mp4|avi|m4v|ts|wmv|nzb)$/i
const LEADING_TAG = /^\[[^\]]*\]\s*/
const GROUP_SUFFIX = /-[A-Za-z0-9]+$/
const RESOLUTION = /\b(2160p|1080p|720p|576p|480p)\b/i
const QUALITY_TOKEN =
  /\b(2160p|1080p|720p|576p|480p|4k|uhd|x264|x265|h 264|h 265|h264|h265|hevc|avc|web-dl|webdl|webrip|web|bluray|blu-ray|bdrip|brrip|hdtv|dvdrip|remux|hdr|dv|atmos|ddp5 1|dd5 1|aac|ac3|dts|proper|repack|internal|multi)\b/i
const YEAR = /(?:^|[\s([])((?:19|20)\d{2})(?=$|[\s)\]-])/g

const MULTI_EPISODE = /\bS(\d{1,2})((?:\s?-?\s?E\d{1,3})+)\b/i
const CROSS_EPISODE = /\b(\d{1,2})x(\d{2,3})\b/i
const VERBOSE_EPISODE = /\bSeason\s?(\d{1,2})\s?Episode\s?(\d{1,3})\b/i
const SEASON_PACK = /\b(?:S|Season\s?)(\d{1,2})\b/i

function toInt(value: string): number {
  return Number.parseInt(value, 10)
}

function findEpisodeMarker(text: string): EpisodeMarker | null {
  const multi = MULTI_EPISODE.exec(text)
  if (multi) {
    const episodes = Array.from(multi[2].matchAll(/E(\d{1,3})/gi), (m) =>
      toInt(m[1]),
    )
    return {
      index: multi.index,
      season: toInt(multi[1]),
      episode: episodes.length === 1 ? episodes[0] : episodes,
    }
  }

  const cross = CROSS_EPISODE.exec(text)
  if (cross) {
    return {
      index: cross.index,
      season: toInt(cross[1]),
      episode: toInt(cross[2]),
    }
  }

  const verbose = VERBOSE_EPISODE.exec(text)
  if (verbose) {
    return {
      index: verbose.index,
      season: toInt(verbose[1]),
      episode: toInt(verbose[2]),
    }
  }

  const pack = SEASON_PACK.exec(text)
  if (pack) {
    return { index: pack.index, season: toInt(pack[1]), episode: [] }
  }

  return null
}

/**
 * Returns the last year token that does not open the name, so that
 * `2012.2009.1080p` keeps `2012` as the title.
 */
function findYear(text: string): { index: number; year: number } | null {
  let found: { index: number; year: number } | null = null
  for (const match of text.matchAll(YEAR)) {
    const index = (match.index ?? 0) + match[0].length - match[1].length
    if (index > 0) {
      found = { index, year: toInt(match[1]) }
    }
  }
  return found
}

/**
 * Parses a release filename into title, year and season/episode.
 *
 * Recognised episode forms: `S01E02`, `S01E02E03`, `S01E02-E03`, `1x02`,
 * `Season 1 Episode 2`, and season packs (`S01`, `Season 1`).
 */
export function parseReleaseName(filename: string): ParsedRelease {
  let base = filename.trim().replace(FILE_EXTENSION, '').replace(LEADING_TAG, '')
  // A bare hyphenated name such as `Spider-Man` has no group suffix
  if (/[._\s]/.test(base)) {
    base = base.replace(GROUP_SUFFIX, '')
  }
  const text = base.replace(/[._]/g, ' ')

  const marker = findEpisodeMarker(text)
  const year = findYear(text)
  const quality = QUALITY_TOKEN.exec(text)
  const resolution = RESOLUTION.exec(text)

  const cut = Math.min(
    marker?.index ?? text.length,
    year?.index ?? text.length,
    quality?.index ?? text.length,
  )

  const title =
    text
      .slice(0, cut)
      .replace(/[\s\-([]+$/, '')
      .replace(/\s+/g, ' ')
      .trim() || text.replace(/\s+/g, ' ').trim()

  return {
    title,
    year: year?.year ?? null,
    season: marker?.season ?? null,
    episode: marker?.episode ?? null,
    resolution: resolution ? resolution[1].toLowerCase() : null,
  }
}

/**
 * Coerces a loosely typed numeric parser field to a single integer.
 * Empty collections become null and non-empty ones yield their first
 * element. Never throws.
 */
export function normalizeNumericField(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? normalizeNumericField(value[0]) : null
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return toInt(value.trim())
  }
  return null
}

/**
 * Boundary between the parser and the rest of the system
 */
export function normalizeParsedRelease(parsed: {
  title?: unknown
  year?: unknown
  season?: unknown
  episode?: unknown
}): NormalizedRelease {
  return {
    title: typeof parsed.title === 'string' ? parsed.title : '',
    year: normalizeNumericField(parsed.year),
    season: normalizeNumericField(parsed.season),
    episode: normalizeNumericField(parsed.episode),
  }
}
