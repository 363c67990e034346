import {
  normalizeNumericField,
  normalizeParsedRelease,
  parseReleaseName,
} from '@utils/release-parser.js'
import { describe, expect, it } from 'vitest'

describe('release-parser', () => {
  describe('parseReleaseName', () => {
    it('should parse a single episode release', () => {
      expect(
        parseReleaseName('Show.Name.S06E18.1080p.WEB-DL.x264-GRP.mkv'),
      ).toEqual({
        title: 'Show Name',
        year: null,
        season: 6,
        episode: 18,
        resolution: '1080p',
      })
    })

    it('should parse a movie release with a year', () => {
      expect(parseReleaseName('Example.Movie.2021.2160p.BluRay.x265-GRP')).toEqual({
        title: 'Example Movie',
        year: 2021,
        season: null,
        episode: null,
        resolution: '2160p',
      })
    })

    it('should return every episode of a multi-episode file', () => {
      const parsed = parseReleaseName('Show.S01E02E03.720p.HDTV')

      expect(parsed.title).toBe('Show')
      expect(parsed.season).toBe(1)
      expect(parsed.episode).toEqual([2, 3])
    })

    it('should return an empty episode list for a season pack', () => {
      const parsed = parseReleaseName('Show.Name.S02.1080p.WEB')

      expect(parsed.title).toBe('Show Name')
      expect(parsed.season).toBe(2)
      expect(parsed.episode).toEqual([])
    })

    it('should parse the 1x02 form', () => {
      const parsed = parseReleaseName('Show.Name.1x02.HDTV')

      expect(parsed.title).toBe('Show Name')
      expect(parsed.season).toBe(1)
      expect(parsed.episode).toBe(2)
    })

    it('should keep a year that opens the name as the title', () => {
      const parsed = parseReleaseName('2012.2009.1080p.BluRay')

      expect(parsed.title).toBe('2012')
      expect(parsed.year).toBe(2009)
    })

    it('should fall back to the whole name when nothing can be cut', () => {
      const parsed = parseReleaseName('Some_Random_Upload')

      expect(parsed.title).toBe('Some Random Upload')
      expect(parsed.year).toBeNull()
      expect(parsed.season).toBeNull()
      expect(parsed.resolution).toBeNull()
    })

    it('should strip a release group that follows the year', () => {
      expect(parseReleaseName('Movie.Title.2020-GRP.mkv')).toEqual({
        title: 'Movie Title',
        year: 2020,
        season: null,
        episode: null,
        resolution: null,
      })
    })

    it('should keep a hyphenated name without separators intact', () => {
      expect(parseReleaseName('Spider-Man').title).toBe('Spider-Man')
    })

    it('should parse the Season 1 Episode 2 form', () => {
      const parsed = parseReleaseName('Show.Name.Season.1.Episode.2.720p.mkv')

      expect(parsed.title).toBe('Show Name')
      expect(parsed.season).toBe(1)
      expect(parsed.episode).toBe(2)
      expect(parsed.resolution).toBe('720p')
    })
  })

  describe('normalizeNumericField', () => {
    it('should keep integers', () => {
      expect(normalizeNumericField(7)).toBe(7)
    })

    it('should take the first element of a list', () => {
      expect(normalizeNumericField([3, 4])).toBe(3)
    })

    it('should turn empty lists into null', () => {
      expect(normalizeNumericField([])).toBeNull()
    })

    it('should parse digit strings', () => {
      expect(normalizeNumericField('12')).toBe(12)
    })

    it('should truncate fractions', () => {
      expect(normalizeNumericField(2.9)).toBe(2)
    })

    it('should return null for anything else', () => {
      expect(normalizeNumericField(null)).toBeNull()
      expect(normalizeNumericField(undefined)).toBeNull()
      expect(normalizeNumericField('abc')).toBeNull()
      expect(normalizeNumericField(Number.NaN)).toBeNull()
      expect(normalizeNumericField({ value: 1 })).toBeNull()
    })
  })

  describe('normalizeParsedRelease', () => {
    it('should collapse list fields to single integers', () => {
      expect(
        normalizeParsedRelease({
          title: 'Show',
          year: null,
          season: [1],
          episode: [],
        }),
      ).toEqual({ title: 'Show', year: null, season: 1, episode: null })
    })

    it('should replace a non-string title with an empty string', () => {
      expect(normalizeParsedRelease({ title: 42 }).title).toBe('')
    })

    it('should normalize a multi-episode parse to its first episode', () => {
      const normalized = normalizeParsedRelease(
        parseReleaseName('Show.S01E02E03.720p.HDTV'),
      )

      expect(normalized).toEqual({
        title: 'Show',
        year: null,
        season: 1,
        episode: 2,
      })
    })
  })
})
