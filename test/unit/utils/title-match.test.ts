import { cleanTitle, scoreMatch, significantWords } from '@utils/title-match.js'
import { describe, expect, it } from 'vitest'

describe('title-match', () => {
  describe('cleanTitle', () => {
    it('should expand abbreviations and Roman numerals', () => {
      expect(cleanTitle('Dr. Strangelove - Part II')).toBe(
        'doctor strangelove part 2',
      )
    })

    it('should turn separators into spaces and drop punctuation', () => {
      expect(cleanTitle("Marvel's_The.Defenders!")).toBe('marvels the defenders')
    })

    it('should read longer numerals before shorter ones', () => {
      expect(cleanTitle('Rocky VIII')).toBe('rocky 8')
    })
  })

  describe('significantWords', () => {
    it('should drop stop words', () => {
      expect(significantWords('the lord of the rings')).toEqual(
        new Set(['lord', 'rings']),
      )
    })
  })

  describe('scoreMatch', () => {
    it('should give an exact title with the same year full marks', () => {
      expect(scoreMatch('the matrix', 'the matrix', 1999, 1999)).toBe(100)
    })

    it('should score an exact title without years as 100', () => {
      expect(scoreMatch('show name', 'show name', null, 2020)).toBe(100)
    })

    it('should penalise a year that is off by more than one', () => {
      expect(scoreMatch('the matrix', 'the matrix', 2003, 1999)).toBe(50)
    })

    it('should score partial overlap from the shared words', () => {
      // overlap 1/2 → 35, candidate fully covered → +20, years 4 apart → -50
      expect(scoreMatch('matrix reloaded', 'the matrix', 2003, 1999)).toBe(5)
    })

    it('should add the one-year bonus to partial overlap', () => {
      // overlap 1/2 → 35, +20, years 1 apart → +10
      expect(scoreMatch('matrix reloaded', 'matrix', 2003, 2002)).toBe(65)
    })

    it('should return 0 below half overlap', () => {
      expect(scoreMatch('foo bar baz', 'foo', null, null)).toBe(0)
    })

    it('should return 0 for empty titles', () => {
      expect(scoreMatch('', 'anything', null, null)).toBe(0)
    })
  })
})
