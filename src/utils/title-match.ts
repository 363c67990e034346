/**
 * Title comparison helpers shared by the library lookup and the media matcher
 */

const STOP_WORDS = new Set([
  'the',
  'a',
  'an',
  'of',
  'and',
  'or',
  'in',
  'to',
  'for',
])

const ABBREVIATIONS: Array<[RegExp, string]> = [
  [/\bdr\b/g, 'doctor'],
  [/\bmr\b/g, 'mister'],
  [/\bmrs\b/g, 'missus'],
  [/\bst\b/g, 'saint'],
]

// Longest numerals first so that `viii` is not read as `v` + `iii`
const ROMAN_NUMERALS: Array<[RegExp, string]> = [
  [/\bviii\b/g, '8'],
  [/\bvii\b/g, '7'],
  [/\bvi\b/g, '6'],
  [/\bix\b/g, '9'],
  [/\biv\b/g, '4'],
  [/\bv\b/g, '5'],
  [/\biii\b/g, '3'],
  [/\bii\b/g, '2'],
  [/\bx\b/g, '10'],
  [/\bi\b/g, '1'],
]

/**
 * Lower-cases a title, turns separators into spaces, drops punctuation and
 * expands common abbreviations and Roman numerals.
 *
 * @example
 * cleanTitle('Dr. Strangelove - Part II') // 'doctor strangelove part 2'
 */
export function cleanTitle(title: string): string {
  let cleaned = title
    .replace(/[._-]/g, ' ')
    .replace(/[^\w\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase()

  for (const [pattern, replacement] of ABBREVIATIONS) {
    cleaned = cleaned.replace(pattern, replacement)
  }
  for (const [pattern, replacement] of ROMAN_NUMERALS) {
    cleaned = cleaned.replace(pattern, replacement)
  }

  return cleaned
}

/**
 * Words of an already cleaned title, without stop words
 */
export function significantWords(cleanedTitle: string): Set<string> {
  return new Set(
    cleanedTitle
      .split(' ')
      .filter((word) => word.length > 0 && !STOP_WORDS.has(word)),
  )
}

/**
 * Scores how well a library title matches a release title, 0–100.
 *
 * Both titles must already be cleaned with {@link cleanTitle}. Word overlap
 * below one half scores zero; years that disagree by more than one cost 50.
 */
export function scoreMatch(
  queryTitle: string,
  candidateTitle: string,
  queryYear: number | null,
  candidateYear: number | null,
): number {
  if (!queryTitle || !candidateTitle) {
    return 0
  }

  let score: number
  if (queryTitle === candidateTitle) {
    score = 100
  } else {
    const queryWords = significantWords(queryTitle)
    const candidateWords = significantWords(candidateTitle)
    if (queryWords.size === 0 || candidateWords.size === 0) {
      return 0
    }

    let common = 0
    for (const word of candidateWords) {
      if (queryWords.has(word)) common++
    }
    const overlap = common / Math.max(queryWords.size, candidateWords.size)
    if (overlap < 0.5) {
      return 0
    }

    score = Math.floor(overlap * 70)
    if (common === candidateWords.size) {
      score += 20
    }
  }

  if (queryYear && candidateYear) {
    const drift = Math.abs(queryYear - candidateYear)
    if (drift === 0) {
      score += 30
    } else if (drift === 1) {
      score += 10
    } else {
      score -= 50
    }
  }

  return Math.max(0, Math.min(100, score))
}
