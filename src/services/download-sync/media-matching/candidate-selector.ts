import type { LibraryCandidate } from '@root/types/arr.types.js'
import { cleanTitle, scoreMatch } from '@utils/title-match.js'

export interface ScoredCandidate {
  candidate: LibraryCandidate
  score: number
}

/**
 * Scores every candidate against the parsed release and returns the best one
 * at or above the threshold. Ties keep the library's order.
 */
export function selectBestCandidate(
  title: string,
  year: number | null,
  candidates: LibraryCandidate[],
  threshold: number,
): ScoredCandidate | null {
  const query = cleanTitle(title)
  let best: ScoredCandidate | null = null

  for (const candidate of candidates) {
    const score = scoreMatch(query, cleanTitle(candidate.title), year, candidate.year)
    if (!best || score > best.score) {
      best = { candidate, score }
    }
  }

  return best && best.score >= threshold ? best : null
}
