/**
 * Match Policy
 * Picks the site listing that best fits a wanted title.
 *
 * Score = Dice similarity of normalized titles
 *       + 0.3 when the year matches exactly, + 0.1 when it is one off.
 * Ties go to the listing with HD on offer, then the newer year, then the
 * site's own ranking.
 */

import stringSimilarity from 'string-similarity';
import type { SearchResult } from '../types.js';

const EXACT_YEAR_BONUS = 0.3;
const NEAR_YEAR_BONUS = 0.1;

export interface ScoredMatch {
  result: SearchResult;
  score: number;
}

export function normalizeForMatch(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function scoreMatch(title: string, year: number | undefined, result: SearchResult): number {
  let score = stringSimilarity.compareTwoStrings(normalizeForMatch(title), normalizeForMatch(result.title));

  if (year && result.year) {
    if (result.year === year) {
      score += EXACT_YEAR_BONUS;
    } else if (Math.abs(result.year - year) <= 1) {
      score += NEAR_YEAR_BONUS;
    }
  }

  return score;
}

function qualityRank(result: SearchResult): number {
  return result.availableQualities.has('hd') ? 1 : 0;
}

/**
 * All results, best first. Stable with respect to the site's order.
 */
export function rankMatches(title: string, year: number | undefined, results: SearchResult[]): ScoredMatch[] {
  return results
    .map((result, index) => ({ result, score: scoreMatch(title, year, result), index }))
    .sort((a, b) =>
      b.score - a.score ||
      qualityRank(b.result) - qualityRank(a.result) ||
      (b.result.year ?? 0) - (a.result.year ?? 0) ||
      a.index - b.index
    )
    .map(({ result, score }) => ({ result, score }));
}

export function pickBestMatch(
  title: string,
  year: number | undefined,
  results: SearchResult[],
  minScore = 0
): ScoredMatch | null {
  const [best] = rankMatches(title, year, results);
  if (!best || best.score < minScore) return null;
  return best;
}
