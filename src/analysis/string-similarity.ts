/**
 * String Similarity Utilities
 *
 * Pure functions behind keyword "did you mean" suggestions and the
 * missing-file recovery strategy's sibling search.
 *
 * - Pure functions (deterministic, no side effects)
 * - Scores are the branded Similarity type
 *
 * @module analysis/string-similarity
 */

import { similarity, type Similarity } from './similarity.js';

/**
 * Levenshtein (edit) distance: single-character insertions, deletions and
 * substitutions needed to turn a into b.
 *
 * O(n * m) time, O(min(n, m)) space (single-row).
 *
 * @param a - First string
 * @param b - Second string
 * @returns Edit distance (0 = identical)
 */
export function levenshteinDistance(a: string, b: string): number {
  // Keep a the shorter string so the row is as short as possible
  if (a.length > b.length) {
    [a, b] = [b, a];
  }

  const m = a.length;
  const n = b.length;

  if (m === 0) return n;
  if (n === 0) return m;

  // Only the previous and current rows are kept
  let prevRow = new Array<number>(m + 1);
  let currRow = new Array<number>(m + 1);

  for (let i = 0; i <= m; i++) {
    prevRow[i] = i;
  }

  for (let j = 1; j <= n; j++) {
    currRow[0] = j;

    for (let i = 1; i <= m; i++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      currRow[i] = Math.min(
        prevRow[i] + 1,       // deletion
        currRow[i - 1] + 1,   // insertion
        prevRow[i - 1] + cost // substitution
      );
    }

    // Swap rows
    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[m];
}

/**
 * Levenshtein ratio: `1 - distance / max(len)`, from 0 (nothing in common)
 * to 1 (identical). Case-sensitive.
 *
 * @param a - First string
 * @param b - Second string
 * @returns Similarity score
 */
export function computeSimilarity(a: string, b: string): Similarity {
  if (a === b) return similarity(1);
  if (a.length === 0 || b.length === 0) return similarity(0);

  const distance = levenshteinDistance(a, b);
  const maxLength = Math.max(a.length, b.length);

  return similarity(1 - distance / maxLength);
}

/**
 * Case-insensitive similarity, for keywords typed as `Bold` or `HEADING1`.
 *
 * @param a - First string
 * @param b - Second string
 * @returns Similarity score of the lowercased strings
 */
export function computeSimilarityIgnoreCase(a: string, b: string): Similarity {
  return computeSimilarity(a.toLowerCase(), b.toLowerCase());
}

/**
 * A candidate and its score against the input.
 */
export interface ClosestMatch {
  readonly match: string;
  readonly score: Similarity;
}

/**
 * All candidates scoring at or above `threshold`, best first. Equal scores
 * keep the candidates' input order, so a caller's list order decides ties.
 *
 * @param input - The string to match, compared without case
 * @param candidates - Possible matches
 * @param threshold - Minimum similarity to include
 * @param limit - Maximum number of matches to return
 * @returns Matches sorted by similarity (best first)
 */
export function findAllMatches(
  input: string,
  candidates: readonly string[],
  threshold: Similarity,
  limit: number
): readonly ClosestMatch[] {
  const matches: ClosestMatch[] = [];

  for (const candidate of candidates) {
    const score = computeSimilarityIgnoreCase(input, candidate);
    if (score >= threshold) {
      matches.push({ match: candidate, score });
    }
  }

  // Array.prototype.sort is stable.
  matches.sort((a, b) => b.score - a.score);

  return matches.slice(0, Math.max(0, limit));
}

/**
 * Best candidate at or above `threshold`.
 *
 * @param input - The string to match, compared without case
 * @param candidates - Possible matches
 * @param threshold - Minimum similarity to consider a match
 * @returns The best match and its score, or null if none qualifies
 */
export function findClosestMatch(
  input: string,
  candidates: readonly string[],
  threshold: Similarity
): ClosestMatch | null {
  return findAllMatches(input, candidates, threshold, 1)[0] ?? null;
}
