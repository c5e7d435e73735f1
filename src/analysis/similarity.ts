/**
 * Similarity score: 0 (completely different) to 1 (identical).
 * Branded to keep it from mixing with arbitrary numbers.
 *
 * @module analysis/similarity
 */

import type { Brand } from '../runtime/brand.js';

export type Similarity = Brand<number, 'Similarity'>;

/**
 * Create a Similarity value, clamping to [0, 1].
 */
export function similarity(n: number): Similarity {
  return Math.max(0, Math.min(1, n)) as Similarity;
}

/** Default cut-off for "did you mean" and sibling-file matching. */
export const DEFAULT_SIMILARITY_THRESHOLD: Similarity = similarity(0.6);
