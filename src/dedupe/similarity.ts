/**
 * Similarity Functions for Record Deduplication
 *
 * Jaro-Winkler similarity: rewards characters that agree within a sliding
 * window, tolerates transposed neighbours, and boosts pairs that share a
 * common prefix.
 *
 * @module dedupe/similarity
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Longest shared prefix that earns the Winkler boost.
 */
export const WINKLER_PREFIX_LIMIT = 4;

/**
 * Boost applied per shared prefix character.
 * Must not exceed 1 / WINKLER_PREFIX_LIMIT or scores could pass 1.0.
 */
export const WINKLER_SCALING_FACTOR = 0.1;

/**
 * Signature of a pairwise scorer accepted by the cluster builder.
 */
export type SimilarityScorer = (a: string, b: string) => number;

// ============================================================================
// Jaro
// ============================================================================

/**
 * Calculates Jaro similarity between two strings.
 *
 * Characters match when equal and no further apart than
 * `max(0, floor(max(|a|, |b|) / 2) - 1)`. The score averages the matched
 * share of each string and the share of matches that are in order.
 *
 * @returns Similarity between 0.0 (nothing matches) and 1.0 (identical)
 * @example
 * ```typescript
 * jaroSimilarity('MARTHA', 'MARHTA');
 * // 0.944...
 * ```
 */
export function jaroSimilarity(first: string, second: string): number {
  if (first === second) {
    return 1.0;
  }
  if (first.length === 0 || second.length === 0) {
    return 0.0;
  }

  // Greedy matching depends on which side drives it; fix the order so
  // swapping the arguments cannot change the score.
  const [a, b] = first <= second ? [first, second] : [second, first];

  const window = Math.max(0, Math.floor(Math.max(a.length, b.length) / 2) - 1);
  const aMatched = new Array<boolean>(a.length).fill(false);
  const bMatched = new Array<boolean>(b.length).fill(false);

  let matches = 0;
  for (let i = 0; i < a.length; i++) {
    const start = Math.max(0, i - window);
    const end = Math.min(b.length, i + window + 1);
    for (let j = start; j < end; j++) {
      if (bMatched[j] || a[i] !== b[j]) continue;
      aMatched[i] = true;
      bMatched[j] = true;
      matches++;
      break;
    }
  }

  if (matches === 0) {
    return 0.0;
  }

  // Matched characters that appear in a different order
  let outOfOrder = 0;
  let k = 0;
  for (let i = 0; i < a.length; i++) {
    if (!aMatched[i]) continue;
    while (!bMatched[k]) k++;
    if (a[i] !== b[k]) outOfOrder++;
    k++;
  }
  const transpositions = outOfOrder / 2;

  return (matches / a.length + matches / b.length + (matches - transpositions) / matches) / 3;
}

// ============================================================================
// Jaro-Winkler
// ============================================================================

/**
 * Length of the common prefix of two strings, capped at WINKLER_PREFIX_LIMIT.
 */
export function commonPrefixLength(a: string, b: string): number {
  const limit = Math.min(WINKLER_PREFIX_LIMIT, a.length, b.length);
  let length = 0;
  while (length < limit && a[length] === b[length]) {
    length++;
  }
  return length;
}

/**
 * Calculates Jaro-Winkler similarity between two strings.
 *
 * Two empty strings are identical (1.0); an empty string against a
 * non-empty one scores 0.0. Comparison is case-sensitive.
 *
 * @param a - First string to compare
 * @param b - Second string to compare
 * @returns Similarity score between 0.0 and 1.0, symmetric in its arguments
 * @example
 * ```typescript
 * similarity('apple pie', 'appel pie');
 * // 0.974...
 *
 * similarity('', '');
 * // 1.0
 * ```
 */
export function similarity(a: string, b: string): number {
  const jaro = jaroSimilarity(a, b);
  if (jaro === 0 || jaro === 1) {
    return jaro;
  }

  const prefix = commonPrefixLength(a, b);
  const score = jaro + prefix * WINKLER_SCALING_FACTOR * (1 - jaro);

  return Math.min(1, Math.max(0, score));
}
