/**
 * Prefix Blocking for Duplicate Detection
 *
 * Partitions records into buckets keyed by the first few characters of their
 * normalized text. Only records sharing a bucket are ever compared, which cuts
 * the work from N·(N−1)/2 comparisons to the sum of n·(n−1)/2 per bucket.
 *
 * Recall trade-off: two records whose first L characters differ land in
 * different buckets and are never compared, however similar the rest of the
 * text is. Leading whitespace and a typo in the first character are the usual
 * causes. A shorter prefix finds more of these at the cost of more comparisons.
 *
 * @module dedupe/blocking
 */

import type { ComparisonEstimate } from '../schemas/result.js';
import { validatePrefixLength } from './validate.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Bucket key → ascending record indices.
 * Iteration order is the order in which each key first appears in the input.
 */
export type BucketMap = Map<string, number[]>;

// ============================================================================
// Bucket Keys
// ============================================================================

/**
 * Derive the bucket key of a normalized text.
 *
 * Lower-cases the text and takes its first `prefixLength` characters (code
 * points). Texts shorter than the prefix use the whole text; empty text
 * yields the empty key.
 *
 * @example
 * ```typescript
 * bucketKey('Apple Pie', 3); // 'app'
 * bucketKey('Ab', 10);       // 'ab'
 * ```
 */
export function bucketKey(text: string, prefixLength: number): string {
  const chars = Array.from(text.toLowerCase());
  return chars.slice(0, prefixLength).join('');
}

// ============================================================================
// Bucket Construction
// ============================================================================

/**
 * Group record indices into buckets by shared prefix.
 *
 * Every index 0..N-1 lands in exactly one bucket.
 *
 * @param texts - Normalized text per record
 * @param prefixLength - Prefix length, integer in 1..10
 * @returns Buckets in first-appearance order
 * @throws {InvalidParameterError} When prefixLength is out of range
 */
export function buildBuckets(texts: readonly string[], prefixLength: number): BucketMap {
  const length = validatePrefixLength(prefixLength);
  const buckets: BucketMap = new Map();

  texts.forEach((text, index) => {
    const key = bucketKey(text, length);
    const bucket = buckets.get(key) ?? [];
    bucket.push(index);
    buckets.set(key, bucket);
  });

  return buckets;
}

// ============================================================================
// Comparison Counting
// ============================================================================

/**
 * Number of unordered pairs among n items.
 */
export function pairCount(n: number): number {
  return n < 2 ? 0 : (n * (n - 1)) / 2;
}

/**
 * Total candidate pairs the buckets will generate.
 */
export function countComparisons(buckets: BucketMap): number {
  let total = 0;
  for (const indices of buckets.values()) {
    total += pairCount(indices.length);
  }
  return total;
}

/**
 * Estimate the comparison workload for a dataset before clustering it.
 *
 * @param texts - Normalized text per record
 * @param prefixLength - Prefix length, integer in 1..10
 * @example
 * ```typescript
 * estimateComparisons(['apple', 'apply', 'banana'], 2);
 * // { recordCount: 3, bucketCount: 2, comparisons: 1,
 * //   possibleComparisons: 3, reductionRatio: 0.333... }
 * ```
 */
export function estimateComparisons(
  texts: readonly string[],
  prefixLength: number
): ComparisonEstimate {
  const buckets = buildBuckets(texts, prefixLength);
  const comparisons = countComparisons(buckets);
  const possibleComparisons = pairCount(texts.length);

  return {
    recordCount: texts.length,
    bucketCount: buckets.size,
    comparisons,
    possibleComparisons,
    reductionRatio: possibleComparisons === 0 ? 0 : comparisons / possibleComparisons,
  };
}
