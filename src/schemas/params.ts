/**
 * Dedupe Parameter Schemas
 *
 * Ranges accepted by the grouping engine's public entry points.
 *
 * @module schemas/params
 */

import { z } from 'zod';

// ============================================
// Ranges
// ============================================

/** Lowest similarity threshold accepted by clusterDuplicates */
export const MIN_THRESHOLD = 0.5;

/** Highest similarity threshold accepted by clusterDuplicates */
export const MAX_THRESHOLD = 1.0;

/** Shortest blocking prefix */
export const MIN_PREFIX_LENGTH = 1;

/** Longest blocking prefix */
export const MAX_PREFIX_LENGTH = 10;

// ============================================
// Parameter Schemas
// ============================================

/**
 * Similarity threshold: pairs scoring at or above it are duplicates.
 */
export const ThresholdSchema = z
  .number({ invalid_type_error: 'Threshold must be a number' })
  .min(MIN_THRESHOLD, `Threshold must be at least ${MIN_THRESHOLD}`)
  .max(MAX_THRESHOLD, `Threshold must be at most ${MAX_THRESHOLD}`);

/**
 * Number of leading characters used as the blocking key.
 */
export const PrefixLengthSchema = z
  .number({ invalid_type_error: 'Prefix length must be a number' })
  .int('Prefix length must be a whole number')
  .min(MIN_PREFIX_LENGTH, `Prefix length must be at least ${MIN_PREFIX_LENGTH}`)
  .max(MAX_PREFIX_LENGTH, `Prefix length must be at most ${MAX_PREFIX_LENGTH}`);

export const DedupeParamsSchema = z.object({
  threshold: ThresholdSchema,
  prefixLength: PrefixLengthSchema,
});

export type DedupeParams = z.infer<typeof DedupeParamsSchema>;
