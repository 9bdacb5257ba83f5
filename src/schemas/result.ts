/**
 * Dedupe Result Schemas
 *
 * Shapes produced by the grouping engine: the per-record assignment,
 * the comparison estimate and the run summary.
 *
 * @module schemas/result
 */

import { z } from 'zod';

// ============================================
// Duplicate Assignment
// ============================================

/**
 * Group id used for records that matched nothing.
 */
export const UNIQUE_GROUP_ID = -1;

/**
 * Group assignment for one input record.
 * - groupId: group id (>= 0) or -1 when the record has no duplicates
 * - duplicateRows: 1-based row numbers of the other group members, ascending
 */
export const DuplicateAssignmentSchema = z.object({
  groupId: z.number().int().min(UNIQUE_GROUP_ID),
  duplicateRows: z.array(z.number().int().positive()),
});

export type DuplicateAssignment = z.infer<typeof DuplicateAssignmentSchema>;

// ============================================
// Comparison Estimate
// ============================================

/**
 * How much work blocking leaves compared with all-pairs comparison.
 */
export const ComparisonEstimateSchema = z.object({
  recordCount: z.number().int().nonnegative(),
  bucketCount: z.number().int().nonnegative(),
  comparisons: z.number().int().nonnegative(),
  possibleComparisons: z.number().int().nonnegative(),
  reductionRatio: z.number().min(0).max(1),
});

export type ComparisonEstimate = z.infer<typeof ComparisonEstimateSchema>;

// ============================================
// Dedupe Summary
// ============================================

export const DedupeSummarySchema = z.object({
  recordCount: z.number().int().nonnegative(),
  groupCount: z.number().int().nonnegative(),
  /** Records that belong to some group */
  duplicateRecordCount: z.number().int().nonnegative(),
  /** Records with group id -1 */
  uniqueRecordCount: z.number().int().nonnegative(),
  largestGroupSize: z.number().int().nonnegative(),
});

export type DedupeSummary = z.infer<typeof DedupeSummarySchema>;
