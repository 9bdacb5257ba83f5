/**
 * Zod Schemas for All Data Types
 *
 * Central export point for engine parameter and result schemas.
 */

// ============================================================================
// Parameters
// ============================================================================

export {
  ThresholdSchema,
  PrefixLengthSchema,
  DedupeParamsSchema,
  MIN_THRESHOLD,
  MAX_THRESHOLD,
  MIN_PREFIX_LENGTH,
  MAX_PREFIX_LENGTH,
  type DedupeParams,
} from './params.js';

// ============================================================================
// Results
// ============================================================================

export {
  DuplicateAssignmentSchema,
  ComparisonEstimateSchema,
  DedupeSummarySchema,
  UNIQUE_GROUP_ID,
  type DuplicateAssignment,
  type ComparisonEstimate,
  type DedupeSummary,
} from './result.js';
