/**
 * Deduplication Module Exports
 *
 * Near-duplicate grouping for tabular records: normalization, prefix
 * blocking, Jaro-Winkler scoring and union-find clustering.
 *
 * @module dedupe
 */

// Record normalization
export {
  normalizeRecord,
  normalizeRecords,
  fieldToText,
  FIELD_SEPARATOR,
  type FieldValue,
} from './normalize.js';

// Blocking
export {
  buildBuckets,
  bucketKey,
  countComparisons,
  estimateComparisons,
  pairCount,
  type BucketMap,
} from './blocking.js';

// Similarity
export {
  similarity,
  jaroSimilarity,
  commonPrefixLength,
  WINKLER_PREFIX_LIMIT,
  WINKLER_SCALING_FACTOR,
  type SimilarityScorer,
} from './similarity.js';

// Clustering
export { LabelledUnionFind, UNLABELLED } from './union-find.js';
export {
  ClusterBuilder,
  clusterDuplicates,
  DEFAULT_PROGRESS_INTERVAL,
  type ClusterBuilderOptions,
} from './cluster.js';
export { findDuplicates, type FindDuplicatesOptions } from './find.js';
export { collectGroups, summarizeAssignments } from './summary.js';

// Validation and errors
export { validateParams, validatePrefixLength, validateThreshold } from './validate.js';
export { InvalidParameterError, ClusterAbortedError } from './errors.js';

export type { Logger, ProgressCallback, StopFlag, ClusterRunOptions } from './types.js';
