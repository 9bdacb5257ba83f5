/**
 * Duplicate Clustering
 *
 * Groups records whose normalized texts are similar:
 * 1. Blocking: records are bucketed by a shared prefix
 * 2. Scoring: every unordered pair inside a bucket is scored once
 * 3. Merging: pairs scoring at or above the threshold are unioned
 *
 * Grouping is transitive. Two members of a group may score below the
 * threshold against each other when a chain of matching pairs links them.
 *
 * @module dedupe/cluster
 */

import { z } from 'zod';
import { UNIQUE_GROUP_ID, type DuplicateAssignment } from '../schemas/result.js';
import { buildBuckets, countComparisons, type BucketMap } from './blocking.js';
import { ClusterAbortedError, InvalidParameterError } from './errors.js';
import { similarity, type SimilarityScorer } from './similarity.js';
import type { ClusterRunOptions, Logger, ProgressCallback, StopFlag } from './types.js';
import { LabelledUnionFind, UNLABELLED } from './union-find.js';
import { validateParams } from './validate.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for a ClusterBuilder.
 */
export interface ClusterBuilderOptions extends ClusterRunOptions {
  /** Pairs scoring at or above this merge (0..1 inclusive) */
  threshold: number;
  /** Receives (comparisons done, total comparisons) */
  onProgress?: ProgressCallback;
}

// ============================================================================
// Constants
// ============================================================================

/** Comparisons between progress callbacks unless configured otherwise */
export const DEFAULT_PROGRESS_INTERVAL = 100;

const BuilderThresholdSchema = z.number().min(0).max(1);
const ProgressIntervalSchema = z.number().int().positive();

// ============================================================================
// Cluster Builder
// ============================================================================

/**
 * Scores candidate pairs bucket by bucket and merges matches into groups.
 *
 * Each call to {@link ClusterBuilder.build} starts from a fresh union-find,
 * so one builder can be reused across datasets.
 *
 * @example
 * ```typescript
 * const builder = new ClusterBuilder({ threshold: 0.9 });
 * const assignments = builder.build(buildBuckets(texts, 3), texts.length);
 * ```
 */
export class ClusterBuilder {
  readonly threshold: number;
  private readonly scorer: SimilarityScorer;
  private readonly progressInterval: number;
  private readonly onProgress?: ProgressCallback;
  private readonly shouldStop?: StopFlag;
  private readonly logger?: Logger;

  /**
   * @throws {InvalidParameterError} When threshold is outside 0..1 or
   * progressInterval is not a positive integer
   */
  constructor(options: ClusterBuilderOptions) {
    if (!BuilderThresholdSchema.safeParse(options.threshold).success) {
      throw new InvalidParameterError(
        `Invalid threshold: must be between 0 and 1, got ${options.threshold}`,
        'threshold',
        options.threshold
      );
    }
    const interval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
    if (!ProgressIntervalSchema.safeParse(interval).success) {
      throw new InvalidParameterError(
        `Invalid progressInterval: must be a positive integer, got ${interval}`,
        'progressInterval',
        interval
      );
    }

    this.threshold = options.threshold;
    this.scorer = options.scorer ?? similarity;
    this.progressInterval = interval;
    this.onProgress = options.onProgress;
    this.shouldStop = options.shouldStop;
    this.logger = options.logger;
  }

  /**
   * Cluster the records described by `buckets`.
   *
   * @param buckets - Blocking buckets of record indices
   * @param texts - Normalized text per record; its length is the record count
   * @returns One assignment per record, in record order
   * @throws {ClusterAbortedError} When the stop flag is raised between buckets
   */
  build(buckets: BucketMap, texts: readonly string[]): DuplicateAssignment[] {
    const sets = new LabelledUnionFind(texts.length);
    const total = countComparisons(buckets);
    let done = 0;
    let bucketsProcessed = 0;
    let merges = 0;

    this.logger?.debug(
      `[dedupe] Comparing ${total} pairs across ${buckets.size} buckets (threshold ${this.threshold})`
    );

    for (const indices of buckets.values()) {
      if (this.shouldStop?.()) {
        this.logger?.warn(
          `[dedupe] Stopped after ${bucketsProcessed} of ${buckets.size} buckets`
        );
        throw new ClusterAbortedError(
          `Clustering stopped after ${bucketsProcessed} of ${buckets.size} buckets`,
          bucketsProcessed,
          buckets.size
        );
      }

      for (let p = 0; p < indices.length; p++) {
        for (let q = p + 1; q < indices.length; q++) {
          const i = indices[p];
          const j = indices[q];

          // Already linked through another pair: the score cannot change anything
          if (!sets.connected(i, j) && this.scorer(texts[i], texts[j]) >= this.threshold) {
            sets.union(i, j);
            merges++;
          }

          done++;
          if (this.onProgress && done % this.progressInterval === 0 && done < total) {
            this.onProgress(done, total);
          }
        }
      }

      bucketsProcessed++;
    }

    this.onProgress?.(total, total);

    const assignments = collectAssignments(sets);
    this.logger?.debug(`[dedupe] ${merges} merges from ${total} comparisons`);

    return assignments;
  }
}

/**
 * Turn union-find labels into compact group ids and duplicate row lists.
 *
 * Labels keep their discovery order; gaps left by merged groups are closed
 * so ids run 0..G-1.
 */
function collectAssignments(sets: LabelledUnionFind): DuplicateAssignment[] {
  const membersByLabel = new Map<number, number[]>();
  for (let index = 0; index < sets.size; index++) {
    const label = sets.labelOf(index);
    if (label === UNLABELLED) continue;
    const members = membersByLabel.get(label) ?? [];
    members.push(index);
    membersByLabel.set(label, members);
  }

  const groupIds = new Map<number, number>();
  [...membersByLabel.keys()]
    .sort((a, b) => a - b)
    .forEach((label, groupId) => groupIds.set(label, groupId));

  const assignments: DuplicateAssignment[] = [];
  for (let index = 0; index < sets.size; index++) {
    const label = sets.labelOf(index);
    const members = membersByLabel.get(label);
    const groupId = groupIds.get(label);
    if (label === UNLABELLED || members === undefined || groupId === undefined) {
      assignments.push({ groupId: UNIQUE_GROUP_ID, duplicateRows: [] });
      continue;
    }
    assignments.push({
      groupId,
      duplicateRows: members.filter((member) => member !== index).map((member) => member + 1),
    });
  }

  return assignments;
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Find duplicate groups among normalized record texts.
 *
 * @param texts - Normalized text per record
 * @param threshold - Similarity threshold, 0.5..1.0
 * @param prefixLength - Blocking prefix length, integer 1..10
 * @param progressCallback - Receives (comparisons done, total comparisons)
 * @param options - Stop flag, logger, scorer and progress interval
 * @returns One assignment per input record; index i describes record i
 * @throws {InvalidParameterError} Before any work when a parameter is out of range
 * @throws {ClusterAbortedError} When `options.shouldStop` returns true
 *
 * @example
 * ```typescript
 * const result = clusterDuplicates(['apple pie', 'appel pie', 'banana'], 0.85, 2);
 * // [ { groupId: 0, duplicateRows: [2] },
 * //   { groupId: 0, duplicateRows: [1] },
 * //   { groupId: -1, duplicateRows: [] } ]
 * ```
 */
export function clusterDuplicates(
  texts: readonly string[],
  threshold: number,
  prefixLength: number,
  progressCallback?: ProgressCallback,
  options: ClusterRunOptions = {}
): DuplicateAssignment[] {
  const params = validateParams(threshold, prefixLength);

  if (texts.length === 0) {
    return [];
  }

  options.logger?.info(
    `[dedupe] Clustering ${texts.length} records (threshold ${params.threshold}, prefix ${params.prefixLength})`
  );

  const buckets = buildBuckets(texts, params.prefixLength);
  const builder = new ClusterBuilder({
    ...options,
    threshold: params.threshold,
    onProgress: progressCallback,
  });

  return builder.build(buckets, texts);
}
