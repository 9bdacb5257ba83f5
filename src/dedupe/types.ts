/**
 * Shared types for the grouping engine.
 *
 * @module dedupe/types
 */

import type { SimilarityScorer } from './similarity.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for the engine.
 * Lets callers route engine output without the engine depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Callbacks
// ============================================================================

/**
 * Receives comparison progress as (done, total).
 */
export type ProgressCallback = (done: number, total: number) => void;

/**
 * Polled between buckets; returning true aborts the run.
 */
export type StopFlag = () => boolean;

// ============================================================================
// Options
// ============================================================================

/**
 * Optional behaviour shared by clusterDuplicates and ClusterBuilder.
 */
export interface ClusterRunOptions {
  /** Comparisons between progress callbacks (default 100) */
  progressInterval?: number;
  /** Stop flag polled before each bucket */
  shouldStop?: StopFlag;
  /** Pairwise scorer (default: Jaro-Winkler) */
  scorer?: SimilarityScorer;
  /** Engine log output */
  logger?: Logger;
}
