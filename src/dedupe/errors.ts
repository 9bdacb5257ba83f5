/**
 * Deduplication Errors
 *
 * Error types raised by the grouping engine.
 *
 * @module dedupe/errors
 */

/**
 * A tuning parameter (threshold, prefix length) is outside its accepted range.
 */
export class InvalidParameterError extends Error {
  constructor(
    message: string,
    public readonly parameter: string,
    public readonly received: unknown
  ) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}

/**
 * Clustering was stopped by the caller's stop flag before all buckets ran.
 * No partial result is produced.
 */
export class ClusterAbortedError extends Error {
  constructor(
    message: string,
    public readonly bucketsProcessed: number,
    public readonly bucketCount: number
  ) {
    super(message);
    this.name = 'ClusterAbortedError';
  }
}
