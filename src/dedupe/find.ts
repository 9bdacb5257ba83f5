/**
 * Record-level entry point: normalize rows, then cluster them.
 *
 * @module dedupe/find
 */

import type { DedupeParams } from '../schemas/params.js';
import type { DuplicateAssignment } from '../schemas/result.js';
import { clusterDuplicates } from './cluster.js';
import { normalizeRecords, type FieldValue } from './normalize.js';
import type { ClusterRunOptions, ProgressCallback } from './types.js';

export interface FindDuplicatesOptions extends ClusterRunOptions {
  onProgress?: ProgressCallback;
}

/**
 * Find duplicate groups among structured records.
 *
 * @param records - Field values per record, in row order
 * @param params - Similarity threshold and blocking prefix length
 * @param options - Progress callback, stop flag, logger
 */
export function findDuplicates(
  records: readonly (readonly FieldValue[])[],
  params: DedupeParams,
  options: FindDuplicatesOptions = {}
): DuplicateAssignment[] {
  const { onProgress, ...runOptions } = options;
  const texts = normalizeRecords(records);
  return clusterDuplicates(texts, params.threshold, params.prefixLength, onProgress, runOptions);
}
