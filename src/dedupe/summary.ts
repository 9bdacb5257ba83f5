/**
 * Result summaries for duplicate assignments.
 *
 * @module dedupe/summary
 */

import { UNIQUE_GROUP_ID, type DedupeSummary, type DuplicateAssignment } from '../schemas/result.js';

/**
 * Member record indices (0-based, ascending) for each group id.
 * Entry g of the result lists the members of group g.
 */
export function collectGroups(assignments: readonly DuplicateAssignment[]): number[][] {
  const groups: number[][] = [];
  assignments.forEach((assignment, index) => {
    if (assignment.groupId === UNIQUE_GROUP_ID) return;
    while (groups.length <= assignment.groupId) {
      groups.push([]);
    }
    groups[assignment.groupId].push(index);
  });
  return groups;
}

/**
 * Count groups and grouped records.
 *
 * @example
 * ```typescript
 * summarizeAssignments(clusterDuplicates(texts, 0.9, 3));
 * // { recordCount: 4, groupCount: 1, duplicateRecordCount: 3,
 * //   uniqueRecordCount: 1, largestGroupSize: 3 }
 * ```
 */
export function summarizeAssignments(assignments: readonly DuplicateAssignment[]): DedupeSummary {
  const groups = collectGroups(assignments).filter((members) => members.length > 0);
  const duplicateRecordCount = groups.reduce((sum, members) => sum + members.length, 0);

  return {
    recordCount: assignments.length,
    groupCount: groups.length,
    duplicateRecordCount,
    uniqueRecordCount: assignments.length - duplicateRecordCount,
    largestGroupSize: groups.reduce((max, members) => Math.max(max, members.length), 0),
  };
}
