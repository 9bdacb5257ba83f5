/**
 * Tests for Deduplication Module
 *
 * Covers:
 * - Record normalization
 * - Prefix blocking and comparison estimates
 * - Jaro-Winkler similarity
 * - Labelled union-find
 * - Cluster building, progress and cancellation
 * - Result summaries
 */

import { describe, it, expect, jest } from '@jest/globals';
import { normalizeRecord, normalizeRecords, fieldToText } from './normalize.js';
import {
  bucketKey,
  buildBuckets,
  countComparisons,
  estimateComparisons,
  pairCount,
} from './blocking.js';
import { similarity, jaroSimilarity, commonPrefixLength } from './similarity.js';
import { LabelledUnionFind, UNLABELLED } from './union-find.js';
import { ClusterBuilder, clusterDuplicates } from './cluster.js';
import { findDuplicates } from './find.js';
import { collectGroups, summarizeAssignments } from './summary.js';
import { ClusterAbortedError, InvalidParameterError } from './errors.js';
import type { Logger } from './types.js';
import type { DuplicateAssignment } from '../schemas/result.js';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Scorer that returns 1 for the listed unordered text pairs and 0 otherwise.
 */
function pairScorer(pairs: Array<[string, string]>): (a: string, b: string) => number {
  const matches = new Set(pairs.map(([a, b]) => [a, b].sort().join('|')));
  return (a, b) => (matches.has([a, b].sort().join('|')) ? 1 : 0);
}

/**
 * Logger that records every message by level.
 */
function createRecordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: (message) => lines.push(`debug ${message}`),
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
  };
}

const MIXED_RECORDS = [
  'John Smith 12 Elm Street',
  'Jon Smith 12 Elm Street',
  'john smith 12 elm st',
  'Jane Doe 4 Oak Avenue',
  'Jane Doe 4 Oak Ave',
  'Jane Dow 4 Oak Avenue',
  'Bob Stone',
  '',
  '',
  'Bobby Stone',
  'Alice Brown',
  'Alicia Brown',
];

// ============================================================================
// normalizeRecord Tests
// ============================================================================

describe('normalizeRecord', () => {
  it('joins field values with a single space', () => {
    expect(normalizeRecord(['Acme Corp', 42, 'Berlin'])).toBe('Acme Corp 42 Berlin');
  });

  it('skips missing values', () => {
    expect(normalizeRecord(['Acme Corp', null, undefined, Number.NaN, '', 'Berlin'])).toBe(
      'Acme Corp Berlin'
    );
  });

  it('returns empty text when every field is missing', () => {
    expect(normalizeRecord([null, undefined, ''])).toBe('');
    expect(normalizeRecord([])).toBe('');
  });

  it('renders booleans and dates', () => {
    expect(normalizeRecord([true, new Date('2024-01-15T00:00:00.000Z')])).toBe(
      'true 2024-01-15T00:00:00.000Z'
    );
  });

  it('keeps case and surrounding whitespace', () => {
    expect(normalizeRecord([' Apple ', 'Pie'])).toBe(' Apple  Pie');
  });

  it('normalizes a whole dataset in order', () => {
    expect(normalizeRecords([['a', 1], [null], ['b']])).toEqual(['a 1', '', 'b']);
  });
});

describe('fieldToText', () => {
  it('treats invalid dates as missing', () => {
    expect(fieldToText(new Date('not a date'))).toBeNull();
  });

  it('renders zero', () => {
    expect(fieldToText(0)).toBe('0');
  });
});

// ============================================================================
// Blocking Tests
// ============================================================================

describe('bucketKey', () => {
  it('takes a lower-cased prefix', () => {
    expect(bucketKey('Apple Pie', 3)).toBe('app');
  });

  it('uses the whole text when it is shorter than the prefix', () => {
    expect(bucketKey('Ab', 10)).toBe('ab');
  });

  it('maps empty text to the empty key', () => {
    expect(bucketKey('', 4)).toBe('');
  });

  it('counts characters by code point', () => {
    expect(bucketKey('\u{1F600}abc', 2)).toBe('\u{1F600}a');
  });
});

describe('buildBuckets', () => {
  it('groups records by shared prefix in first-appearance order', () => {
    const buckets = buildBuckets(['apple pie', 'Appel pie', 'banana', 'applle pie'], 2);
    expect([...buckets.entries()]).toEqual([
      ['ap', [0, 1, 3]],
      ['ba', [2]],
    ]);
  });

  it('puts empty texts into one bucket', () => {
    const buckets = buildBuckets(['', 'x', ''], 1);
    expect([...buckets.entries()]).toEqual([
      ['', [0, 2]],
      ['x', [1]],
    ]);
  });

  it('keys short texts by their full content with prefix length 10', () => {
    const buckets = buildBuckets(['short', 'shorter', 'Short'], 10);
    expect([...buckets.entries()]).toEqual([
      ['short', [0, 2]],
      ['shorter', [1]],
    ]);
  });

  it('places every record in exactly one bucket', () => {
    const buckets = buildBuckets(MIXED_RECORDS, 3);
    const seen = [...buckets.values()].flat().sort((a, b) => a - b);
    expect(seen).toEqual(MIXED_RECORDS.map((_, index) => index));
  });

  it('returns no buckets for empty input', () => {
    expect(buildBuckets([], 3).size).toBe(0);
  });

  it.each([0, 11, 2.5, Number.NaN])('rejects prefix length %p', (prefixLength) => {
    expect(() => buildBuckets(['a'], prefixLength)).toThrow(InvalidParameterError);
  });
});

describe('comparison counting', () => {
  it('counts unordered pairs', () => {
    expect(pairCount(0)).toBe(0);
    expect(pairCount(1)).toBe(0);
    expect(pairCount(4)).toBe(6);
  });

  it('sums pairs across buckets', () => {
    const buckets = buildBuckets(['apple pie', 'appel pie', 'banana', 'applle pie'], 2);
    expect(countComparisons(buckets)).toBe(3);
  });

  it('estimates the reduction against all-pairs comparison', () => {
    const estimate = estimateComparisons(['apple', 'apply', 'banana'], 2);
    expect(estimate.recordCount).toBe(3);
    expect(estimate.bucketCount).toBe(2);
    expect(estimate.comparisons).toBe(1);
    expect(estimate.possibleComparisons).toBe(3);
    expect(estimate.reductionRatio).toBeCloseTo(1 / 3, 10);
  });

  it('reports a zero ratio when nothing can be compared', () => {
    expect(estimateComparisons(['solo'], 3)).toEqual({
      recordCount: 1,
      bucketCount: 1,
      comparisons: 0,
      possibleComparisons: 0,
      reductionRatio: 0,
    });
  });
});

// ============================================================================
// Similarity Tests
// ============================================================================

describe('similarity', () => {
  it('returns 1.0 for identical strings', () => {
    expect(similarity('hello world', 'hello world')).toBe(1);
  });

  it('treats two empty strings as identical', () => {
    expect(similarity('', '')).toBe(1);
  });

  it('returns 0.0 for empty against non-empty', () => {
    expect(similarity('', 'abc')).toBe(0);
    expect(similarity('abc', '')).toBe(0);
  });

  it('returns 0.0 when no characters match', () => {
    expect(similarity('abc', 'xyz')).toBe(0);
  });

  it('is case-sensitive', () => {
    expect(similarity('ABC', 'abc')).toBe(0);
  });

  it('scores a transposition with the prefix boost', () => {
    expect(jaroSimilarity('MARTHA', 'MARHTA')).toBeCloseTo(0.944444, 5);
    expect(similarity('MARTHA', 'MARHTA')).toBeCloseTo(0.961111, 5);
  });

  it('scores a dropped character', () => {
    expect(jaroSimilarity('DWAYNE', 'DUANE')).toBeCloseTo(0.822222, 5);
    expect(similarity('DWAYNE', 'DUANE')).toBeCloseTo(0.84, 5);
  });

  it('scores swapped letters in a phrase', () => {
    expect(jaroSimilarity('apple pie', 'appel pie')).toBeCloseTo(0.962963, 5);
    expect(similarity('apple pie', 'appel pie')).toBeCloseTo(0.974074, 5);
  });

  it('caps the common prefix at four characters', () => {
    expect(commonPrefixLength('abcdefg', 'abcdefh')).toBe(4);
    expect(commonPrefixLength('abc', 'abd')).toBe(2);
    expect(commonPrefixLength('', 'abc')).toBe(0);
  });

  it('is symmetric', () => {
    const pairs: Array<[string, string]> = [
      ['apple pie', 'applle pie'],
      ['DWAYNE', 'DUANE'],
      ['abcab', 'bacba'],
      ['Jane Doe 4 Oak Avenue', 'Jane Dow 4 Oak Ave'],
      ['ab', 'ba'],
    ];
    for (const [a, b] of pairs) {
      expect(similarity(a, b)).toBe(similarity(b, a));
    }
  });

  it('stays within [0, 1]', () => {
    for (const a of MIXED_RECORDS) {
      for (const b of MIXED_RECORDS) {
        const score = similarity(a, b);
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(1);
      }
    }
  });
});

// ============================================================================
// Union-Find Tests
// ============================================================================

describe('LabelledUnionFind', () => {
  it('starts with every element unlabelled and alone', () => {
    const sets = new LabelledUnionFind(3);
    expect(sets.labelOf(0)).toBe(UNLABELLED);
    expect(sets.connected(0, 1)).toBe(false);
    expect(sets.labelsIssued).toBe(0);
  });

  it('issues labels in discovery order and keeps the lower label on merge', () => {
    const sets = new LabelledUnionFind(5);
    expect(sets.union(0, 1)).toBe(0);
    expect(sets.union(2, 3)).toBe(1);
    expect(sets.union(3, 1)).toBe(0);

    expect(sets.labelOf(2)).toBe(0);
    expect(sets.connected(0, 3)).toBe(true);
    expect(sets.connected(0, 4)).toBe(false);
    expect(sets.labelOf(4)).toBe(UNLABELLED);
    expect(sets.labelsIssued).toBe(2);
  });

  it('adds an unlabelled element to an existing label', () => {
    const sets = new LabelledUnionFind(3);
    sets.union(0, 1);
    expect(sets.union(2, 0)).toBe(0);
    expect(sets.labelsIssued).toBe(1);
  });

  it('returns the existing label when already connected', () => {
    const sets = new LabelledUnionFind(2);
    sets.union(0, 1);
    expect(sets.union(1, 0)).toBe(0);
  });
});

// ============================================================================
// clusterDuplicates Tests
// ============================================================================

describe('clusterDuplicates', () => {
  it('groups spelling variants that share a prefix', () => {
    const result = clusterDuplicates(['apple pie', 'appel pie', 'banana', 'applle pie'], 0.85, 2);

    expect(result).toEqual([
      { groupId: 0, duplicateRows: [2, 4] },
      { groupId: 0, duplicateRows: [1, 4] },
      { groupId: -1, duplicateRows: [] },
      { groupId: 0, duplicateRows: [1, 2] },
    ]);
  });

  it('only merges identical texts at threshold 1.0', () => {
    const result = clusterDuplicates(['apple pie', 'apple pic', 'apple pie'], 1.0, 3);

    expect(result).toEqual([
      { groupId: 0, duplicateRows: [3] },
      { groupId: -1, duplicateRows: [] },
      { groupId: 0, duplicateRows: [1] },
    ]);
  });

  it('accepts prefix length 10 on short texts', () => {
    expect(clusterDuplicates(['cat', 'cat', 'dog'], 0.9, 10)).toEqual([
      { groupId: 0, duplicateRows: [2] },
      { groupId: 0, duplicateRows: [1] },
      { groupId: -1, duplicateRows: [] },
    ]);
  });

  it('misses duplicates whose leading characters differ', () => {
    expect(clusterDuplicates(['apple pie', ' apple pie'], 0.9, 1)).toEqual([
      { groupId: -1, duplicateRows: [] },
      { groupId: -1, duplicateRows: [] },
    ]);
  });

  it('returns an empty result for empty input', () => {
    expect(clusterDuplicates([], 0.9, 3)).toEqual([]);
  });

  it('accepts the boundary thresholds', () => {
    expect(clusterDuplicates(['a', 'b'], 0.5, 1)).toHaveLength(2);
    expect(clusterDuplicates(['a', 'b'], 1.0, 1)).toHaveLength(2);
  });

  it.each([
    [0.4, 3],
    [1.1, 3],
    [0.9, 0],
    [0.9, 11],
  ])('rejects threshold %p with prefix length %p before any work', (threshold, prefixLength) => {
    const onProgress = jest.fn();
    expect(() => clusterDuplicates(['a', 'a'], threshold, prefixLength, onProgress)).toThrow(
      InvalidParameterError
    );
    expect(onProgress).not.toHaveBeenCalled();
  });

  it('names the rejected parameter', () => {
    try {
      clusterDuplicates(['a'], 0.9, 0);
      throw new Error('expected clusterDuplicates to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidParameterError);
      if (error instanceof InvalidParameterError) {
        expect(error.parameter).toBe('prefixLength');
        expect(error.received).toBe(0);
      }
    }
  });

  it('links records transitively through a chain of matches', () => {
    const scorer = pairScorer([
      ['a1', 'a2'],
      ['a2', 'a3'],
    ]);
    const result = clusterDuplicates(['a1', 'a2', 'a3'], 0.9, 1, undefined, { scorer });

    expect(scorer('a1', 'a3')).toBe(0);
    expect(result).toEqual([
      { groupId: 0, duplicateRows: [2, 3] },
      { groupId: 0, duplicateRows: [1, 3] },
      { groupId: 0, duplicateRows: [1, 2] },
    ]);
  });

  it('merges groups under the earlier id and compacts the ids', () => {
    const scorer = pairScorer([
      ['k0', 'k4'],
      ['k1', 'k2'],
      ['k2', 'k4'],
      ['z0', 'z1'],
    ]);
    const texts = ['k0', 'k1', 'k2', 'k3', 'k4', 'z0', 'z1'];
    const result = clusterDuplicates(texts, 0.9, 1, undefined, { scorer });

    expect(result).toEqual([
      { groupId: 0, duplicateRows: [2, 3, 5] },
      { groupId: 0, duplicateRows: [1, 3, 5] },
      { groupId: 0, duplicateRows: [1, 2, 5] },
      { groupId: -1, duplicateRows: [] },
      { groupId: 0, duplicateRows: [1, 2, 3] },
      { groupId: 1, duplicateRows: [7] },
      { groupId: 1, duplicateRows: [6] },
    ]);
  });

  it('skips scoring pairs that are already linked', () => {
    const scorer = jest.fn((a: string, b: string) => (a[0] === b[0] ? 1 : 0));
    clusterDuplicates(['x1', 'x2', 'x3'], 0.9, 1, undefined, { scorer });

    // (0,1) and (0,2) merge everything; (1,2) is already connected
    expect(scorer).toHaveBeenCalledTimes(2);
  });

  it('reports progress at the configured interval and once at the end', () => {
    const calls: Array<[number, number]> = [];
    clusterDuplicates(
      ['a1', 'a2', 'a3', 'a4', 'a5'],
      1.0,
      1,
      (done, total) => calls.push([done, total]),
      { progressInterval: 3 }
    );

    expect(calls).toEqual([
      [3, 10],
      [6, 10],
      [9, 10],
      [10, 10],
    ]);
  });

  it('does not repeat the final progress report', () => {
    const calls: Array<[number, number]> = [];
    clusterDuplicates(
      ['a1', 'a2', 'a3', 'a4', 'a5'],
      1.0,
      1,
      (done, total) => calls.push([done, total]),
      { progressInterval: 5 }
    );

    expect(calls).toEqual([
      [5, 10],
      [10, 10],
    ]);
  });

  it('reports completion when there is nothing to compare', () => {
    const calls: Array<[number, number]> = [];
    clusterDuplicates(['a', 'b'], 0.9, 1, (done, total) => calls.push([done, total]));
    expect(calls).toEqual([[0, 0]]);
  });

  it('aborts between buckets when the stop flag is raised', () => {
    let polls = 0;
    const shouldStop = (): boolean => {
      polls++;
      return polls > 1;
    };

    try {
      clusterDuplicates(['a1', 'a2', 'b1', 'b2'], 0.9, 1, undefined, { shouldStop });
      throw new Error('expected clusterDuplicates to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ClusterAbortedError);
      if (error instanceof ClusterAbortedError) {
        expect(error.bucketsProcessed).toBe(1);
        expect(error.bucketCount).toBe(2);
      }
    }
  });

  it('logs through the supplied logger', () => {
    const logger = createRecordingLogger();
    clusterDuplicates(['cat', 'cat'], 0.9, 3, undefined, { logger });

    expect(logger.lines).toEqual([
      'info [dedupe] Clustering 2 records (threshold 0.9, prefix 3)',
      'debug [dedupe] Comparing 1 pairs across 1 buckets (threshold 0.9)',
      'debug [dedupe] 1 merges from 1 comparisons',
    ]);
  });

  describe('result properties', () => {
    const result = clusterDuplicates(MIXED_RECORDS, 0.85, 2);

    it('has one entry per record', () => {
      expect(result).toHaveLength(MIXED_RECORDS.length);
    });

    it('uses -1 exactly for records without duplicates', () => {
      for (const assignment of result) {
        expect(assignment.groupId === -1).toBe(assignment.duplicateRows.length === 0);
      }
    });

    it('lists duplicates reciprocally', () => {
      result.forEach((assignment, index) => {
        for (const row of assignment.duplicateRows) {
          expect(result[row - 1].duplicateRows).toContain(index + 1);
        }
      });
    });

    it('lists exactly the other members of the group, ascending', () => {
      result.forEach((assignment: DuplicateAssignment, index) => {
        if (assignment.groupId === -1) return;
        const expected = result
          .map((other, otherIndex) => ({ other, otherIndex }))
          .filter(({ other, otherIndex }) => other.groupId === assignment.groupId && otherIndex !== index)
          .map(({ otherIndex }) => otherIndex + 1);
        expect(assignment.duplicateRows).toEqual(expected);
      });
    });

    it('groups the two empty records together', () => {
      expect(result[7].groupId).toBe(result[8].groupId);
      expect(result[7].groupId).toBeGreaterThanOrEqual(0);
    });
  });
});

// ============================================================================
// ClusterBuilder Tests
// ============================================================================

describe('ClusterBuilder', () => {
  it('merges every pair in a bucket at threshold 0', () => {
    const texts = ['Ab', 'aB'];
    expect(similarity('Ab', 'aB')).toBe(0);

    const builder = new ClusterBuilder({ threshold: 0 });
    expect(builder.build(buildBuckets(texts, 1), texts)).toEqual([
      { groupId: 0, duplicateRows: [2] },
      { groupId: 0, duplicateRows: [1] },
    ]);
  });

  it('can be reused across datasets', () => {
    const builder = new ClusterBuilder({ threshold: 0.9 });
    const first = ['dog', 'dog'];
    const second = ['cat', 'cow', 'cat'];

    expect(builder.build(buildBuckets(first, 3), first)[0].groupId).toBe(0);
    expect(builder.build(buildBuckets(second, 3), second)).toEqual([
      { groupId: 0, duplicateRows: [3] },
      { groupId: -1, duplicateRows: [] },
      { groupId: 0, duplicateRows: [1] },
    ]);
  });

  it.each([-0.1, 1.5, Number.NaN])('rejects threshold %p', (threshold) => {
    expect(() => new ClusterBuilder({ threshold })).toThrow(InvalidParameterError);
  });

  it('rejects a non-positive progress interval', () => {
    expect(() => new ClusterBuilder({ threshold: 0.9, progressInterval: 0 })).toThrow(
      /progressInterval/
    );
  });
});

// ============================================================================
// findDuplicates Tests
// ============================================================================

describe('findDuplicates', () => {
  it('normalizes structured records before clustering', () => {
    const result = findDuplicates(
      [
        ['Acme Corp', 'Berlin'],
        ['Acme Corp.', 'Berlin'],
        ['Zenith', 42],
      ],
      { threshold: 0.9, prefixLength: 3 }
    );

    expect(result).toEqual([
      { groupId: 0, duplicateRows: [2] },
      { groupId: 0, duplicateRows: [1] },
      { groupId: -1, duplicateRows: [] },
    ]);
  });

  it('passes progress through', () => {
    const onProgress = jest.fn();
    findDuplicates([['a'], ['a']], { threshold: 0.9, prefixLength: 1 }, { onProgress });
    expect(onProgress).toHaveBeenCalledWith(1, 1);
  });
});

// ============================================================================
// Summary Tests
// ============================================================================

describe('summaries', () => {
  const result = clusterDuplicates(['apple pie', 'appel pie', 'banana', 'applle pie'], 0.85, 2);

  it('collects members per group', () => {
    expect(collectGroups(result)).toEqual([[0, 1, 3]]);
  });

  it('summarizes group counts', () => {
    expect(summarizeAssignments(result)).toEqual({
      recordCount: 4,
      groupCount: 1,
      duplicateRecordCount: 3,
      uniqueRecordCount: 1,
      largestGroupSize: 3,
    });
  });

  it('summarizes empty results', () => {
    expect(summarizeAssignments([])).toEqual({
      recordCount: 0,
      groupCount: 0,
      duplicateRecordCount: 0,
      uniqueRecordCount: 0,
      largestGroupSize: 0,
    });
  });
});
