/**
 * Result Summary Formatters
 *
 * CLI output formatters for deduplication results including:
 * - Comparison workload estimates
 * - Estimate table across prefix lengths
 * - Run summary after clustering
 *
 * @module cli/formatters/summary
 */

import chalk from 'chalk';
import type { ComparisonEstimate, DedupeSummary } from '../../schemas/result.js';
import { formatDuration } from './progress.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Run summary data for formatting.
 */
export interface DedupeRunSummary {
  /** Input file path */
  inputPath: string;
  /** Output file path, when one was written */
  outputPath?: string;
  /** Similarity threshold used */
  threshold: number;
  /** Prefix length used */
  prefixLength: number;
  /** Counts from the assignments */
  summary: DedupeSummary;
  /** Comparison workload */
  estimate: ComparisonEstimate;
  /** Clustering wall time */
  durationMs: number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Format a count with thousands separators.
 */
function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/**
 * Format a 0..1 ratio as a percentage with one decimal.
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Pad a string to a fixed width.
 */
function padRight(str: string, width: number): string {
  return str + ' '.repeat(Math.max(0, width - str.length));
}

// ============================================================================
// Estimate Formatters
// ============================================================================

/**
 * Format a comparison estimate for one prefix length.
 *
 * @example
 * ```
 * === Comparison Estimate ===
 * Records:      3
 * Buckets:      2 (prefix length 2)
 * Comparisons:  1 of 3 possible (33.3%)
 * ```
 */
export function formatEstimate(estimate: ComparisonEstimate, prefixLength: number): string {
  const lines: string[] = [];

  lines.push(chalk.bold('=== Comparison Estimate ==='));
  lines.push(`Records:      ${formatCount(estimate.recordCount)}`);
  lines.push(`Buckets:      ${formatCount(estimate.bucketCount)} (prefix length ${prefixLength})`);
  lines.push(
    `Comparisons:  ${formatCount(estimate.comparisons)} of ${formatCount(estimate.possibleComparisons)} possible (${formatPercent(estimate.reductionRatio)})`
  );

  return lines.join('\n');
}

/**
 * Format estimates for several prefix lengths as a table.
 *
 * @param rows - Prefix length and its estimate, in display order
 */
export function formatEstimateTable(
  rows: ReadonlyArray<{ prefixLength: number; estimate: ComparisonEstimate }>
): string {
  const lines: string[] = [];

  lines.push(
    chalk.bold(
      padRight('PREFIX', 8) + padRight('BUCKETS', 12) + padRight('COMPARISONS', 16) + 'OF ALL PAIRS'
    )
  );
  lines.push(chalk.dim('-'.repeat(48)));

  for (const { prefixLength, estimate } of rows) {
    lines.push(
      padRight(String(prefixLength), 8) +
        padRight(formatCount(estimate.bucketCount), 12) +
        padRight(formatCount(estimate.comparisons), 16) +
        formatPercent(estimate.reductionRatio)
    );
  }

  return lines.join('\n');
}

// ============================================================================
// Run Summary Formatter
// ============================================================================

/**
 * Format the summary printed after a deduplication run.
 *
 * @example
 * ```
 * === Deduplication Complete ===
 * Input:     customers.xlsx
 * Output:    customers_deduplicated.xlsx
 * Threshold: 0.9 | Prefix length: 3
 * Duration:  1.2s
 *
 * Results:
 *   Records:              1,204
 *   Duplicate groups:     57
 *   Records in groups:    131
 *   Unique records:       1,073
 *   Largest group:        4
 *   Comparisons:          18,330 (2.5% of all pairs)
 * ```
 */
export function formatDedupeSummary(run: DedupeRunSummary): string {
  const lines: string[] = [];
  const { summary, estimate } = run;

  lines.push(chalk.bold('=== Deduplication Complete ==='));
  lines.push(`Input:     ${chalk.cyan(run.inputPath)}`);
  if (run.outputPath) {
    lines.push(`Output:    ${chalk.cyan(run.outputPath)}`);
  }
  lines.push(`Threshold: ${run.threshold} | Prefix length: ${run.prefixLength}`);
  lines.push(`Duration:  ${formatDuration(run.durationMs)}`);
  lines.push('');

  lines.push('Results:');
  lines.push(`  Records:              ${formatCount(summary.recordCount)}`);
  lines.push(`  Duplicate groups:     ${formatCount(summary.groupCount)}`);
  lines.push(`  Records in groups:    ${formatCount(summary.duplicateRecordCount)}`);
  lines.push(`  Unique records:       ${formatCount(summary.uniqueRecordCount)}`);
  lines.push(`  Largest group:        ${formatCount(summary.largestGroupSize)}`);
  lines.push(
    `  Comparisons:          ${formatCount(estimate.comparisons)} (${formatPercent(estimate.reductionRatio)} of all pairs)`
  );

  return lines.join('\n');
}

/**
 * One-line status for quiet mode.
 *
 * @example
 * ```
 * 57 groups, 131 of 1,204 records duplicated
 * ```
 */
export function formatQuickSummary(summary: DedupeSummary): string {
  const groupWord = summary.groupCount === 1 ? 'group' : 'groups';
  return `${formatCount(summary.groupCount)} ${groupWord}, ${formatCount(summary.duplicateRecordCount)} of ${formatCount(summary.recordCount)} records duplicated`;
}
