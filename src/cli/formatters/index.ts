/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  createSpinner,
  createProgressBar,
  renderProgressLine,
  formatDuration,
  type SpinnerOptions,
  type ProgressBar,
} from './progress.js';

// Result summary formatters
export {
  formatEstimate,
  formatEstimateTable,
  formatDedupeSummary,
  formatQuickSummary,
  formatPercent,
  type DedupeRunSummary,
} from './summary.js';
