/**
 * Progress Formatters
 *
 * CLI progress display utilities including:
 * - Spinner for file loading and writing
 * - Progress bar for pairwise comparisons
 *
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora from 'ora';
import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Hide the spinner entirely (quiet mode) */
  silent?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Loading customers.xlsx');
 * spinner.start();
 *
 * try {
 *   await readTable('customers.xlsx');
 *   spinner.succeed('Loaded 1,204 rows');
 * } catch (err) {
 *   spinner.fail('Failed to load customers.xlsx');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: ora.Ora;
  private readonly silent: boolean;
  private startTime: number = 0;

  /**
   * Create a new progress spinner.
   *
   * @param text - Initial spinner text
   * @param options - Spinner options
   */
  constructor(text: string, options: SpinnerOptions = {}) {
    this.silent = options.silent === true;

    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: process.stdout.isTTY === true && !this.silent,
      isSilent: this.silent,
      stream: process.stdout,
    });
  }

  /**
   * Start the spinner.
   *
   * @param text - Optional text to display
   */
  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  /**
   * Stop spinner with success state.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  /**
   * Stop spinner with failure state.
   */
  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }
}

// ============================================================================
// Progress Bar
// ============================================================================

/**
 * Simple progress bar for batch operations.
 *
 * @example
 * ```typescript
 * const progress = createProgressBar(estimate.comparisons, 'Comparing');
 * clusterDuplicates(texts, 0.9, 3, (done) => progress.update(done));
 * progress.complete();
 * ```
 */
export interface ProgressBar {
  /** Update progress to a specific value */
  update(current: number): void;
  /** Complete the progress bar */
  complete(): void;
  /** Fail the progress bar */
  fail(message?: string): void;
}

/**
 * Render one progress bar line.
 *
 * An empty workload (total 0) renders as complete.
 */
export function renderProgressLine(
  current: number,
  total: number,
  label: string,
  width: number
): string {
  const fraction = total === 0 ? 1 : Math.min(1, current / total);
  const percentage = Math.round(fraction * 100);
  const filled = Math.round(fraction * width);
  const empty = width - filled;

  const bar = chalk.green('█'.repeat(filled)) + chalk.dim('░'.repeat(empty));
  return `${label}: ${bar} ${percentage}% (${current.toLocaleString('en-US')}/${total.toLocaleString('en-US')})`;
}

/**
 * Create a progress bar.
 *
 * @param total - Total items to process
 * @param label - Label to display
 * @param width - Bar width in characters
 * @param silent - Print nothing at all (quiet mode)
 */
export function createProgressBar(
  total: number,
  label: string = 'Progress',
  width: number = 30,
  silent: boolean = false
): ProgressBar {
  const isTTY = process.stdout.isTTY === true && !silent;
  let lastOutput = '';

  const render = (current: number) => {
    const output = renderProgressLine(current, total, label, width);

    if (isTTY) {
      // Clear previous line and write new one
      if (lastOutput) {
        process.stdout.write('\r' + ' '.repeat(lastOutput.length) + '\r');
      }
      process.stdout.write(output);
      lastOutput = output;
    }
  };

  return {
    update(current: number) {
      render(current);
    },

    complete() {
      if (isTTY && lastOutput) {
        process.stdout.write('\n');
      }
      if (!silent) {
        console.log(chalk.green(`${label}: Complete (${total.toLocaleString('en-US')} comparisons)`));
      }
    },

    fail(message?: string) {
      if (isTTY && lastOutput) {
        process.stdout.write('\n');
      }
      if (!silent) {
        console.log(chalk.red(`${label}: Failed${message ? ` - ${message}` : ''}`));
      }
    },
  };
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @param ms - Duration in milliseconds
 * @returns Formatted duration string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a spinner for a single operation.
 */
export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
