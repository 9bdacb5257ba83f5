/**
 * Dedupe Command
 *
 * Loads a spreadsheet, groups near-duplicate rows and writes the table back
 * out with duplicate_group and duplicate_rows columns.
 *
 * @module cli/commands/dedupe
 */

import { Command } from 'commander';
import {
  DEFAULT_PREFIX_LENGTH,
  DEFAULT_THRESHOLD,
  getConfig,
  type Config,
} from '../../config/index.js';
import { estimateComparisons } from '../../dedupe/blocking.js';
import { clusterDuplicates } from '../../dedupe/cluster.js';
import { InvalidParameterError } from '../../dedupe/errors.js';
import { collectGroups, summarizeAssignments } from '../../dedupe/summary.js';
import { validateParams } from '../../dedupe/validate.js';
import type { DedupeParams } from '../../schemas/params.js';
import type { ComparisonEstimate, DedupeSummary, DuplicateAssignment } from '../../schemas/result.js';
import { defaultOutputPath, writeTable } from '../../tabular/writer.js';
import { type BaseCommand, exitCodeFor, getBaseCommand } from '../base-command.js';
import { createProgressBar, createSpinner } from '../formatters/progress.js';
import { formatDedupeSummary, formatQuickSummary } from '../formatters/summary.js';
import {
  loadInput,
  numericOption,
  parseColumnList,
  parseFormat,
  type InputSelection,
  type OutputFormat,
} from './load.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Raw options for the dedupe command, as commander hands them over.
 */
export interface DedupeCommandOptions {
  threshold?: string;
  prefixLength?: string;
  columns?: string;
  sheet?: string;
  output?: string;
  timeout?: string;
  format?: string;
}

/**
 * Validated settings for one dedupe run.
 */
export interface DedupePlan extends InputSelection {
  inputPath: string;
  outputPath: string;
  params: DedupeParams;
  progressInterval: number;
  /** Stop clustering after this many milliseconds */
  timeoutMs?: number;
  format: OutputFormat;
}

/**
 * What a finished run produced.
 */
export interface DedupeOutcome {
  assignments: DuplicateAssignment[];
  summary: DedupeSummary;
  estimate: ComparisonEstimate;
}

// ============================================================================
// Option Resolution
// ============================================================================

/**
 * Convert --timeout seconds to milliseconds.
 *
 * @throws {InvalidParameterError} Unless the value is a positive number
 */
export function parseTimeout(value?: string): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidParameterError(
      `Invalid timeout: ${value} (expected a positive number of seconds)`,
      'timeout',
      value
    );
  }
  return seconds * 1000;
}

/**
 * Validate command options against configured defaults.
 *
 * @param inputPath - Spreadsheet to read
 * @param options - Raw command options
 * @param defaults - Values used for options that were not given
 * @throws {InvalidParameterError} For out-of-range or malformed options
 */
export function resolveDedupePlan(
  inputPath: string,
  options: DedupeCommandOptions,
  defaults: Config['defaults'] = getConfig().defaults
): DedupePlan {
  const params = validateParams(
    numericOption(options.threshold, defaults.threshold),
    numericOption(options.prefixLength, defaults.prefixLength)
  );

  return {
    inputPath,
    outputPath: options.output ?? defaultOutputPath(inputPath),
    params,
    progressInterval: defaults.progressInterval,
    timeoutMs: parseTimeout(options.timeout),
    format: parseFormat(options.format),
    sheet: options.sheet,
    columns: parseColumnList(options.columns),
  };
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the dedupe command.
 *
 * @param program - Commander program instance
 */
export function registerDedupeCommand(program: Command): void {
  program
    .command('dedupe <input>')
    .description('Group near-duplicate rows of a spreadsheet and write the annotated table')
    .option(
      '-t, --threshold <value>',
      `Similarity threshold, 0.5-1.0 (default: FUZZY_DEDUPE_THRESHOLD or ${DEFAULT_THRESHOLD})`
    )
    .option(
      '-p, --prefix-length <count>',
      `Blocking prefix length, 1-10 (default: FUZZY_DEDUPE_PREFIX_LENGTH or ${DEFAULT_PREFIX_LENGTH})`
    )
    .option('-c, --columns <list>', 'Comma-separated columns to compare (default: all)')
    .option('-s, --sheet <name>', 'Sheet to read (default: first sheet)')
    .option('-o, --output <path>', 'Output file (.xlsx, .xls or .csv)')
    .option('--timeout <seconds>', 'Stop clustering after this many seconds')
    .option('-f, --format <type>', 'Summary format: table, json', 'table')
    .action(async (input: string, options: DedupeCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        await runDedupe(resolveDedupePlan(input, options), base);
      } catch (error) {
        base.error(error instanceof Error ? error.message : String(error), exitCodeFor(error));
      }
    });
}

// ============================================================================
// Command Handler
// ============================================================================

/**
 * Run one dedupe plan end to end.
 *
 * @param plan - Validated settings
 * @param base - Base command for output
 */
export async function runDedupe(plan: DedupePlan, base: BaseCommand): Promise<DedupeOutcome> {
  const json = plan.format === 'json';
  const silent = json || base.isQuiet();
  const { params } = plan;

  const { table, texts } = await loadInput(plan.inputPath, plan, base, json);

  const estimate = estimateComparisons(texts, params.prefixLength);
  base.debug(
    `${estimate.bucketCount} buckets, ${estimate.comparisons} of ${estimate.possibleComparisons} pairs to compare`
  );

  const progress = createProgressBar(estimate.comparisons, 'Comparing', 30, silent);
  const timeoutMs = plan.timeoutMs;
  const deadline = timeoutMs === undefined ? undefined : Date.now() + timeoutMs;
  const startedAt = Date.now();

  let assignments: DuplicateAssignment[];
  try {
    assignments = clusterDuplicates(
      texts,
      params.threshold,
      params.prefixLength,
      (done) => progress.update(done),
      {
        progressInterval: plan.progressInterval,
        shouldStop: deadline === undefined ? undefined : () => Date.now() > deadline,
        logger: json ? undefined : base.asLogger(),
      }
    );
  } catch (error) {
    progress.fail(error instanceof Error ? error.message : undefined);
    throw error;
  }
  progress.complete();
  const durationMs = Date.now() - startedAt;

  const writer = createSpinner(`Writing ${plan.outputPath}`, { silent });
  writer.start();
  try {
    await writeTable(plan.outputPath, table, assignments);
  } catch (error) {
    writer.fail(`Failed to write ${plan.outputPath}`);
    throw error;
  }
  writer.succeed(`Wrote ${plan.outputPath}`);

  const summary = summarizeAssignments(assignments);

  if (json) {
    base.json({
      input: plan.inputPath,
      output: plan.outputPath,
      params,
      estimate,
      summary,
      groups: collectGroups(assignments).map((members) => members.map((index) => index + 1)),
    });
  } else if (base.isQuiet()) {
    console.log(formatQuickSummary(summary));
  } else {
    base.blank();
    console.log(
      formatDedupeSummary({
        inputPath: plan.inputPath,
        outputPath: plan.outputPath,
        threshold: params.threshold,
        prefixLength: params.prefixLength,
        summary,
        estimate,
        durationMs,
      })
    );
  }

  return { assignments, summary, estimate };
}

export default registerDedupeCommand;
