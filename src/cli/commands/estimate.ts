/**
 * Estimate Command
 *
 * Reports how many pairwise comparisons blocking leaves for a spreadsheet,
 * without clustering it.
 *
 * @module cli/commands/estimate
 */

import { Command } from 'commander';
import { DEFAULT_PREFIX_LENGTH, getConfig } from '../../config/index.js';
import { estimateComparisons } from '../../dedupe/blocking.js';
import { validatePrefixLength } from '../../dedupe/validate.js';
import { MAX_PREFIX_LENGTH, MIN_PREFIX_LENGTH } from '../../schemas/params.js';
import type { ComparisonEstimate } from '../../schemas/result.js';
import { type BaseCommand, exitCodeFor, getBaseCommand } from '../base-command.js';
import { formatEstimate, formatEstimateTable } from '../formatters/summary.js';
import { loadInput, numericOption, parseColumnList, parseFormat } from './load.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Raw options for the estimate command.
 */
export interface EstimateCommandOptions {
  prefixLength?: string;
  columns?: string;
  sheet?: string;
  all?: boolean;
  format?: string;
}

/**
 * Estimate for one prefix length.
 */
export interface PrefixEstimate {
  prefixLength: number;
  estimate: ComparisonEstimate;
}

// ============================================================================
// Estimation
// ============================================================================

/**
 * Estimate every supported prefix length, shortest first.
 */
export function estimateAllPrefixes(texts: readonly string[]): PrefixEstimate[] {
  const rows: PrefixEstimate[] = [];
  for (let prefixLength = MIN_PREFIX_LENGTH; prefixLength <= MAX_PREFIX_LENGTH; prefixLength++) {
    rows.push({ prefixLength, estimate: estimateComparisons(texts, prefixLength) });
  }
  return rows;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the estimate command.
 *
 * @param program - Commander program instance
 */
export function registerEstimateCommand(program: Command): void {
  program
    .command('estimate <input>')
    .description('Count the comparisons blocking leaves for a spreadsheet')
    .option(
      '-p, --prefix-length <count>',
      `Blocking prefix length, 1-10 (default: FUZZY_DEDUPE_PREFIX_LENGTH or ${DEFAULT_PREFIX_LENGTH})`
    )
    .option('-c, --columns <list>', 'Comma-separated columns to compare (default: all)')
    .option('-s, --sheet <name>', 'Sheet to read (default: first sheet)')
    .option('-a, --all', 'Show every prefix length from 1 to 10')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action(async (input: string, options: EstimateCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        await handleEstimate(input, options, base);
      } catch (error) {
        base.error(error instanceof Error ? error.message : String(error), exitCodeFor(error));
      }
    });
}

// ============================================================================
// Command Handler
// ============================================================================

/**
 * Handle the estimate command.
 *
 * @param input - Spreadsheet to read
 * @param options - Command options
 * @param base - Base command for output
 */
export async function handleEstimate(
  input: string,
  options: EstimateCommandOptions,
  base: BaseCommand
): Promise<PrefixEstimate[]> {
  const format = parseFormat(options.format);
  const prefixLength = options.all
    ? undefined
    : validatePrefixLength(numericOption(options.prefixLength, getConfig().defaults.prefixLength));

  const { texts } = await loadInput(
    input,
    { sheet: options.sheet, columns: parseColumnList(options.columns) },
    base,
    format === 'json'
  );

  const rows =
    prefixLength === undefined
      ? estimateAllPrefixes(texts)
      : [{ prefixLength, estimate: estimateComparisons(texts, prefixLength) }];

  if (format === 'json') {
    base.json(rows);
    return rows;
  }

  base.blank();
  if (prefixLength === undefined) {
    console.log(formatEstimateTable(rows));
  } else {
    console.log(formatEstimate(rows[0].estimate, prefixLength));
  }

  return rows;
}

export default registerEstimateCommand;
