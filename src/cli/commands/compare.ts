/**
 * Compare Command
 *
 * Scores two strings with the same similarity used for grouping.
 *
 * @module cli/commands/compare
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { jaroSimilarity, similarity } from '../../dedupe/similarity.js';
import { validateThreshold } from '../../dedupe/validate.js';
import { type BaseCommand, exitCodeFor, getBaseCommand } from '../base-command.js';
import { parseFormat } from './load.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Raw options for the compare command.
 */
export interface CompareCommandOptions {
  threshold?: string;
  format?: string;
}

/**
 * Scores for one pair of strings.
 */
export interface ComparisonResult {
  first: string;
  second: string;
  jaro: number;
  similarity: number;
  /** Present when a threshold was given */
  match?: boolean;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the compare command.
 *
 * @param program - Commander program instance
 */
export function registerCompareCommand(program: Command): void {
  program
    .command('compare <first> <second>')
    .description('Show the Jaro-Winkler similarity of two strings')
    .option('-t, --threshold <value>', 'Also report whether the pair would merge at this threshold')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action((first: string, second: string, options: CompareCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        handleCompare(first, second, options, base);
      } catch (error) {
        base.error(error instanceof Error ? error.message : String(error), exitCodeFor(error));
      }
    });
}

// ============================================================================
// Command Handler
// ============================================================================

/**
 * Handle the compare command.
 *
 * @param first - First string
 * @param second - Second string
 * @param options - Command options
 * @param base - Base command for output
 */
export function handleCompare(
  first: string,
  second: string,
  options: CompareCommandOptions,
  base: BaseCommand
): ComparisonResult {
  const format = parseFormat(options.format);
  const threshold =
    options.threshold === undefined ? undefined : validateThreshold(Number(options.threshold));

  const result: ComparisonResult = {
    first,
    second,
    jaro: jaroSimilarity(first, second),
    similarity: similarity(first, second),
  };
  if (threshold !== undefined) {
    result.match = result.similarity >= threshold;
  }

  if (format === 'json') {
    base.json(result);
    return result;
  }

  console.log(`Similarity: ${result.similarity.toFixed(6)}`);
  console.log(chalk.dim(`Jaro:       ${result.jaro.toFixed(6)}`));
  if (threshold !== undefined) {
    const verdict = result.match ? chalk.green('match') : chalk.yellow('no match');
    console.log(`Threshold:  ${threshold} (${verdict})`);
  }

  return result;
}

export default registerCompareCommand;
