/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - dedupe: Group near-duplicate rows and write the annotated table
 * - estimate: Count comparisons left after blocking
 * - compare: Score two strings
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerDedupeCommand } from './dedupe.js';
import { registerEstimateCommand } from './estimate.js';
import { registerCompareCommand } from './compare.js';

/**
 * Register all CLI commands with the program.
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerDedupeCommand(program);
  registerEstimateCommand(program);
  registerCompareCommand(program);
}

/**
 * Get help text for all available commands.
 *
 * @returns Array of command help entries
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'dedupe <input>', description: 'Group near-duplicate rows and write the annotated table' },
    { name: 'estimate <input>', description: 'Count the comparisons blocking leaves' },
    { name: 'compare <first> <second>', description: 'Show the similarity of two strings' },
  ];
}
