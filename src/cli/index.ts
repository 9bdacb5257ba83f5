#!/usr/bin/env node
/**
 * Fuzzy Dedupe CLI
 *
 * Main entry point for the fuzzy-dedupe tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   fuzzy-dedupe --help
 *   fuzzy-dedupe dedupe customers.xlsx --threshold 0.92 --columns Name,City
 *   fuzzy-dedupe estimate customers.xlsx --all
 *   fuzzy-dedupe compare "Acme Corp" "ACME Corp."
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { getConfig } from '../config/index.js';
import { BaseCommand, EXIT_CODES, exitCodeFor, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @returns Configured commander Program instance
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('fuzzy-dedupe')
    .description('Find near-duplicate rows in spreadsheets with Jaro-Winkler similarity')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }

    // Surface invalid FUZZY_DEDUPE_* variables before any command runs
    try {
      getConfig();
    } catch (error) {
      baseCommand.error(error instanceof Error ? error.message : String(error), exitCodeFor(error));
    }
  });

  // Register all subcommands
  registerCommands(program);

  // Global error handling
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // Error already handled by commander or base command
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
