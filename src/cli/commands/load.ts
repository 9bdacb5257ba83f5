/**
 * Shared input loading for the dedupe and estimate commands.
 *
 * @module cli/commands/load
 */

import { normalizeRecords } from '../../dedupe/normalize.js';
import { InvalidParameterError } from '../../dedupe/errors.js';
import { readTable, selectColumns } from '../../tabular/reader.js';
import type { TableData } from '../../tabular/types.js';
import type { BaseCommand } from '../base-command.js';
import { createSpinner } from '../formatters/progress.js';

// ============================================================================
// Types
// ============================================================================

export type OutputFormat = 'table' | 'json';

/**
 * Where to read records from and which fields to compare.
 */
export interface InputSelection {
  /** Sheet to read (default: first) */
  sheet?: string;
  /** Columns to compare (default: all) */
  columns?: string[];
}

/**
 * A loaded table with one normalized text per row.
 */
export interface LoadedInput {
  table: TableData;
  texts: string[];
}

// ============================================================================
// Option Parsing
// ============================================================================

/**
 * Split a comma-separated column list. Blank entries are dropped.
 *
 * @example
 * ```typescript
 * parseColumnList('Name, City,'); // ['Name', 'City']
 * parseColumnList(undefined);     // undefined
 * ```
 */
export function parseColumnList(value?: string): string[] | undefined {
  if (value === undefined) return undefined;
  const columns = value
    .split(',')
    .map((column) => column.trim())
    .filter((column) => column.length > 0);
  return columns.length > 0 ? columns : undefined;
}

/**
 * Validate the --format option.
 *
 * @throws {InvalidParameterError} For anything but table or json
 */
export function parseFormat(value?: string): OutputFormat {
  if (value === undefined || value === 'table') return 'table';
  if (value === 'json') return 'json';
  throw new InvalidParameterError(`Invalid format: ${value} (use table or json)`, 'format', value);
}

/**
 * Read a numeric option, falling back to a default when absent.
 */
export function numericOption(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : Number(value);
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load a spreadsheet and normalize the selected columns of every row.
 *
 * @param inputPath - Spreadsheet to read
 * @param selection - Sheet and columns
 * @param base - Output helper; spinners are silent in quiet mode
 * @param silent - Suppress the spinner regardless of mode (JSON output)
 */
export async function loadInput(
  inputPath: string,
  selection: InputSelection,
  base: BaseCommand,
  silent: boolean = false
): Promise<LoadedInput> {
  const spinner = createSpinner(`Loading ${inputPath}`, { silent: silent || base.isQuiet() });
  spinner.start();

  let table: TableData;
  let texts: string[];
  try {
    table = await readTable(inputPath, { sheet: selection.sheet });
    texts = normalizeRecords(selectColumns(table, selection.columns));
  } catch (error) {
    spinner.fail(`Failed to load ${inputPath}`);
    throw error;
  }

  spinner.succeed(`Loaded ${table.rows.length.toLocaleString('en-US')} rows from ${table.sheetName}`);
  base.debug(`Comparing columns: ${(selection.columns ?? table.headers).join(', ')}`);

  return { table, texts };
}
