/**
 * Spreadsheet Reader
 *
 * Loads the first (or a named) sheet of an .xlsx, .xls or .csv file into a
 * header row plus data rows.
 *
 * @module tabular/reader
 */

import * as fs from 'node:fs/promises';
import * as XLSX from 'xlsx';
import type { FieldValue } from '../dedupe/normalize.js';
import { TabularError, type TableData } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface ReadTableOptions {
  /** Sheet to read (default: the first sheet) */
  sheet?: string;
}

// ============================================================================
// Cell Conversion
// ============================================================================

/**
 * Narrow a raw cell value to a FieldValue.
 */
export function toFieldValue(value: unknown): FieldValue {
  if (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  return String(value);
}

/**
 * Header names from the first row; blank headers become "Column N".
 */
function toHeaders(row: readonly unknown[]): string[] {
  return row.map((cell, index) => {
    const name = cell === null || cell === undefined ? '' : String(cell).trim();
    return name.length > 0 ? name : `Column ${index + 1}`;
  });
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse workbook bytes into a table.
 *
 * @param data - File contents
 * @param options - Sheet selection
 * @param filePath - Used in error messages only
 * @throws {TabularError} When the workbook has no such sheet
 */
export function parseTable(data: Buffer, options: ReadTableOptions = {}, filePath?: string): TableData {
  const workbook = XLSX.read(data, { type: 'buffer', cellDates: true });
  const sheetName = options.sheet ?? workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];

  if (sheetName === undefined || sheet === undefined) {
    const available = workbook.SheetNames.join(', ') || 'none';
    throw new TabularError(
      `Sheet not found: ${options.sheet ?? '(first sheet)'} (available: ${available})`,
      filePath
    );
  }

  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
  });

  const [headerRow, ...dataRows] = grid;
  if (headerRow === undefined) {
    return { sheetName, headers: [], rows: [] };
  }

  const headers = toHeaders(headerRow);
  const width = dataRows.reduce((max, row) => Math.max(max, row.length), headers.length);
  while (headers.length < width) {
    headers.push(`Column ${headers.length + 1}`);
  }

  const rows = dataRows.map((row) =>
    headers.map((_, column) => toFieldValue(row[column]))
  );

  return { sheetName, headers, rows };
}

/**
 * Read a spreadsheet file from disk.
 *
 * @param filePath - Path to an .xlsx, .xls or .csv file
 * @param options - Sheet selection
 * @throws {TabularError} When the file is missing or unreadable
 */
export async function readTable(filePath: string, options: ReadTableOptions = {}): Promise<TableData> {
  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new TabularError(`File not found: ${filePath}`, filePath, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new TabularError(`Could not read ${filePath}: ${message}`, filePath, { cause: error });
  }

  return parseTable(data, options, filePath);
}

// ============================================================================
// Column Selection
// ============================================================================

/**
 * Records to compare: the chosen columns of every row, in the order given.
 *
 * @param table - Loaded table
 * @param columns - Column names to use (default: all columns)
 * @throws {TabularError} When a column name is not in the header row
 */
export function selectColumns(table: TableData, columns?: readonly string[]): FieldValue[][] {
  if (columns === undefined || columns.length === 0) {
    return table.rows.map((row) => [...row]);
  }

  const positions = columns.map((name) => {
    const position = table.headers.indexOf(name);
    if (position === -1) {
      throw new TabularError(
        `Unknown column: ${name} (available: ${table.headers.join(', ')})`
      );
    }
    return position;
  });

  return table.rows.map((row) => positions.map((position) => row[position]));
}
