/**
 * Spreadsheet Writer
 *
 * Writes the loaded table back out with two extra columns:
 * - duplicate_group: group id, or -1 for records without duplicates
 * - duplicate_rows: comma-separated row numbers of the other group members
 *
 * @module tabular/writer
 */

import * as path from 'node:path';
import * as XLSX from 'xlsx';
import type { FieldValue } from '../dedupe/normalize.js';
import type { DuplicateAssignment } from '../schemas/result.js';
import { atomicWriteFile } from './atomic.js';
import { TabularError, type TableData } from './types.js';

// ============================================================================
// Constants
// ============================================================================

export const GROUP_COLUMN = 'duplicate_group';
export const ROWS_COLUMN = 'duplicate_rows';

/** Output book type per file extension */
const BOOK_TYPES: Record<string, XLSX.BookType> = {
  '.xlsx': 'xlsx',
  '.xls': 'biff8',
  '.csv': 'csv',
};

// ============================================================================
// Table Annotation
// ============================================================================

/**
 * Append the duplicate columns to a table.
 *
 * Existing columns with the same names are replaced rather than repeated.
 *
 * @throws {TabularError} When assignments and rows differ in count
 */
export function annotateTable(
  table: TableData,
  assignments: readonly DuplicateAssignment[]
): TableData {
  if (assignments.length !== table.rows.length) {
    throw new TabularError(
      `Expected ${table.rows.length} assignments, got ${assignments.length}`
    );
  }

  const kept = table.headers
    .map((header, position) => ({ header, position }))
    .filter(({ header }) => header !== GROUP_COLUMN && header !== ROWS_COLUMN);

  const headers = [...kept.map(({ header }) => header), GROUP_COLUMN, ROWS_COLUMN];
  const rows = table.rows.map((row, index): FieldValue[] => {
    const assignment = assignments[index];
    return [
      ...kept.map(({ position }) => row[position]),
      assignment.groupId,
      assignment.duplicateRows.join(', '),
    ];
  });

  return { sheetName: table.sheetName, headers, rows };
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Book type to write for an output path.
 *
 * @throws {TabularError} For extensions other than .xlsx, .xls and .csv
 */
export function bookTypeFor(filePath: string): XLSX.BookType {
  const bookType = BOOK_TYPES[path.extname(filePath).toLowerCase()];
  if (bookType === undefined) {
    throw new TabularError(
      `Unsupported output format: ${path.extname(filePath) || '(none)'} (use .xlsx, .xls or .csv)`,
      filePath
    );
  }
  return bookType;
}

/**
 * Serialize a table into workbook bytes.
 */
export function serializeTable(table: TableData, bookType: XLSX.BookType): Buffer {
  const sheet = XLSX.utils.aoa_to_sheet([table.headers, ...table.rows], { cellDates: true });
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, table.sheetName);

  const output: unknown = XLSX.write(workbook, { type: 'buffer', bookType });
  if (!Buffer.isBuffer(output)) {
    throw new TabularError(`Workbook serialization returned no data for ${bookType}`);
  }
  return output;
}

/**
 * Write a table annotated with duplicate assignments.
 *
 * @param filePath - Destination; its extension picks the format
 * @param table - Table as loaded
 * @param assignments - One assignment per table row
 */
export async function writeTable(
  filePath: string,
  table: TableData,
  assignments: readonly DuplicateAssignment[]
): Promise<void> {
  const bookType = bookTypeFor(filePath);
  const annotated = annotateTable(table, assignments);
  await atomicWriteFile(filePath, serializeTable(annotated, bookType));
}

/**
 * Default output path: `<name>_deduplicated.xlsx` beside the input.
 *
 * @example
 * ```typescript
 * defaultOutputPath('/data/customers.csv');
 * // '/data/customers_deduplicated.xlsx'
 * ```
 */
export function defaultOutputPath(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}_deduplicated.xlsx`);
}
