/**
 * Tabular Data Types
 *
 * @module tabular/types
 */

import type { FieldValue } from '../dedupe/normalize.js';

/**
 * A sheet loaded into memory: one header row plus data rows.
 * Every row has exactly `headers.length` cells.
 */
export interface TableData {
  /** Name of the sheet the data came from */
  sheetName: string;
  /** Column names from the first row */
  headers: string[];
  /** Data rows in file order; row i is spreadsheet data row i + 1 */
  rows: FieldValue[][];
}

/**
 * Reading, selecting or writing a table failed.
 */
export class TabularError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TabularError';
  }
}
