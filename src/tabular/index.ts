/**
 * Tabular Module Exports
 *
 * Spreadsheet loading and result writing around the grouping engine.
 *
 * @module tabular
 */

export { TabularError, type TableData } from './types.js';
export { readTable, parseTable, selectColumns, toFieldValue, type ReadTableOptions } from './reader.js';
export {
  writeTable,
  annotateTable,
  serializeTable,
  bookTypeFor,
  defaultOutputPath,
  GROUP_COLUMN,
  ROWS_COLUMN,
} from './writer.js';
export { atomicWriteFile } from './atomic.js';
