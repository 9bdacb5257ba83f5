/**
 * Record Normalization
 *
 * Turns a row of field values into the single text string the engine
 * compares. Used before blocking and scoring.
 *
 * @module dedupe/normalize
 */

/**
 * A single cell value as loaded from a spreadsheet.
 */
export type FieldValue = string | number | boolean | Date | null | undefined;

/**
 * Separator placed between field values.
 */
export const FIELD_SEPARATOR = ' ';

/**
 * Render one field value as text, or null when it is missing.
 *
 * Missing values are null, undefined, NaN, invalid dates and empty strings.
 */
export function fieldToText(value: FieldValue): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isNaN(value) ? null : String(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  const text = String(value);
  return text.length > 0 ? text : null;
}

/**
 * Normalize a record into comparable text.
 *
 * Present field values are coerced to text and joined with a single space.
 * Case and surrounding whitespace are left untouched; blocking lower-cases
 * its own keys.
 *
 * @param fields - Field values of one record, in column order
 * @returns The record's normalized text ('' when every field is missing)
 * @example
 * ```typescript
 * normalizeRecord(['Acme Corp', 42, null, 'Berlin']);
 * // 'Acme Corp 42 Berlin'
 * ```
 */
export function normalizeRecord(fields: readonly FieldValue[]): string {
  const parts: string[] = [];
  for (const field of fields) {
    const text = fieldToText(field);
    if (text !== null) {
      parts.push(text);
    }
  }
  return parts.join(FIELD_SEPARATOR);
}

/**
 * Normalize every record of a dataset, preserving order.
 */
export function normalizeRecords(records: readonly (readonly FieldValue[])[]): string[] {
  return records.map((record) => normalizeRecord(record));
}
