/**
 * Cell-level parsing helpers shared by the row mappers.
 */

import { FormatError } from '../errors.js';
import type { TableName } from '../store/schema.js';
import type { Row } from '../store/store.js';

export const UNCATEGORIZED = 'Uncategorized';

const TRUE_WORDS = new Set(['true', 'yes', '1']);
const FALSE_WORDS = new Set(['false', 'no', '0', '']);

/** Parse a boolean cell. An empty cell is `false`. */
export function parseBoolean(text: string): boolean {
  const lowered = text.trim().toLowerCase();
  if (TRUE_WORDS.has(lowered)) return true;
  if (FALSE_WORDS.has(lowered)) return false;
  throw new FormatError('flag', text, 'TRUE or FALSE');
}

export function formatBoolean(value: boolean): string {
  return value ? 'TRUE' : 'FALSE';
}

/** A trimmed, non-empty text value. */
export function requireText(field: string, text: string): string {
  const trimmed = text.trim();
  if (trimmed === '') throw new FormatError(field, text, 'a non-empty value');
  return trimmed;
}

/** The category a row belongs to; blank cells fall into {@link UNCATEGORIZED}. */
export function categoryOf(text: string): string {
  const trimmed = text.trim();
  return trimmed === '' ? UNCATEGORIZED : trimmed;
}

export function isBlankRow(row: Row): boolean {
  return Object.values(row).every((v) => v.trim() === '');
}

/**
 * Parse every non-blank row of a table in store order.
 *
 * A `FormatError` from `parseRow` is re-raised with the table and row index
 * attached; no row is ever skipped for being malformed.
 */
export function parseRows<T>(
  table: TableName,
  rows: readonly Row[],
  parseRow: (row: Row, rowIndex: number) => T,
): T[] {
  const out: T[] = [];
  rows.forEach((row, rowIndex) => {
    if (isBlankRow(row)) return;
    try {
      out.push(parseRow(row, rowIndex));
    } catch (err) {
      if (err instanceof FormatError && err.location === undefined) {
        throw err.at({ table, rowIndex });
      }
      throw err;
    }
  });
  return out;
}
