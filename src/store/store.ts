import type { TableName } from './schema.js';

/**
 * One worksheet row: header text to cell text, in column order.
 *
 * Missing cells read as absent keys; adapters never interpret values.
 */
export type Row = Readonly<Record<string, string>>;

/**
 * Async read/append/update interface over the remote tabular store.
 *
 * `rowIndex` is zero-based and counts data rows only (the header row is not
 * addressable). Adapters report failures as `StoreUnavailable`.
 */
export interface TabularStore {
  readAll(table: TableName): Promise<Row[]>;
  appendRow(table: TableName, row: Row): Promise<void>;
  updateRow(table: TableName, rowIndex: number, row: Row): Promise<void>;
}

/** Read a cell, trimming whitespace around both the header and the value. */
export function cell(row: Row, column: string): string {
  const direct = row[column];
  if (direct !== undefined) return direct.trim();
  for (const [key, value] of Object.entries(row)) {
    if (key.trim() === column) return value.trim();
  }
  return '';
}
