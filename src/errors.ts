/**
 * Error kinds raised by row parsing and store adapters.
 */

import type { TableName } from './store/schema.js';

export interface RowLocation {
  table: TableName;
  /** Zero-based index of the data row (the header row is not counted). */
  rowIndex: number;
}

/**
 * A cell that could not be parsed as the value its column requires.
 *
 * Carries the raw text and, when raised while reading a table, the row it came
 * from. Parsing never skips a malformed row; the whole computation fails.
 */
export class FormatError extends Error {
  public readonly raw: string;
  public readonly field: string;
  public readonly expected: string;
  public readonly location?: RowLocation;

  constructor(field: string, raw: string, expected: string, location?: RowLocation) {
    const where =
      location !== undefined ? ` in ${location.table} row ${String(location.rowIndex + 1)}` : '';
    super(`Invalid ${field} ${JSON.stringify(raw)}${where}: expected ${expected}`);
    this.name = 'FormatError';
    this.raw = raw;
    this.field = field;
    this.expected = expected;
    if (location !== undefined) {
      this.location = location;
    }
  }

  /** Re-raise with the row that produced the bad cell attached. */
  at(location: RowLocation): FormatError {
    return new FormatError(this.field, this.raw, this.expected, location);
  }
}

export type StoreOperation = 'read' | 'append' | 'update';

/**
 * A store adapter could not complete a read or write.
 *
 * The core never retries; the error travels unchanged to the caller.
 */
export class StoreUnavailable extends Error {
  public readonly table: TableName;
  public readonly operation: StoreOperation;

  constructor(table: TableName, operation: StoreOperation, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Store ${operation} failed for ${table}: ${reason}`, { cause });
    this.name = 'StoreUnavailable';
    this.table = table;
    this.operation = operation;
  }
}
