import { StoreUnavailable } from '../errors.js';
import type { TableName } from './schema.js';
import { TABLE_NAMES } from './schema.js';
import type { Row, TabularStore } from './store.js';

export type MemorySeed = Partial<Record<TableName, readonly Row[]>>;

/**
 * In-memory tabular store.
 *
 * Keeps each table as an array of row copies in append order, so reads see
 * exactly what a worksheet would return. Used by tests and for scratch runs
 * without a spreadsheet.
 */
export class MemoryTabularStore implements TabularStore {
  private readonly tables = new Map<TableName, Row[]>();

  constructor(seed: MemorySeed = {}) {
    for (const table of TABLE_NAMES) {
      this.tables.set(
        table,
        (seed[table] ?? []).map((row) => ({ ...row })),
      );
    }
  }

  async readAll(table: TableName): Promise<Row[]> {
    return this.rowsOf(table).map((row) => ({ ...row }));
  }

  async appendRow(table: TableName, row: Row): Promise<void> {
    this.rowsOf(table).push({ ...row });
  }

  async updateRow(table: TableName, rowIndex: number, row: Row): Promise<void> {
    const rows = this.rowsOf(table);
    if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= rows.length) {
      throw new StoreUnavailable(
        table,
        'update',
        new RangeError(`row ${String(rowIndex)} out of range (0..${String(rows.length - 1)})`),
      );
    }
    rows[rowIndex] = { ...row };
  }

  private rowsOf(table: TableName): Row[] {
    let rows = this.tables.get(table);
    if (rows === undefined) {
      rows = [];
      this.tables.set(table, rows);
    }
    return rows;
  }
}
