/**
 * Asset snapshots: the recorded value of one holding on one day.
 *
 * Snapshots are immutable; a newer snapshot supersedes older ones.
 */

import type { Decimal } from '../decimal.js';
import { type Ymd, formatDate, parseDate } from '../format/date.js';
import { decStr, parseAmount } from '../format/amount.js';
import { CURRENT_ASSET_COLUMNS as COL } from '../store/schema.js';
import { cell, type Row } from '../store/store.js';
import type { Clock } from '../clock.js';
import type { IdGenerator } from './id-generator.js';
import { categoryOf, requireText } from './fields.js';

export interface AssetSnapshotType {
  readonly id: string;
  readonly date: Ymd;
  /** Holding name (the sheet's Description column). */
  readonly name: string;
  readonly category: string;
  readonly amount: Decimal;
}

/** Unparsed user input for a new snapshot. */
export interface AssetSnapshotInput {
  /** "YYYY-MM-DD"; today when omitted. */
  date?: string;
  name: string;
  category?: string;
  amount: string;
}

export const AssetSnapshot = {
  new(fields: AssetSnapshotType): AssetSnapshotType {
    return { ...fields };
  },

  /** Validate user input and stamp it with a fresh id. */
  fromInput(input: AssetSnapshotInput, ids: IdGenerator, clock: Clock): AssetSnapshotType {
    return {
      id: ids.newId(),
      date: input.date !== undefined ? parseDate(input.date) : clock.today(),
      name: requireText('name', input.name),
      category: categoryOf(input.category ?? ''),
      amount: parseAmount(input.amount),
    };
  },

  fromRow(row: Row): AssetSnapshotType {
    return {
      id: cell(row, COL.id),
      date: parseDate(cell(row, COL.date)),
      name: requireText('name', cell(row, COL.name)),
      category: categoryOf(cell(row, COL.category)),
      amount: parseAmount(cell(row, COL.amount)),
    };
  },

  toRow(snapshot: AssetSnapshotType): Row {
    return {
      [COL.id]: snapshot.id,
      [COL.date]: formatDate(snapshot.date),
      [COL.amount]: decStr(snapshot.amount),
      [COL.name]: snapshot.name,
      [COL.category]: snapshot.category,
    };
  },
} as const;
