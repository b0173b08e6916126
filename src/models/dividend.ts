/**
 * Dividend payments. Append-only, like transactions.
 */

import type { Decimal } from '../decimal.js';
import { type Ymd, formatDate, parseDate } from '../format/date.js';
import { decStr, parseAmount } from '../format/amount.js';
import { DIVIDEND_COLUMNS as COL } from '../store/schema.js';
import { cell, type Row } from '../store/store.js';
import type { Clock } from '../clock.js';
import type { IdGenerator } from './id-generator.js';
import { categoryOf, parseBoolean, requireText } from './fields.js';

export interface DividendType {
  readonly id: string;
  readonly date: Ymd;
  /** Name of the holding that paid. */
  readonly name: string;
  readonly category: string;
  readonly amount: Decimal;
  readonly reinvested: boolean;
  readonly note: string;
}

export interface DividendInput {
  date?: string;
  name: string;
  category?: string;
  amount: string;
  reinvested?: boolean;
  note?: string;
}

export const Dividend = {
  new(fields: DividendType): DividendType {
    return { ...fields };
  },

  fromInput(input: DividendInput, ids: IdGenerator, clock: Clock): DividendType {
    return {
      id: ids.newId(),
      date: input.date !== undefined ? parseDate(input.date) : clock.today(),
      name: requireText('name', input.name),
      category: categoryOf(input.category ?? ''),
      amount: parseAmount(input.amount),
      reinvested: input.reinvested ?? false,
      note: (input.note ?? '').trim(),
    };
  },

  fromRow(row: Row): DividendType {
    return {
      id: cell(row, COL.id),
      date: parseDate(cell(row, COL.date)),
      name: requireText('name', cell(row, COL.name)),
      category: categoryOf(cell(row, COL.category)),
      amount: parseAmount(cell(row, COL.amount)),
      reinvested: parseBoolean(cell(row, COL.reinvested)),
      note: cell(row, COL.note),
    };
  },

  toRow(dividend: DividendType): Row {
    return {
      [COL.id]: dividend.id,
      [COL.date]: formatDate(dividend.date),
      [COL.name]: dividend.name,
      [COL.category]: dividend.category,
      [COL.amount]: decStr(dividend.amount),
      // Sheets written by hand use Yes/No here.
      [COL.reinvested]: dividend.reinvested ? 'Yes' : 'No',
      [COL.note]: dividend.note,
    };
  },
} as const;
