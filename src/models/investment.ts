/**
 * Investment transactions: the append-only log of cash movements and trades.
 */

import { Decimal } from '../decimal.js';
import { type Ymd, formatDate, parseDate } from '../format/date.js';
import { decStr, parseAmount, parseOptionalAmount } from '../format/amount.js';
import { FormatError } from '../errors.js';
import { INVESTMENT_COLUMNS as COL } from '../store/schema.js';
import { cell, type Row } from '../store/store.js';
import type { Clock } from '../clock.js';
import type { IdGenerator } from './id-generator.js';
import { categoryOf, requireText } from './fields.js';

export type InvestmentAction = 'Deposit' | 'Withdraw' | 'Buy' | 'Sell';

export const INVESTMENT_ACTIONS: readonly InvestmentAction[] = ['Deposit', 'Withdraw', 'Buy', 'Sell'];

export interface InvestmentType {
  readonly id: string;
  readonly date: Ymd;
  readonly action: InvestmentAction;
  readonly name: string;
  readonly category: string;
  /** Units traded; usually absent for Deposit/Withdraw. */
  readonly quantity?: Decimal;
  /** Unit price; usually absent for Deposit/Withdraw. */
  readonly price?: Decimal;
  /** Total amount. The sign in the sheet is ignored; `action` decides direction. */
  readonly amount: Decimal;
  readonly note: string;
}

/** Unparsed user input for a new transaction. */
export interface InvestmentInput {
  date?: string;
  action: string;
  name: string;
  category?: string;
  quantity?: string;
  price?: string;
  amount: string;
  note?: string;
}

/** Case-insensitive match against the four transaction types. */
export function parseAction(text: string): InvestmentAction {
  const lowered = text.trim().toLowerCase();
  const found = INVESTMENT_ACTIONS.find((a) => a.toLowerCase() === lowered);
  if (found === undefined) {
    throw new FormatError('action', text, INVESTMENT_ACTIONS.join(', '));
  }
  return found;
}

export const Investment = {
  new(fields: InvestmentType): InvestmentType {
    return { ...fields };
  },

  fromInput(input: InvestmentInput, ids: IdGenerator, clock: Clock): InvestmentType {
    const quantity = parseOptionalAmount(input.quantity ?? '');
    const price = parseOptionalAmount(input.price ?? '');
    return {
      id: ids.newId(),
      date: input.date !== undefined ? parseDate(input.date) : clock.today(),
      action: parseAction(input.action),
      name: requireText('name', input.name),
      category: categoryOf(input.category ?? ''),
      ...(quantity !== undefined ? { quantity } : {}),
      ...(price !== undefined ? { price } : {}),
      amount: parseAmount(input.amount),
      note: (input.note ?? '').trim(),
    };
  },

  fromRow(row: Row): InvestmentType {
    const quantity = parseOptionalAmount(cell(row, COL.quantity));
    const price = parseOptionalAmount(cell(row, COL.price));
    return {
      id: cell(row, COL.id),
      date: parseDate(cell(row, COL.date)),
      action: parseAction(cell(row, COL.action)),
      name: requireText('name', cell(row, COL.name)),
      category: categoryOf(cell(row, COL.category)),
      ...(quantity !== undefined ? { quantity } : {}),
      ...(price !== undefined ? { price } : {}),
      amount: parseAmount(cell(row, COL.amount)),
      note: cell(row, COL.note),
    };
  },

  toRow(tx: InvestmentType): Row {
    return {
      [COL.id]: tx.id,
      [COL.date]: formatDate(tx.date),
      [COL.action]: tx.action,
      [COL.name]: tx.name,
      [COL.category]: tx.category,
      [COL.quantity]: tx.quantity !== undefined ? decStr(tx.quantity) : '',
      [COL.price]: tx.price !== undefined ? decStr(tx.price) : '',
      [COL.amount]: decStr(tx.amount),
      [COL.note]: tx.note,
    };
  },

  /** Effect on the category's holdings: Deposit/Buy add, Withdraw/Sell remove. */
  signedAmount(tx: InvestmentType): Decimal {
    const abs = tx.amount.abs();
    return tx.action === 'Deposit' || tx.action === 'Buy' ? abs : abs.neg();
  },

  /** Net external cash flow: Deposit in, Withdraw out, trades zero. */
  cashFlow(tx: InvestmentType): Decimal {
    switch (tx.action) {
      case 'Deposit':
        return tx.amount.abs();
      case 'Withdraw':
        return tx.amount.abs().neg();
      case 'Buy':
      case 'Sell':
        return new Decimal(0);
    }
  },
} as const;
