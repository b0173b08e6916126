/**
 * Dividend totals and per-period income.
 */

import { Decimal } from '../decimal.js';
import { monthKey } from '../format/date.js';
import type { DividendType } from '../models/dividend.js';
import type { DividendTotals } from './models.js';

export type DividendPeriod = 'year' | 'month';

export interface DividendBucket {
  /** "YYYY" or "YYYY-MM". */
  readonly period: string;
  readonly amount: Decimal;
}

export function dividendTotals(dividends: readonly DividendType[]): DividendTotals {
  let reinvested = new Decimal(0);
  let received = new Decimal(0);
  for (const d of dividends) {
    if (d.reinvested) {
      reinvested = reinvested.plus(d.amount);
    } else {
      received = received.plus(d.amount);
    }
  }
  return { total: reinvested.plus(received), reinvested, received };
}

/** Dividend income per year or month, oldest first. */
export function dividendsByPeriod(
  dividends: readonly DividendType[],
  period: DividendPeriod,
): DividendBucket[] {
  const sums = new Map<string, Decimal>();
  for (const d of dividends) {
    const key = period === 'month' ? monthKey(d.date) : d.date.y.toString().padStart(4, '0');
    sums.set(key, (sums.get(key) ?? new Decimal(0)).plus(d.amount));
  }
  return Array.from(sums.keys())
    .sort()
    .map((key) => ({ period: key, amount: sums.get(key) ?? new Decimal(0) }));
}
