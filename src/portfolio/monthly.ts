/**
 * Calendar-month buckets of transaction flow.
 */

import { Decimal } from '../decimal.js';
import { monthKey } from '../format/date.js';
import { Investment, type InvestmentType } from '../models/investment.js';
import type { MonthlyFlow } from './models.js';

function byKey(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sum signed transaction amounts per month and category. Months with no
 * transactions are not emitted.
 */
export function monthlyFlows(transactions: readonly InvestmentType[]): MonthlyFlow[] {
  const buckets = new Map<string, Map<string, Decimal>>();

  for (const tx of transactions) {
    const month = monthKey(tx.date);
    let byCategory = buckets.get(month);
    if (byCategory === undefined) {
      byCategory = new Map();
      buckets.set(month, byCategory);
    }
    const prev = byCategory.get(tx.category) ?? new Decimal(0);
    byCategory.set(tx.category, prev.plus(Investment.signedAmount(tx)));
  }

  return Array.from(buckets.keys())
    .sort(byKey)
    .map((month) => {
      const byCategory = buckets.get(month) ?? new Map<string, Decimal>();
      const entries = Array.from(byCategory.entries())
        .sort(([a], [b]) => byKey(a, b))
        .map(([category, amount]) => ({ category, amount }));
      const total = entries.reduce((sum, e) => sum.plus(e.amount), new Decimal(0));
      return { month, by_category: entries, total };
    });
}
