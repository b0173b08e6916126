/**
 * Current allocation per category.
 *
 * A category's value is the sum of the latest snapshot of each holding in it
 * when it has any snapshot, otherwise the running net of its transactions. Values are never clamped: a negative value
 * means an oversell or a data-entry slip, and the caller gets to see it.
 */

import { Decimal } from '../decimal.js';
import { type Ymd, compareYmd } from '../format/date.js';
import type { AssetSnapshotType } from '../models/asset.js';
import { Investment, type InvestmentType } from '../models/investment.js';
import type { EngineConfig } from './models.js';

export type ValueSource = 'snapshot' | 'transactions' | 'none';

export interface CategoryValue {
  readonly category: string;
  readonly value: Decimal;
  readonly source: ValueSource;
  /** Newest date among the snapshots the value came from. */
  readonly as_of?: Ymd;
}

export interface CurrentAllocation {
  /** One entry per known category, sorted by name. */
  readonly categories: readonly CategoryValue[];
  readonly total: Decimal;
}

/**
 * Latest entry per key, in store order. On equal dates the entry that comes
 * later in `items` wins, matching append order in the sheet.
 */
export function latestBy<T extends { readonly date: Ymd }>(
  items: readonly T[],
  key: (item: T) => string,
): Map<string, T> {
  const latest = new Map<string, T>();
  for (const item of items) {
    const k = key(item);
    const current = latest.get(k);
    if (current === undefined || compareYmd(item.date, current.date) >= 0) {
      latest.set(k, item);
    }
  }
  return latest;
}

/** Snapshots identify a holding by category and name together. */
export function holdingKey(snapshot: AssetSnapshotType): string {
  return `${snapshot.category}\u0000${snapshot.name}`;
}

/** Sum of the latest snapshot per holding, by category. */
function snapshotValues(
  snapshots: readonly AssetSnapshotType[],
): Map<string, { value: Decimal; as_of: Ymd }> {
  const values = new Map<string, { value: Decimal; as_of: Ymd }>();
  for (const snapshot of latestBy(snapshots, holdingKey).values()) {
    const prev = values.get(snapshot.category);
    values.set(
      snapshot.category,
      prev === undefined
        ? { value: snapshot.amount, as_of: snapshot.date }
        : {
            value: prev.value.plus(snapshot.amount),
            as_of: compareYmd(snapshot.date, prev.as_of) > 0 ? snapshot.date : prev.as_of,
          },
    );
  }
  return values;
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Compute per-category current values and the portfolio total.
 *
 * The result covers exactly the union of categories named in `config`, in
 * snapshots and in transactions.
 */
export function aggregateAllocation(
  snapshots: readonly AssetSnapshotType[],
  transactions: readonly InvestmentType[],
  config: EngineConfig,
): CurrentAllocation {
  const fromSnapshots = snapshotValues(snapshots);

  const netFlow = new Map<string, Decimal>();
  for (const tx of transactions) {
    const prev = netFlow.get(tx.category) ?? new Decimal(0);
    netFlow.set(tx.category, prev.plus(Investment.signedAmount(tx)));
  }

  const names = new Set<string>();
  for (const c of config.categories) names.add(c.name);
  for (const name of fromSnapshots.keys()) names.add(name);
  for (const name of netFlow.keys()) names.add(name);

  const categories: CategoryValue[] = [];
  let total = new Decimal(0);

  for (const category of Array.from(names).sort(byName)) {
    const snapshot = fromSnapshots.get(category);
    let entry: CategoryValue;
    if (snapshot !== undefined) {
      entry = { category, value: snapshot.value, source: 'snapshot', as_of: snapshot.as_of };
    } else {
      const flow = netFlow.get(category);
      entry =
        flow !== undefined
          ? { category, value: flow, source: 'transactions' }
          : { category, value: new Decimal(0), source: 'none' };
    }
    categories.push(entry);
    total = total.plus(entry.value);
  }

  return { categories, total };
}

/** Value of one category, zero when the allocation does not know it. */
export function valueOf(allocation: CurrentAllocation, category: string): Decimal {
  return allocation.categories.find((c) => c.category === category)?.value ?? new Decimal(0);
}
