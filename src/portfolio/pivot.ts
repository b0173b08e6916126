/**
 * Month-by-month snapshot tables for the dashboard.
 *
 * A holding's value in a month is its latest snapshot dated in that month; a
 * holding with no snapshot that month contributes zero to it.
 */

import { Decimal } from '../decimal.js';
import { monthKey } from '../format/date.js';
import type { AssetSnapshotType } from '../models/asset.js';
import { Investment, type InvestmentType } from '../models/investment.js';
import { holdingKey, latestBy } from './allocation.js';
import type { InvestedVsValue, MonthAmount, PivotRow } from './models.js';

function byKey(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Distinct snapshot months, ascending. */
export function snapshotMonths(snapshots: readonly AssetSnapshotType[]): string[] {
  return Array.from(new Set(snapshots.map((s) => monthKey(s.date)))).sort(byKey);
}

/** Latest snapshot per holding within each month. */
function monthlyLatest(snapshots: readonly AssetSnapshotType[]): Map<string, AssetSnapshotType[]> {
  const latest = latestBy(snapshots, (s) => `${monthKey(s.date)}\u0000${holdingKey(s)}`);
  const byMonth = new Map<string, AssetSnapshotType[]>();
  for (const snapshot of latest.values()) {
    const month = monthKey(snapshot.date);
    const list = byMonth.get(month);
    if (list === undefined) byMonth.set(month, [snapshot]);
    else list.push(snapshot);
  }
  return byMonth;
}

function sumAmounts(snapshots: readonly AssetSnapshotType[]): Decimal {
  return snapshots.reduce((sum, s) => sum.plus(s.amount), new Decimal(0));
}

function pivot(
  names: readonly string[],
  snapshots: readonly AssetSnapshotType[],
  matches: (snapshot: AssetSnapshotType, name: string) => boolean,
): PivotRow[] {
  const months = snapshotMonths(snapshots);
  const byMonth = monthlyLatest(snapshots);
  const current = Array.from(latestBy(snapshots, holdingKey).values());

  return Array.from(new Set(names)).map((name) => {
    const cells: MonthAmount[] = months.map((month) => ({
      month,
      amount: sumAmounts((byMonth.get(month) ?? []).filter((s) => matches(s, name))),
    }));
    const sum = cells.reduce((acc, c) => acc.plus(c.amount), new Decimal(0));
    return {
      name,
      months: cells,
      latest: sumAmounts(current.filter((s) => matches(s, name))),
      average: months.length > 0 ? sum.div(months.length) : new Decimal(0),
    };
  });
}

/** One row per category, in the order given. */
export function categoryPivot(
  categories: readonly string[],
  snapshots: readonly AssetSnapshotType[],
): PivotRow[] {
  return pivot(categories, snapshots, (s, name) => s.category === name);
}

/** One row per tracked holding name, in the order given. */
export function assetPivot(
  assets: readonly string[],
  snapshots: readonly AssetSnapshotType[],
): PivotRow[] {
  return pivot(assets, snapshots, (s, name) => s.name === name);
}

/**
 * Running deposits net of withdrawals against the snapshot total, per month
 * that has snapshots or transactions. A month with neither a snapshot total
 * nor any cash flow reports zeros.
 */
export function investedVsValue(
  snapshots: readonly AssetSnapshotType[],
  transactions: readonly InvestmentType[],
): InvestedVsValue[] {
  const flows = new Map<string, Decimal>();
  for (const tx of transactions) {
    const month = monthKey(tx.date);
    flows.set(month, (flows.get(month) ?? new Decimal(0)).plus(Investment.cashFlow(tx)));
  }
  const byMonth = monthlyLatest(snapshots);
  const months = Array.from(new Set([...byMonth.keys(), ...flows.keys()])).sort(byKey);

  let running = new Decimal(0);
  return months.map((month) => {
    const flow = flows.get(month) ?? new Decimal(0);
    running = running.plus(flow);
    const assetValue = sumAmounts(byMonth.get(month) ?? []);
    if (assetValue.isZero() && flow.isZero()) {
      const zero = new Decimal(0);
      return { month, invested: zero, asset_value: zero, diff: zero, diff_pct: zero };
    }
    const diff = assetValue.minus(running);
    return {
      month,
      invested: running,
      asset_value: assetValue,
      diff,
      diff_pct: running.gt(0) ? diff.div(running).times(100) : new Decimal(0),
    };
  });
}
