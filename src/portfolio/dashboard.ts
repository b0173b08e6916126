/**
 * Dashboard composition over one set of rows: allocation, rebalancing,
 * monthly flow, holdings, snapshot pivots, invested against value, the
 * cash-flow summary and dividend totals.
 */

import { Decimal } from '../decimal.js';
import { type Ymd, ymdInRange } from '../format/date.js';
import type { AssetSnapshotType } from '../models/asset.js';
import type { DividendType } from '../models/dividend.js';
import { Investment, type InvestmentType } from '../models/investment.js';
import { aggregateAllocation, holdingKey, latestBy } from './allocation.js';
import { dividendTotals } from './dividends.js';
import { monthlyFlows } from './monthly.js';
import { assetPivot, categoryPivot, investedVsValue } from './pivot.js';
import { rebalance } from './rebalance.js';
import type {
  CashFlowSummary,
  Dashboard,
  DateRange,
  EngineConfig,
  Holding,
} from './models.js';

export interface DashboardInput {
  readonly snapshots: readonly AssetSnapshotType[];
  readonly transactions: readonly InvestmentType[];
  readonly dividends: readonly DividendType[];
  /** Holding names in the order the Settings sheet lists them. */
  readonly trackedAssets: readonly string[];
}

/**
 * Latest snapshot per holding. Listed names come first in their listed
 * order; the rest follow by name, then category.
 */
export function latestHoldings(
  snapshots: readonly AssetSnapshotType[],
  trackedAssets: readonly string[],
): Holding[] {
  const latest = latestBy(snapshots, holdingKey);
  const order = new Map<string, number>();
  trackedAssets.forEach((name, i) => {
    if (!order.has(name)) order.set(name, i);
  });

  return Array.from(latest.values())
    .sort((a, b) => {
      const ia = order.get(a.name) ?? Number.POSITIVE_INFINITY;
      const ib = order.get(b.name) ?? Number.POSITIVE_INFINITY;
      if (ia !== ib) return ia < ib ? -1 : 1;
      if (a.name !== b.name) return a.name < b.name ? -1 : 1;
      return a.category < b.category ? -1 : a.category > b.category ? 1 : 0;
    })
    .map((s) => ({ name: s.name, category: s.category, amount: s.amount, as_of: s.date }));
}

export function cashFlowSummary(
  transactions: readonly InvestmentType[],
  currentValue: Decimal,
): CashFlowSummary {
  const invested = transactions.reduce(
    (sum, tx) => sum.plus(Investment.cashFlow(tx)),
    new Decimal(0),
  );
  const profitLoss = currentValue.minus(invested);
  return {
    total_invested: invested,
    current_value: currentValue,
    profit_loss: profitLoss,
    profit_loss_pct: invested.gt(0) ? profitLoss.div(invested).times(100) : new Decimal(0),
  };
}

/**
 * Build the dashboard. Rows outside `range` are dropped before anything is
 * computed, so "latest snapshot" means latest within the range.
 */
export function buildDashboard(
  input: DashboardInput,
  config: EngineConfig,
  range: DateRange = {},
): Dashboard {
  const inRange = <T extends { readonly date: Ymd }>(rows: readonly T[]): T[] =>
    rows.filter((r) => ymdInRange(r.date, range.start, range.end));

  const snapshots = inRange(input.snapshots);
  const transactions = inRange(input.transactions);
  const dividends = inRange(input.dividends);

  const allocation = aggregateAllocation(snapshots, transactions, config);

  return {
    range,
    allocation,
    rebalance: rebalance(allocation, config),
    monthly: monthlyFlows(transactions),
    holdings: latestHoldings(snapshots, input.trackedAssets),
    category_pivot: categoryPivot(config.categories.map((c) => c.name), snapshots),
    asset_pivot: assetPivot(input.trackedAssets, snapshots),
    invested_vs_value: investedVsValue(snapshots, transactions),
    summary: cashFlowSummary(transactions, allocation.total),
    dividends: dividendTotals(dividends),
  };
}
