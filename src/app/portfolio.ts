/**
 * Portfolio commands: allocation, rebalance and dashboard.
 *
 * Each command reads the tables it needs, runs the engine with the active
 * Settings categories as its configuration and renders the result.
 */

import type { DisplayConfig } from '../config.js';
import { aggregateAllocation } from '../portfolio/allocation.js';
import { buildDashboard } from '../portfolio/dashboard.js';
import {
  type DateRange,
  type EngineConfig,
  type PivotRow,
  engineConfigFromSettings,
} from '../portfolio/models.js';
import { rebalance } from '../portfolio/rebalance.js';
import type { SettingsType } from '../models/settings.js';
import type { TabularStore } from '../store/store.js';
import { decStr } from '../format/amount.js';
import { formatDate } from '../format/date.js';
import {
  allocationOutput,
  dateOrNull,
  money,
  pct,
  rebalanceOutput,
  sumTargets,
} from './format.js';
import { readDividends, readInvestments, readSettings, readSnapshots } from './tables.js';
import type {
  AllocationOutput,
  DashboardOutput,
  PivotRowOutput,
  RebalanceOutput,
} from './types.js';

/** Engine configuration from the active Settings categories. */
async function activeConfig(store: TabularStore): Promise<{
  settings: SettingsType;
  config: EngineConfig;
}> {
  const settings = await readSettings(store, { onlyActive: true });
  const total = sumTargets(settings.categories);
  if (settings.categories.length > 0 && !total.eq(100)) {
    console.warn(`Warning: active category targets sum to ${decStr(total)}%, not 100%`);
  }
  return { settings, config: engineConfigFromSettings(settings) };
}

function pivotOutput(row: PivotRow, display: DisplayConfig): PivotRowOutput {
  return {
    name: row.name,
    months: row.months.map((m) => ({ month: m.month, amount: money(m.amount, display) })),
    latest: money(row.latest, display),
    average: money(row.average, display),
  };
}

export async function allocationCommand(
  store: TabularStore,
  display: DisplayConfig,
): Promise<AllocationOutput> {
  const [{ config }, snapshots, transactions] = await Promise.all([
    activeConfig(store),
    readSnapshots(store),
    readInvestments(store),
  ]);
  return allocationOutput(aggregateAllocation(snapshots, transactions, config), display);
}

export async function rebalanceCommand(
  store: TabularStore,
  display: DisplayConfig,
): Promise<RebalanceOutput> {
  const [{ config }, snapshots, transactions] = await Promise.all([
    activeConfig(store),
    readSnapshots(store),
    readInvestments(store),
  ]);
  const allocation = aggregateAllocation(snapshots, transactions, config);
  return rebalanceOutput(rebalance(allocation, config), display);
}

export async function dashboardCommand(
  store: TabularStore,
  display: DisplayConfig,
  range: DateRange = {},
): Promise<DashboardOutput> {
  const [{ settings, config }, snapshots, transactions, dividends] = await Promise.all([
    activeConfig(store),
    readSnapshots(store),
    readInvestments(store),
    readDividends(store),
  ]);

  const dashboard = buildDashboard(
    {
      snapshots,
      transactions,
      dividends,
      trackedAssets: settings.assets.map((a) => a.name),
    },
    config,
    range,
  );

  return {
    range: { start: dateOrNull(range.start), end: dateOrNull(range.end) },
    allocation: allocationOutput(dashboard.allocation, display),
    rebalance: rebalanceOutput(dashboard.rebalance, display),
    monthly: dashboard.monthly.map((m) => ({
      month: m.month,
      by_category: m.by_category.map((c) => ({
        category: c.category,
        amount: money(c.amount, display),
      })),
      total: money(m.total, display),
    })),
    holdings: dashboard.holdings.map((h) => ({
      name: h.name,
      category: h.category,
      amount: money(h.amount, display),
      as_of: formatDate(h.as_of),
    })),
    category_pivot: dashboard.category_pivot.map((r) => pivotOutput(r, display)),
    asset_pivot: dashboard.asset_pivot.map((r) => pivotOutput(r, display)),
    invested_vs_value: dashboard.invested_vs_value.map((m) => ({
      month: m.month,
      invested: money(m.invested, display),
      asset_value: money(m.asset_value, display),
      diff: money(m.diff, display),
      diff_pct: pct(m.diff_pct),
    })),
    summary: {
      total_invested: money(dashboard.summary.total_invested, display),
      current_value: money(dashboard.summary.current_value, display),
      profit_loss: money(dashboard.summary.profit_loss, display),
      profit_loss_pct: pct(dashboard.summary.profit_loss_pct),
    },
    dividends: {
      total: money(dashboard.dividends.total, display),
      reinvested: money(dashboard.dividends.reinvested, display),
      received: money(dashboard.dividends.received, display),
    },
  };
}
