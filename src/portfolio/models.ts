/**
 * Engine input and output types.
 *
 * Everything here is a plain immutable value; the engine keeps no state
 * between calls and reads no ambient configuration.
 */

import type { Decimal } from '../decimal.js';
import type { Ymd } from '../format/date.js';
import type { SettingsType } from '../models/settings.js';
import type { CurrentAllocation } from './allocation.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface CategoryTarget {
  readonly name: string;
  /** 0..100. */
  readonly target_pct: Decimal;
}

export interface EngineConfig {
  readonly categories: readonly CategoryTarget[];
}

/**
 * Engine configuration from the Settings worksheet. Callers decide whether to
 * pass all categories or only the active ones.
 */
export function engineConfigFromSettings(settings: SettingsType): EngineConfig {
  return {
    categories: settings.categories.map((c) => ({ name: c.name, target_pct: c.target_pct })),
  };
}

/** Category → target %. A name listed twice keeps its last target. */
export function targetMap(config: EngineConfig): Map<string, Decimal> {
  const targets = new Map<string, Decimal>();
  for (const c of config.categories) targets.set(c.name, c.target_pct);
  return targets;
}

// ---------------------------------------------------------------------------
// Rebalancing
// ---------------------------------------------------------------------------

export interface Recommendation {
  readonly category: string;
  readonly current_value: Decimal;
  /** Share of the total, 0..100 (may fall outside for negative values). */
  readonly current_pct: Decimal;
  readonly target_pct: Decimal;
  /** target_pct − current_pct. */
  readonly deviation_pct: Decimal;
  /** Amount to buy (+) or sell (−) to hit the target at a constant total. */
  readonly recommended_delta: Decimal;
  /** target_pct of the total. */
  readonly target_value: Decimal;
}

export interface RebalanceResult {
  readonly total_value: Decimal;
  /** Set when the total is zero; every pct and delta is then zero. */
  readonly no_capital: boolean;
  /** Largest |recommended_delta| first, ties by category name. */
  readonly recommendations: readonly Recommendation[];
}

// ---------------------------------------------------------------------------
// Dashboard
// ---------------------------------------------------------------------------

export interface DateRange {
  readonly start?: Ymd;
  readonly end?: Ymd;
}

export interface CategoryAmount {
  readonly category: string;
  readonly amount: Decimal;
}

export interface MonthlyFlow {
  /** "YYYY-MM". */
  readonly month: string;
  /** Signed transaction sums, sorted by category. */
  readonly by_category: readonly CategoryAmount[];
  readonly total: Decimal;
}

export interface Holding {
  readonly name: string;
  readonly category: string;
  readonly amount: Decimal;
  readonly as_of: Ymd;
}

export interface CashFlowSummary {
  /** Deposits minus withdrawals. */
  readonly total_invested: Decimal;
  readonly current_value: Decimal;
  readonly profit_loss: Decimal;
  /** profit_loss / total_invested × 100; zero when nothing is invested. */
  readonly profit_loss_pct: Decimal;
}

export interface DividendTotals {
  readonly total: Decimal;
  readonly reinvested: Decimal;
  readonly received: Decimal;
}

export interface MonthAmount {
  /** "YYYY-MM". */
  readonly month: string;
  readonly amount: Decimal;
}

/** Snapshot values of one category or holding across the snapshot months. */
export interface PivotRow {
  readonly name: string;
  readonly months: readonly MonthAmount[];
  /** Sum of the latest snapshot of each matching holding. */
  readonly latest: Decimal;
  /** Mean of `months`; zero when there are none. */
  readonly average: Decimal;
}

export interface InvestedVsValue {
  readonly month: string;
  /** Deposits minus withdrawals up to and including this month. */
  readonly invested: Decimal;
  /** Latest snapshot per holding in this month, summed. */
  readonly asset_value: Decimal;
  readonly diff: Decimal;
  /** diff / invested × 100; zero when nothing is invested. */
  readonly diff_pct: Decimal;
}

export interface Dashboard {
  readonly range: DateRange;
  readonly allocation: CurrentAllocation;
  readonly rebalance: RebalanceResult;
  readonly monthly: readonly MonthlyFlow[];
  readonly holdings: readonly Holding[];
  readonly category_pivot: readonly PivotRow[];
  readonly asset_pivot: readonly PivotRow[];
  readonly invested_vs_value: readonly InvestedVsValue[];
  readonly summary: CashFlowSummary;
  readonly dividends: DividendTotals;
}
