/**
 * Output types for the CLI.
 *
 * Field names are snake_case. Amounts and percentages are decimal strings so
 * nothing passes through binary floating point on the way out. Fields with
 * no value are `null` rather than omitted.
 */

import type { InvestmentAction } from '../models/investment.js';
import type { DividendPeriod } from '../portfolio/dividends.js';
import type { ValueSource } from '../portfolio/allocation.js';

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface ErrorOutput {
  success: false;
  error: string;
}

export type Result<T> = ({ success: true } & T) | ErrorOutput;

// ---------------------------------------------------------------------------
// Allocation / rebalance
// ---------------------------------------------------------------------------

export interface CategoryValueOutput {
  category: string;
  value: string;
  source: ValueSource;
  /** Date of the snapshot the value came from. */
  as_of: string | null;
}

export interface AllocationOutput {
  total: string;
  /** Total rendered with currency symbol and grouping, e.g. `$12,500.00`. */
  total_display: string;
  categories: CategoryValueOutput[];
}

export type RebalanceAction = 'buy' | 'sell' | 'hold';

export interface RecommendationOutput {
  category: string;
  current_value: string;
  current_pct: string;
  target_pct: string;
  deviation_pct: string;
  recommended_delta: string;
  target_value: string;
  /** Direction of `recommended_delta` once rounded for display. */
  action: RebalanceAction;
}

export interface RebalanceOutput {
  total_value: string;
  no_capital: boolean;
  /** Sum of the target percentages that took part. */
  target_total_pct: string;
  recommendations: RecommendationOutput[];
}

// ---------------------------------------------------------------------------
// Dashboard
// ---------------------------------------------------------------------------

export interface CategoryAmountOutput {
  category: string;
  amount: string;
}

export interface MonthlyFlowOutput {
  month: string;
  by_category: CategoryAmountOutput[];
  total: string;
}

export interface HoldingOutput {
  name: string;
  category: string;
  amount: string;
  as_of: string;
}

export interface MonthAmountOutput {
  month: string;
  amount: string;
}

export interface PivotRowOutput {
  name: string;
  months: MonthAmountOutput[];
  latest: string;
  average: string;
}

export interface InvestedVsValueOutput {
  month: string;
  invested: string;
  asset_value: string;
  diff: string;
  diff_pct: string;
}

export interface CashFlowSummaryOutput {
  total_invested: string;
  current_value: string;
  profit_loss: string;
  profit_loss_pct: string;
}

export interface DividendTotalsOutput {
  total: string;
  reinvested: string;
  received: string;
}

export interface DashboardOutput {
  range: { start: string | null; end: string | null };
  allocation: AllocationOutput;
  rebalance: RebalanceOutput;
  monthly: MonthlyFlowOutput[];
  holdings: HoldingOutput[];
  category_pivot: PivotRowOutput[];
  asset_pivot: PivotRowOutput[];
  invested_vs_value: InvestedVsValueOutput[];
  summary: CashFlowSummaryOutput;
  dividends: DividendTotalsOutput;
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export interface SnapshotOutput {
  id: string;
  date: string;
  name: string;
  category: string;
  amount: string;
}

export interface InvestmentOutput {
  id: string;
  date: string;
  action: InvestmentAction;
  name: string;
  category: string;
  quantity: string | null;
  price: string | null;
  amount: string;
  note: string;
}

export interface DividendOutput {
  id: string;
  date: string;
  name: string;
  category: string;
  amount: string;
  reinvested: boolean;
  note: string;
}

export interface DividendBucketOutput {
  period: string;
  amount: string;
}

export interface DividendSummaryOutput {
  period: DividendPeriod;
  buckets: DividendBucketOutput[];
  total: string;
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export interface CategoryOutput {
  name: string;
  active: boolean;
  target_pct: string;
}

export interface TrackedAssetOutput {
  name: string;
  active: boolean;
}

export interface SettingsOutput {
  categories: CategoryOutput[];
  assets: TrackedAssetOutput[];
  /** Sum of the listed categories' targets. */
  target_total_pct: string;
}
