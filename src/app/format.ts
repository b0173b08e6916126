/**
 * Rendering of engine values for CLI output.
 *
 * Money is rounded to the configured display decimals, percentages to two
 * places. Record amounts are shown exactly as stored.
 */

import { Decimal } from '../decimal.js';
import { type DisplayConfig, amountDisplay } from '../config.js';
import { decStr, decStrRounded, formatAmount } from '../format/amount.js';
import { type Ymd, formatDate, parseDate } from '../format/date.js';
import type { AssetSnapshotType } from '../models/asset.js';
import type { DividendType } from '../models/dividend.js';
import type { InvestmentType } from '../models/investment.js';
import type { CategorySettingType, TrackedAssetType } from '../models/settings.js';
import type { CurrentAllocation } from '../portfolio/allocation.js';
import type { DateRange, RebalanceResult, Recommendation } from '../portfolio/models.js';
import type {
  AllocationOutput,
  CategoryOutput,
  DividendOutput,
  InvestmentOutput,
  RebalanceAction,
  RebalanceOutput,
  RecommendationOutput,
  SnapshotOutput,
  TrackedAssetOutput,
} from './types.js';

export const PCT_DECIMALS = 2;

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

export function money(d: Decimal, display: DisplayConfig): string {
  return decStrRounded(d, display.currency_decimals);
}

export function moneyDisplay(d: Decimal, display: DisplayConfig): string {
  return formatAmount(d, amountDisplay(display));
}

export function pct(d: Decimal): string {
  return decStrRounded(d, PCT_DECIMALS);
}

export function dateOrNull(ymd: Ymd | undefined): string | null {
  return ymd !== undefined ? formatDate(ymd) : null;
}

/** Parse optional `--from`/`--to` style bounds. */
export function parseDateRange(start?: string, end?: string): DateRange {
  return {
    ...(start !== undefined ? { start: parseDate(start) } : {}),
    ...(end !== undefined ? { end: parseDate(end) } : {}),
  };
}

export function sumTargets(categories: readonly { target_pct: Decimal }[]): Decimal {
  return categories.reduce((sum, c) => sum.plus(c.target_pct), new Decimal(0));
}

// ---------------------------------------------------------------------------
// Engine results
// ---------------------------------------------------------------------------

export function allocationOutput(
  allocation: CurrentAllocation,
  display: DisplayConfig,
): AllocationOutput {
  return {
    total: money(allocation.total, display),
    total_display: moneyDisplay(allocation.total, display),
    categories: allocation.categories.map((c) => ({
      category: c.category,
      value: money(c.value, display),
      source: c.source,
      as_of: dateOrNull(c.as_of),
    })),
  };
}

function actionFor(delta: Decimal, display: DisplayConfig): RebalanceAction {
  const rounded = delta.toDecimalPlaces(display.currency_decimals, Decimal.ROUND_HALF_UP);
  if (rounded.isZero()) return 'hold';
  return rounded.isPos() ? 'buy' : 'sell';
}

function recommendationOutput(r: Recommendation, display: DisplayConfig): RecommendationOutput {
  return {
    category: r.category,
    current_value: money(r.current_value, display),
    current_pct: pct(r.current_pct),
    target_pct: pct(r.target_pct),
    deviation_pct: pct(r.deviation_pct),
    recommended_delta: money(r.recommended_delta, display),
    target_value: money(r.target_value, display),
    action: actionFor(r.recommended_delta, display),
  };
}

export function rebalanceOutput(result: RebalanceResult, display: DisplayConfig): RebalanceOutput {
  return {
    total_value: money(result.total_value, display),
    no_capital: result.no_capital,
    target_total_pct: pct(sumTargets(result.recommendations)),
    recommendations: result.recommendations.map((r) => recommendationOutput(r, display)),
  };
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export function snapshotOutput(s: AssetSnapshotType): SnapshotOutput {
  return {
    id: s.id,
    date: formatDate(s.date),
    name: s.name,
    category: s.category,
    amount: decStr(s.amount),
  };
}

export function investmentOutput(tx: InvestmentType): InvestmentOutput {
  return {
    id: tx.id,
    date: formatDate(tx.date),
    action: tx.action,
    name: tx.name,
    category: tx.category,
    quantity: tx.quantity !== undefined ? decStr(tx.quantity) : null,
    price: tx.price !== undefined ? decStr(tx.price) : null,
    amount: decStr(tx.amount),
    note: tx.note,
  };
}

export function dividendOutput(d: DividendType): DividendOutput {
  return {
    id: d.id,
    date: formatDate(d.date),
    name: d.name,
    category: d.category,
    amount: decStr(d.amount),
    reinvested: d.reinvested,
    note: d.note,
  };
}

export function categoryOutput(c: CategorySettingType): CategoryOutput {
  return { name: c.name, active: c.active, target_pct: decStr(c.target_pct) };
}

export function trackedAssetOutput(a: TrackedAssetType): TrackedAssetOutput {
  return { name: a.name, active: a.active };
}
