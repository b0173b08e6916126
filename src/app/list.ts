/**
 * List commands for the CLI.
 *
 * Each function takes a TabularStore (and optional filters) and returns plain
 * objects ready for `JSON.stringify`. A malformed row anywhere in the table
 * fails the whole listing.
 */

import { Decimal } from '../decimal.js';
import type { DisplayConfig } from '../config.js';
import { type Ymd, compareYmd } from '../format/date.js';
import { type InvestmentAction, parseAction } from '../models/investment.js';
import { type DividendPeriod, dividendsByPeriod } from '../portfolio/dividends.js';
import type { TabularStore } from '../store/store.js';
import {
  categoryOutput,
  dividendOutput,
  investmentOutput,
  money,
  pct,
  snapshotOutput,
  sumTargets,
  trackedAssetOutput,
} from './format.js';
import {
  type ReadSettingsOptions,
  readDividends,
  readInvestments,
  readSettings,
  readSnapshots,
} from './tables.js';
import type {
  DividendOutput,
  DividendSummaryOutput,
  InvestmentOutput,
  SettingsOutput,
  SnapshotOutput,
} from './types.js';

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

export interface RecordFilter {
  /** Case-insensitive substring of the holding name. */
  name?: string;
  /** Category, compared case-insensitively. */
  category?: string;
  year?: number;
  /** Keep at most this many rows after sorting. */
  limit?: number;
}

export interface InvestmentFilter extends RecordFilter {
  action?: string;
}

interface Filterable {
  readonly date: Ymd;
  readonly name: string;
  readonly category: string;
}

function matches(record: Filterable, filter: RecordFilter): boolean {
  if (filter.name !== undefined) {
    const needle = filter.name.trim().toLowerCase();
    if (!record.name.toLowerCase().includes(needle)) return false;
  }
  if (filter.category !== undefined) {
    if (record.category.toLowerCase() !== filter.category.trim().toLowerCase()) return false;
  }
  if (filter.year !== undefined && record.date.y !== filter.year) return false;
  return true;
}

/** Newest first; on equal dates the later row in the sheet comes first. */
function newestFirst<T extends Filterable>(records: readonly T[]): T[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => compareYmd(b.record.date, a.record.date) || b.index - a.index)
    .map((entry) => entry.record);
}

function select<T extends Filterable>(
  records: readonly T[],
  filter: RecordFilter,
  extra: (record: T) => boolean = () => true,
): T[] {
  const sorted = newestFirst(records.filter((r) => matches(r, filter) && extra(r)));
  return filter.limit !== undefined ? sorted.slice(0, Math.max(0, filter.limit)) : sorted;
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export async function listSnapshots(
  store: TabularStore,
  filter: RecordFilter = {},
): Promise<SnapshotOutput[]> {
  return select(await readSnapshots(store), filter).map(snapshotOutput);
}

/**
 * List investment transactions.
 *
 * @throws FormatError when `filter.action` names no transaction type.
 */
export async function listInvestments(
  store: TabularStore,
  filter: InvestmentFilter = {},
): Promise<InvestmentOutput[]> {
  const action: InvestmentAction | undefined =
    filter.action !== undefined ? parseAction(filter.action) : undefined;
  const transactions = await readInvestments(store);
  return select(transactions, filter, (tx) => action === undefined || tx.action === action).map(
    investmentOutput,
  );
}

export async function listDividends(
  store: TabularStore,
  filter: RecordFilter = {},
): Promise<DividendOutput[]> {
  return select(await readDividends(store), filter).map(dividendOutput);
}

// ---------------------------------------------------------------------------
// Dividend summary
// ---------------------------------------------------------------------------

export async function dividendSummary(
  store: TabularStore,
  period: DividendPeriod,
  display: DisplayConfig,
  filter: { name?: string } = {},
): Promise<DividendSummaryOutput> {
  const dividends = (await readDividends(store)).filter((d) => matches(d, filter));
  const buckets = dividendsByPeriod(dividends, period);
  const total = buckets.reduce((sum, b) => sum.plus(b.amount), new Decimal(0));
  return {
    period,
    buckets: buckets.map((b) => ({ period: b.period, amount: money(b.amount, display) })),
    total: money(total, display),
  };
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export async function listCategories(
  store: TabularStore,
  opts: ReadSettingsOptions = {},
): Promise<SettingsOutput> {
  const settings = await readSettings(store, opts);
  return {
    categories: settings.categories.map(categoryOutput),
    assets: settings.assets.map(trackedAssetOutput),
    target_total_pct: pct(sumTargets(settings.categories)),
  };
}
