/**
 * Mutation commands for the CLI.
 *
 * Each function takes a TabularStore (and optional injectable deps) and
 * returns plain result objects. Invalid input, unknown names and duplicates
 * come back as `{success: false, error: ...}`, NOT thrown, so the CLI can
 * render them as JSON. Store failures propagate.
 */

import type { Decimal } from '../decimal.js';
import { type Clock, SystemClock } from '../clock.js';
import { FormatError } from '../errors.js';
import { decStr, parsePercent } from '../format/amount.js';
import { AssetSnapshot, type AssetSnapshotInput } from '../models/asset.js';
import { Dividend, type DividendInput } from '../models/dividend.js';
import { requireText } from '../models/fields.js';
import { type IdGenerator, UuidIdGenerator } from '../models/id-generator.js';
import { Investment, type InvestmentInput } from '../models/investment.js';
import { Settings, type SettingsType } from '../models/settings.js';
import { SETTINGS_COLUMNS } from '../store/schema.js';
import { cell, type Row, type TabularStore } from '../store/store.js';
import { categoryOutput, dividendOutput, investmentOutput, snapshotOutput } from './format.js';
import type {
  CategoryOutput,
  DividendOutput,
  ErrorOutput,
  InvestmentOutput,
  Result,
  SnapshotOutput,
  TrackedAssetOutput,
} from './types.js';

export interface MutationDeps {
  ids?: IdGenerator;
  clock?: Clock;
}

function failure(error: string): ErrorOutput {
  return { success: false, error };
}

/** Run input validation, turning a `FormatError` into an error result. */
function validated<T>(build: () => T): { value: T } | ErrorOutput {
  try {
    return { value: build() };
  } catch (err) {
    if (err instanceof FormatError) return failure(err.message);
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** Record the value of one holding. The date defaults to today. */
export async function addSnapshot(
  store: TabularStore,
  input: AssetSnapshotInput,
  deps: MutationDeps = {},
): Promise<Result<{ snapshot: SnapshotOutput }>> {
  const built = validated(() =>
    AssetSnapshot.fromInput(input, deps.ids ?? new UuidIdGenerator(), deps.clock ?? new SystemClock()),
  );
  if ('error' in built) return built;

  await store.appendRow('current_asset', AssetSnapshot.toRow(built.value));
  return { success: true, snapshot: snapshotOutput(built.value) };
}

/**
 * Record several snapshots at once, typically one per holding on the same
 * day. Every input is validated before the first row is written.
 */
export async function addSnapshots(
  store: TabularStore,
  inputs: readonly AssetSnapshotInput[],
  deps: MutationDeps = {},
): Promise<Result<{ snapshots: SnapshotOutput[] }>> {
  const ids = deps.ids ?? new UuidIdGenerator();
  const clock = deps.clock ?? new SystemClock();

  const built = validated(() =>
    inputs.map((input, i) => {
      try {
        return AssetSnapshot.fromInput(input, ids, clock);
      } catch (err) {
        if (err instanceof FormatError) {
          throw new FormatError(`${err.field} of entry ${String(i + 1)}`, err.raw, err.expected);
        }
        throw err;
      }
    }),
  );
  if ('error' in built) return built;

  for (const snapshot of built.value) {
    await store.appendRow('current_asset', AssetSnapshot.toRow(snapshot));
  }
  return { success: true, snapshots: built.value.map(snapshotOutput) };
}

export async function addInvestment(
  store: TabularStore,
  input: InvestmentInput,
  deps: MutationDeps = {},
): Promise<Result<{ investment: InvestmentOutput }>> {
  const built = validated(() =>
    Investment.fromInput(input, deps.ids ?? new UuidIdGenerator(), deps.clock ?? new SystemClock()),
  );
  if ('error' in built) return built;

  await store.appendRow('investment', Investment.toRow(built.value));
  return { success: true, investment: investmentOutput(built.value) };
}

export async function addDividend(
  store: TabularStore,
  input: DividendInput,
  deps: MutationDeps = {},
): Promise<Result<{ dividend: DividendOutput }>> {
  const built = validated(() =>
    Dividend.fromInput(input, deps.ids ?? new UuidIdGenerator(), deps.clock ?? new SystemClock()),
  );
  if ('error' in built) return built;

  await store.appendRow('dividends', Dividend.toRow(built.value));
  return { success: true, dividend: dividendOutput(built.value) };
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

async function loadSettings(store: TabularStore): Promise<{ rows: Row[]; settings: SettingsType }> {
  const rows = await store.readAll('settings');
  return { rows, settings: Settings.fromRows(rows) };
}

/**
 * Write `build(row)` into the first row whose `column` cell is empty, or
 * append a new row when every row has one.
 */
async function placeInColumn(
  store: TabularStore,
  rows: readonly Row[],
  column: string,
  build: (row: Row) => Row,
): Promise<void> {
  const free = rows.findIndex((row) => cell(row, column) === '');
  if (free === -1) {
    await store.appendRow('settings', build(Settings.emptyRow()));
  } else {
    await store.updateRow('settings', free, build(rows[free] ?? Settings.emptyRow()));
  }
}

/**
 * Add an active category.
 *
 * Checks for duplicate names (case-insensitive). The target defaults to 0.
 */
export async function addCategory(
  store: TabularStore,
  name: string,
  target?: string,
): Promise<Result<{ category: CategoryOutput }>> {
  const built = validated(() => ({
    name: requireText('category', name),
    targetPct: parsePercent(target ?? ''),
  }));
  if ('error' in built) return built;

  const { rows, settings } = await loadSettings(store);
  if (Settings.findCategory(settings, built.value.name) !== undefined) {
    return failure(`Category '${built.value.name}' already exists`);
  }

  const { name: categoryName, targetPct } = built.value;
  await placeInColumn(store, rows, SETTINGS_COLUMNS.category, (row) =>
    Settings.withCategory(row, categoryName, true, targetPct),
  );
  return {
    success: true,
    category: { name: categoryName, active: true, target_pct: decStr(targetPct) },
  };
}

async function updateCategory(
  store: TabularStore,
  name: string,
  change: (current: { active: boolean; target_pct: Decimal }) => {
    active: boolean;
    target_pct: Decimal;
  },
): Promise<Result<{ category: CategoryOutput }>> {
  const { rows, settings } = await loadSettings(store);
  const found = Settings.findCategory(settings, name);
  const row = found !== undefined ? rows[found.rowIndex] : undefined;
  if (found === undefined || row === undefined) {
    return failure(`Category '${name}' not found`);
  }

  const next = change(found);
  await store.updateRow(
    'settings',
    found.rowIndex,
    Settings.withCategory(row, found.name, next.active, next.target_pct),
  );
  return { success: true, category: categoryOutput({ ...found, ...next }) };
}

/** Flip a category between active and inactive. */
export async function toggleCategory(
  store: TabularStore,
  name: string,
): Promise<Result<{ category: CategoryOutput }>> {
  return updateCategory(store, name, (c) => ({ active: !c.active, target_pct: c.target_pct }));
}

/** Set a category's target share, 0..100. */
export async function setCategoryTarget(
  store: TabularStore,
  name: string,
  target: string,
): Promise<Result<{ category: CategoryOutput }>> {
  const built = validated(() => parsePercent(target));
  if ('error' in built) return built;
  const targetPct = built.value;
  return updateCategory(store, name, (c) => ({ active: c.active, target_pct: targetPct }));
}

/** Add an active tracked asset name. Duplicates (case-insensitive) are rejected. */
export async function addTrackedAsset(
  store: TabularStore,
  name: string,
): Promise<Result<{ asset: TrackedAssetOutput }>> {
  const built = validated(() => requireText('asset', name));
  if ('error' in built) return built;
  const assetName = built.value;

  const { rows, settings } = await loadSettings(store);
  if (Settings.findAsset(settings, assetName) !== undefined) {
    return failure(`Asset '${assetName}' already exists`);
  }

  await placeInColumn(store, rows, SETTINGS_COLUMNS.asset, (row) =>
    Settings.withAsset(row, assetName, true),
  );
  return { success: true, asset: { name: assetName, active: true } };
}

export async function toggleAsset(
  store: TabularStore,
  name: string,
): Promise<Result<{ asset: TrackedAssetOutput }>> {
  const { rows, settings } = await loadSettings(store);
  const found = Settings.findAsset(settings, name);
  const row = found !== undefined ? rows[found.rowIndex] : undefined;
  if (found === undefined || row === undefined) {
    return failure(`Asset '${name}' not found`);
  }

  const active = !found.active;
  await store.updateRow('settings', found.rowIndex, Settings.withAsset(row, found.name, active));
  return { success: true, asset: { name: found.name, active } };
}
