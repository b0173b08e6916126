/**
 * Typed reads of each worksheet. Every call goes to the store; nothing is
 * cached between commands.
 */

import { AssetSnapshot, type AssetSnapshotType } from '../models/asset.js';
import { Dividend, type DividendType } from '../models/dividend.js';
import { parseRows } from '../models/fields.js';
import { Investment, type InvestmentType } from '../models/investment.js';
import { Settings, type SettingsType } from '../models/settings.js';
import type { TabularStore } from '../store/store.js';

export async function readSnapshots(store: TabularStore): Promise<AssetSnapshotType[]> {
  return parseRows('current_asset', await store.readAll('current_asset'), AssetSnapshot.fromRow);
}

export async function readInvestments(store: TabularStore): Promise<InvestmentType[]> {
  return parseRows('investment', await store.readAll('investment'), Investment.fromRow);
}

export async function readDividends(store: TabularStore): Promise<DividendType[]> {
  return parseRows('dividends', await store.readAll('dividends'), Dividend.fromRow);
}

export interface ReadSettingsOptions {
  /** Drop inactive categories and assets. */
  onlyActive?: boolean;
}

export async function readSettings(
  store: TabularStore,
  opts: ReadSettingsOptions = {},
): Promise<SettingsType> {
  const settings = Settings.fromRows(await store.readAll('settings'));
  return opts.onlyActive === true ? Settings.onlyActive(settings) : settings;
}
