/**
 * Settings worksheet: the category list with target allocations, and the list
 * of tracked holding names.
 *
 * The two lists share rows side by side, so a row may carry a category, an
 * asset, both, or neither. Each entry remembers its row for in-place updates.
 */

import type { Decimal } from '../decimal.js';
import { decStr, parsePercent } from '../format/amount.js';
import { SETTINGS_COLUMNS as COL, TABLE_HEADERS } from '../store/schema.js';
import { cell, type Row } from '../store/store.js';
import { formatBoolean, parseBoolean, parseRows } from './fields.js';

export interface CategorySettingType {
  readonly name: string;
  readonly active: boolean;
  /** Target share of the portfolio, 0..100. */
  readonly target_pct: Decimal;
  readonly rowIndex: number;
}

export interface TrackedAssetType {
  readonly name: string;
  readonly active: boolean;
  readonly rowIndex: number;
}

export interface SettingsType {
  readonly categories: readonly CategorySettingType[];
  readonly assets: readonly TrackedAssetType[];
}

export const Settings = {
  /** Parse the whole Settings table. A malformed target or flag fails the read. */
  fromRows(rows: readonly Row[]): SettingsType {
    const categories: CategorySettingType[] = [];
    const assets: TrackedAssetType[] = [];

    parseRows('settings', rows, (row, rowIndex) => {
      const categoryName = cell(row, COL.category);
      if (categoryName !== '') {
        categories.push({
          name: categoryName,
          active: parseBoolean(cell(row, COL.active)),
          target_pct: parsePercent(cell(row, COL.target)),
          rowIndex,
        });
      }
      const assetName = cell(row, COL.asset);
      if (assetName !== '') {
        assets.push({
          name: assetName,
          active: parseBoolean(cell(row, COL.assetActive)),
          rowIndex,
        });
      }
    });

    return { categories, assets };
  },

  onlyActive(settings: SettingsType): SettingsType {
    return {
      categories: settings.categories.filter((c) => c.active),
      assets: settings.assets.filter((a) => a.active),
    };
  },

  /** Find a category by name, ignoring case and surrounding whitespace. */
  findCategory(settings: SettingsType, name: string): CategorySettingType | undefined {
    const needle = name.trim().toLowerCase();
    return settings.categories.find((c) => c.name.toLowerCase() === needle);
  },

  findAsset(settings: SettingsType, name: string): TrackedAssetType | undefined {
    const needle = name.trim().toLowerCase();
    return settings.assets.find((a) => a.name.toLowerCase() === needle);
  },

  /** A row with every Settings column present and empty. */
  emptyRow(): Row {
    return Object.fromEntries(TABLE_HEADERS.settings.map((header) => [header, '']));
  },

  /** Overwrite the category cells of an existing row, keeping its asset cells. */
  withCategory(row: Row, name: string, active: boolean, targetPct: Decimal): Row {
    return {
      ...row,
      [COL.category]: name,
      [COL.active]: formatBoolean(active),
      [COL.target]: decStr(targetPct),
    };
  },

  /** Overwrite the asset cells of an existing row, keeping its category cells. */
  withAsset(row: Row, name: string, active: boolean): Row {
    return {
      ...row,
      [COL.asset]: name,
      [COL.assetActive]: formatBoolean(active),
    };
  },
} as const;
