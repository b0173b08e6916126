/**
 * Worksheet layouts.
 *
 * Each table is addressed by a stable key; the worksheet title it maps to
 * comes from configuration. Column names are the header cells of row 1.
 */

export type TableName = 'settings' | 'current_asset' | 'investment' | 'dividends';

export const TABLE_NAMES: readonly TableName[] = [
  'settings',
  'current_asset',
  'investment',
  'dividends',
];

export const SETTINGS_COLUMNS = {
  category: 'Category',
  active: 'Active',
  target: 'Target',
  asset: 'Asset',
  assetActive: 'Asset Active',
} as const;

export const CURRENT_ASSET_COLUMNS = {
  id: 'ID',
  date: 'Date',
  amount: 'Amount',
  name: 'Description',
  category: 'Category',
} as const;

export const INVESTMENT_COLUMNS = {
  id: 'ID',
  date: 'Date',
  action: 'Action',
  name: 'Asset',
  category: 'Category',
  quantity: 'Quantity',
  price: 'Unit Price',
  amount: 'Total Amount',
  note: 'Note',
} as const;

export const DIVIDEND_COLUMNS = {
  id: 'ID',
  date: 'Date',
  name: 'Asset Name',
  category: 'Category',
  amount: 'Dividend Amount',
  reinvested: 'Reinvested',
  note: 'Note',
} as const;

/** Header row for each table, in worksheet column order. */
export const TABLE_HEADERS: Readonly<Record<TableName, readonly string[]>> = {
  settings: Object.values(SETTINGS_COLUMNS),
  current_asset: Object.values(CURRENT_ASSET_COLUMNS),
  investment: Object.values(INVESTMENT_COLUMNS),
  dividends: Object.values(DIVIDEND_COLUMNS),
};
