/**
 * Configuration for sheetfolio.
 *
 * Parses TOML configuration and fills in defaults. The file names the
 * spreadsheet, the service-account key used to reach it, the worksheet title
 * of each table and how amounts are displayed.
 */

import path from 'node:path';
import toml from 'toml';
import type { AmountDisplayOptions } from './format/amount.js';
import { TABLE_NAMES, type TableName } from './store/schema.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface SpreadsheetConfig {
  /** Spreadsheet id from the sheet URL. */
  id?: string;
  /** Service-account key file; relative paths are taken from the config file. */
  credentials_file: string;
}

export type WorksheetConfig = Record<TableName, string>;

export interface DisplayConfig {
  currency_symbol: string;
  /** Decimal places for rendered amounts; calculations are not rounded. */
  currency_decimals: number;
  /** When true, render amounts with thousands separators. */
  currency_grouping: boolean;
}

export interface Config {
  spreadsheet: SpreadsheetConfig;
  worksheets: WorksheetConfig;
  display: DisplayConfig;
}

export interface ResolvedConfig extends Config {
  /** Absolute path to the service-account key file. */
  credentials_path: string;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_SPREADSHEET_CONFIG: SpreadsheetConfig = {
  id: undefined,
  credentials_file: path.join('credentials', 'service_account.json'),
};

export const DEFAULT_WORKSHEETS: WorksheetConfig = {
  settings: 'Settings',
  current_asset: 'Current Asset',
  investment: 'Investment',
  dividends: 'Dividends',
};

export const DEFAULT_DISPLAY_CONFIG: DisplayConfig = {
  currency_symbol: '$',
  currency_decimals: 2,
  currency_grouping: true,
};

export const DEFAULT_CONFIG: Config = {
  spreadsheet: { ...DEFAULT_SPREADSHEET_CONFIG },
  worksheets: { ...DEFAULT_WORKSHEETS },
  display: { ...DEFAULT_DISPLAY_CONFIG },
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  return isRecord(value) ? value : {};
}

function nonEmptyString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Parse a TOML configuration string into a `Config`.
 *
 * Missing fields, and fields of the wrong type or out of range, take their
 * defaults.
 *
 * @throws Error when the text is not valid TOML.
 */
export function parseConfig(tomlStr: string): Config {
  // toml.parse throws on invalid TOML; an empty string yields an empty object.
  const parsed: unknown = tomlStr.trim().length === 0 ? {} : toml.parse(tomlStr);
  const raw = isRecord(parsed) ? parsed : {};

  const spreadsheetRaw = section(raw, 'spreadsheet');
  const worksheetsRaw = section(raw, 'worksheets');
  const displayRaw = section(raw, 'display');

  const spreadsheet: SpreadsheetConfig = {
    credentials_file:
      nonEmptyString(spreadsheetRaw.credentials_file) ?? DEFAULT_SPREADSHEET_CONFIG.credentials_file,
  };
  const id = nonEmptyString(spreadsheetRaw.id);
  if (id !== undefined) {
    spreadsheet.id = id;
  }

  const worksheets: WorksheetConfig = { ...DEFAULT_WORKSHEETS };
  for (const table of TABLE_NAMES) {
    const title = nonEmptyString(worksheetsRaw[table]);
    if (title !== undefined) worksheets[table] = title;
  }

  const display: DisplayConfig = { ...DEFAULT_DISPLAY_CONFIG };

  const symbol = displayRaw.currency_symbol;
  if (typeof symbol === 'string') {
    // An empty symbol is allowed and means "no symbol".
    display.currency_symbol = symbol.trim();
  }

  const decimals = displayRaw.currency_decimals;
  // TOML numbers may be floats; treat non-integers or negatives as invalid input.
  if (typeof decimals === 'number' && Number.isInteger(decimals) && decimals >= 0) {
    display.currency_decimals = decimals;
  }

  if (typeof displayRaw.currency_grouping === 'boolean') {
    display.currency_grouping = displayRaw.currency_grouping;
  }

  return { spreadsheet, worksheets, display };
}

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

/**
 * Resolve the credentials file against the directory holding the config file.
 * Absolute paths are returned unchanged.
 */
export function resolveCredentialsPath(config: Config, configDir: string): string {
  const file = config.spreadsheet.credentials_file;
  return path.isAbsolute(file) ? file : path.join(configDir, file);
}

export function resolveConfig(config: Config, configDir: string): ResolvedConfig {
  return { ...config, credentials_path: resolveCredentialsPath(config, configDir) };
}

/** Display settings in the shape the amount formatter takes. */
export function amountDisplay(display: DisplayConfig): AmountDisplayOptions {
  return {
    currency_symbol: display.currency_symbol,
    currency_decimals: display.currency_decimals,
    currency_grouping: display.currency_grouping,
  };
}
