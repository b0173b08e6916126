/**
 * sheetfolio: portfolio allocation and rebalancing over spreadsheet rows.
 *
 * Re-exports the public API surface from a single entry point.
 */

// ---------------------------------------------------------------------------
// Core utilities
// ---------------------------------------------------------------------------

export { Decimal } from './decimal.js';
export { type Clock, SystemClock, FixedClock } from './clock.js';
export { FormatError, StoreUnavailable, type RowLocation, type StoreOperation } from './errors.js';
export {
  type Config,
  type ResolvedConfig,
  type SpreadsheetConfig,
  type WorksheetConfig,
  type DisplayConfig,
  parseConfig,
  resolveConfig,
  resolveCredentialsPath,
  DEFAULT_CONFIG,
  DEFAULT_DISPLAY_CONFIG,
  DEFAULT_WORKSHEETS,
} from './config.js';

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

export {
  type AmountDisplayOptions,
  parseAmount,
  parseOptionalAmount,
  parsePercent,
  isValidAmount,
  formatAmount,
  decStr,
  decStrRounded,
} from './format/amount.js';
export {
  type Ymd,
  parseDate,
  formatDate,
  formatDisplayDate,
  isValidDate,
  monthKey,
  compareYmd,
} from './format/date.js';

// ---------------------------------------------------------------------------
// Models
// ---------------------------------------------------------------------------

export { type IdGenerator, UuidIdGenerator, FixedIdGenerator } from './models/id-generator.js';
export { AssetSnapshot, type AssetSnapshotType, type AssetSnapshotInput } from './models/asset.js';
export {
  Investment,
  type InvestmentType,
  type InvestmentInput,
  type InvestmentAction,
  INVESTMENT_ACTIONS,
  parseAction,
} from './models/investment.js';
export { Dividend, type DividendType, type DividendInput } from './models/dividend.js';
export {
  Settings,
  type SettingsType,
  type CategorySettingType,
  type TrackedAssetType,
} from './models/settings.js';
export { UNCATEGORIZED } from './models/fields.js';

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export { type Row, type TabularStore } from './store/store.js';
export { type TableName, TABLE_NAMES, TABLE_HEADERS } from './store/schema.js';
export { MemoryTabularStore, type MemorySeed } from './store/memory.js';
export {
  GoogleSheetsStore,
  googleSheetValuesClient,
  type SheetValuesClient,
} from './store/sheets.js';

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export {
  aggregateAllocation,
  type CurrentAllocation,
  type CategoryValue,
  type ValueSource,
} from './portfolio/allocation.js';
export { rebalance } from './portfolio/rebalance.js';
export { buildDashboard, latestHoldings, cashFlowSummary } from './portfolio/dashboard.js';
export { monthlyFlows } from './portfolio/monthly.js';
export { assetPivot, categoryPivot, investedVsValue, snapshotMonths } from './portfolio/pivot.js';
export { dividendTotals, dividendsByPeriod, type DividendPeriod } from './portfolio/dividends.js';
export {
  type EngineConfig,
  type CategoryTarget,
  type Recommendation,
  type RebalanceResult,
  type Dashboard,
  type DateRange,
  type PivotRow,
  type InvestedVsValue,
  engineConfigFromSettings,
} from './portfolio/models.js';
