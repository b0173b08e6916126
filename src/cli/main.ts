#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';

// App layer
import { loadConfig, configOutput } from '../app/config.js';
import {
  dividendSummary,
  listCategories,
  listDividends,
  listInvestments,
  listSnapshots,
} from '../app/list.js';
import {
  addCategory,
  addDividend,
  addInvestment,
  addSnapshot,
  addTrackedAsset,
  setCategoryTarget,
  toggleAsset,
  toggleCategory,
} from '../app/mutations.js';
import { allocationCommand, dashboardCommand, rebalanceCommand } from '../app/portfolio.js';
import { parseDateRange } from '../app/format.js';

// Library
import type { ResolvedConfig } from '../config.js';
import { GoogleSheetsStore, googleSheetValuesClient } from '../store/sheets.js';
import type { TabularStore } from '../store/store.js';

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

async function run(fn: () => Promise<unknown>): Promise<void> {
  try {
    const result = await fn();
    console.log(JSON.stringify(result, null, 2));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.log(JSON.stringify({ success: false, error: message }, null, 2));
    process.exit(1);
  }
}

type LoadedConfig = Awaited<ReturnType<typeof loadConfig>>;

async function runWithConfig(fn: (cfg: LoadedConfig) => Promise<unknown>): Promise<void> {
  await run(async () => {
    const cfg = await loadConfig(program.opts<{ config?: string }>().config);
    return fn(cfg);
  });
}

/** Run against the configured spreadsheet. */
async function runWithStore(
  fn: (store: TabularStore, config: ResolvedConfig) => Promise<unknown>,
): Promise<void> {
  await runWithConfig(async (cfg) => {
    const spreadsheetId = cfg.config.spreadsheet.id;
    if (spreadsheetId === undefined) {
      throw new Error(`No spreadsheet configured: set [spreadsheet] id in ${cfg.configPath}`);
    }
    const client = googleSheetValuesClient(spreadsheetId, cfg.config.credentials_path);
    return fn(new GoogleSheetsStore(client, cfg.config.worksheets), cfg.config);
  });
}

function parseIntOption(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return n;
}

function parsePeriod(value: string): 'year' | 'month' {
  if (value === 'year' || value === 'month') return value;
  throw new InvalidArgumentError('Expected "year" or "month".');
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('sheetfolio')
  .description('Portfolio allocation and rebalancing over a spreadsheet')
  .version('0.1.0')
  .option('-c, --config <path>', 'path to config file');

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------

program
  .command('config')
  .description('Print configuration as JSON')
  .action(async () => {
    await runWithConfig(async (cfg) => configOutput(cfg.configPath, cfg.config));
  });

// ---------------------------------------------------------------------------
// allocation / rebalance / dashboard
// ---------------------------------------------------------------------------

program
  .command('allocation')
  .description('Current value per category')
  .action(async () => {
    await runWithStore(async (store, config) => allocationCommand(store, config.display));
  });

program
  .command('rebalance')
  .description('Deviation from target allocation and amounts to buy or sell')
  .action(async () => {
    await runWithStore(async (store, config) => rebalanceCommand(store, config.display));
  });

program
  .command('dashboard')
  .description('Allocation, rebalancing, monthly flows, holdings and dividends')
  .option('--start <date>', 'first day to include (YYYY-MM-DD)')
  .option('--end <date>', 'last day to include (YYYY-MM-DD)')
  .action(async (opts: { start?: string; end?: string }) => {
    await runWithStore(async (store, config) =>
      dashboardCommand(store, config.display, parseDateRange(opts.start, opts.end)),
    );
  });

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

interface ListOpts {
  name?: string;
  category?: string;
  year?: number;
  limit?: number;
}

const list = program.command('list').description('List records');

function withRecordFilters(cmd: Command): Command {
  return cmd
    .option('--name <text>', 'holding name contains')
    .option('--category <name>', 'category')
    .option('--year <year>', 'calendar year', parseIntOption)
    .option('--limit <n>', 'at most this many rows', parseIntOption);
}

withRecordFilters(list.command('snapshots').description('List asset snapshots, newest first'))
  .action(async (opts: ListOpts) => {
    await runWithStore(async (store) => listSnapshots(store, opts));
  });

withRecordFilters(
  list.command('investments').description('List investment transactions, newest first'),
)
  .option('--action <action>', 'Deposit, Withdraw, Buy or Sell')
  .action(async (opts: ListOpts & { action?: string }) => {
    await runWithStore(async (store) => listInvestments(store, opts));
  });

withRecordFilters(list.command('dividends').description('List dividends, newest first'))
  .action(async (opts: ListOpts) => {
    await runWithStore(async (store) => listDividends(store, opts));
  });

list
  .command('categories')
  .description('List categories and tracked assets from Settings')
  .option('--active', 'only active entries')
  .action(async (opts: { active?: boolean }) => {
    await runWithStore(async (store) => listCategories(store, { onlyActive: opts.active === true }));
  });

// ---------------------------------------------------------------------------
// add
// ---------------------------------------------------------------------------

const add = program.command('add').description('Append a record');

add
  .command('snapshot <name> <amount>')
  .description('Record the current value of a holding')
  .option('--category <name>', 'category')
  .option('--date <date>', 'date (YYYY-MM-DD), default today')
  .action(async (name: string, amount: string, opts: { category?: string; date?: string }) => {
    await runWithStore(async (store) => addSnapshot(store, { name, amount, ...opts }));
  });

add
  .command('investment <action> <name> <amount>')
  .description('Record a Deposit, Withdraw, Buy or Sell')
  .option('--category <name>', 'category')
  .option('--quantity <n>', 'units traded')
  .option('--price <price>', 'unit price')
  .option('--date <date>', 'date (YYYY-MM-DD), default today')
  .option('--note <text>', 'note')
  .action(
    async (
      action: string,
      name: string,
      amount: string,
      opts: { category?: string; quantity?: string; price?: string; date?: string; note?: string },
    ) => {
      await runWithStore(async (store) => addInvestment(store, { action, name, amount, ...opts }));
    },
  );

add
  .command('dividend <name> <amount>')
  .description('Record a dividend payment')
  .option('--category <name>', 'category')
  .option('--reinvested', 'the dividend was reinvested')
  .option('--date <date>', 'date (YYYY-MM-DD), default today')
  .option('--note <text>', 'note')
  .action(
    async (
      name: string,
      amount: string,
      opts: { category?: string; reinvested?: boolean; date?: string; note?: string },
    ) => {
      await runWithStore(async (store) => addDividend(store, { name, amount, ...opts }));
    },
  );

// ---------------------------------------------------------------------------
// category / asset
// ---------------------------------------------------------------------------

const category = program.command('category').description('Manage Settings categories');

category
  .command('add <name>')
  .description('Add an active category')
  .option('--target <pct>', 'target share of the portfolio, 0..100')
  .action(async (name: string, opts: { target?: string }) => {
    await runWithStore(async (store) => addCategory(store, name, opts.target));
  });

category
  .command('toggle <name>')
  .description('Flip a category between active and inactive')
  .action(async (name: string) => {
    await runWithStore(async (store) => toggleCategory(store, name));
  });

category
  .command('set-target <name> <pct>')
  .description('Set the target share of a category')
  .action(async (name: string, pct: string) => {
    await runWithStore(async (store) => setCategoryTarget(store, name, pct));
  });

const asset = program.command('asset').description('Manage tracked asset names');

asset
  .command('add <name>')
  .description('Track a holding name')
  .action(async (name: string) => {
    await runWithStore(async (store) => addTrackedAsset(store, name));
  });

asset
  .command('toggle <name>')
  .description('Flip a tracked asset between active and inactive')
  .action(async (name: string) => {
    await runWithStore(async (store) => toggleAsset(store, name));
  });

// ---------------------------------------------------------------------------
// dividends
// ---------------------------------------------------------------------------

const dividends = program.command('dividends').description('Dividend analysis');

dividends
  .command('summary')
  .description('Dividend income per year or month')
  .option('--by <period>', 'year or month', parsePeriod, 'year' as const)
  .option('--name <text>', 'holding name contains')
  .action(async (opts: { by: 'year' | 'month'; name?: string }) => {
    await runWithStore(async (store, config) =>
      dividendSummary(store, opts.by, config.display, { name: opts.name }),
    );
  });

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

await program.parseAsync(process.argv);
