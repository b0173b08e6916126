import { describe, it, expect } from 'vitest';
import { FixedClock } from '../clock.js';
import { FixedIdGenerator } from '../models/id-generator.js';
import { MemoryTabularStore } from '../store/memory.js';
import {
  addCategory,
  addDividend,
  addInvestment,
  addSnapshot,
  addSnapshots,
  addTrackedAsset,
  setCategoryTarget,
  toggleAsset,
  toggleCategory,
} from './mutations.js';

const clock = new FixedClock(new Date('2024-06-15T12:00:00Z'));

function settingsStore(): MemoryTabularStore {
  return new MemoryTabularStore({
    settings: [
      { Category: 'Stocks', Active: 'TRUE', Target: '60', Asset: 'VTI', 'Asset Active': 'TRUE' },
      { Category: 'Bonds', Active: 'TRUE', Target: '40', Asset: '', 'Asset Active': '' },
      { Category: '', Active: '', Target: '', Asset: 'Gold', 'Asset Active': 'TRUE' },
    ],
  });
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

describe('addSnapshot', () => {
  it('appends a row stamped with id and today', async () => {
    const store = new MemoryTabularStore();
    const result = await addSnapshot(
      store,
      { name: 'VTI', category: 'Stocks', amount: '$1,234.50' },
      { ids: new FixedIdGenerator(['id-1']), clock },
    );

    expect(result).toEqual({
      success: true,
      snapshot: {
        id: 'id-1',
        date: '2024-06-15',
        name: 'VTI',
        category: 'Stocks',
        amount: '1234.5',
      },
    });
    expect(await store.readAll('current_asset')).toEqual([
      { ID: 'id-1', Date: '2024-06-15', Amount: '1234.5', Description: 'VTI', Category: 'Stocks' },
    ]);
  });

  it('returns an error and writes nothing for a bad amount', async () => {
    const store = new MemoryTabularStore();
    const result = await addSnapshot(
      store,
      { name: 'VTI', amount: 'abc' },
      { ids: new FixedIdGenerator(['id-1']), clock },
    );
    expect(result).toEqual({ success: false, error: 'Invalid amount "abc": expected a number' });
    expect(await store.readAll('current_asset')).toEqual([]);
  });
});

describe('addSnapshots', () => {
  it('appends every entry in order', async () => {
    const store = new MemoryTabularStore();
    const result = await addSnapshots(
      store,
      [
        { name: 'VTI', category: 'Stocks', amount: '6000' },
        { name: 'BND', category: 'Bonds', amount: '4000', date: '2024-06-14' },
      ],
      { ids: new FixedIdGenerator(['a', 'b']), clock },
    );

    expect(result.success).toBe(true);
    expect((await store.readAll('current_asset')).map((r) => [r.ID, r.Date, r.Amount])).toEqual([
      ['a', '2024-06-15', '6000'],
      ['b', '2024-06-14', '4000'],
    ]);
  });

  it('writes nothing when any entry is invalid', async () => {
    const store = new MemoryTabularStore();
    const result = await addSnapshots(
      store,
      [
        { name: 'VTI', amount: '6000' },
        { name: 'BND', amount: '4000', date: '31/01/2024' },
      ],
      { ids: new FixedIdGenerator(['a', 'b']), clock },
    );

    expect(result).toEqual({
      success: false,
      error: 'Invalid date of entry 2 "31/01/2024": expected YYYY-MM-DD',
    });
    expect(await store.readAll('current_asset')).toEqual([]);
  });
});

describe('addInvestment', () => {
  it('appends a normalized transaction', async () => {
    const store = new MemoryTabularStore();
    const result = await addInvestment(
      store,
      {
        action: 'buy',
        name: 'VTI',
        category: 'Stocks',
        quantity: '2',
        price: '250',
        amount: '500',
        date: '2024-05-01',
      },
      { ids: new FixedIdGenerator(['id-2']), clock },
    );

    expect(result).toEqual({
      success: true,
      investment: {
        id: 'id-2',
        date: '2024-05-01',
        action: 'Buy',
        name: 'VTI',
        category: 'Stocks',
        quantity: '2',
        price: '250',
        amount: '500',
        note: '',
      },
    });
    expect(await store.readAll('investment')).toHaveLength(1);
  });

  it('rejects an unknown action', async () => {
    const store = new MemoryTabularStore();
    const result = await addInvestment(
      store,
      { action: 'gift', name: 'VTI', amount: '1' },
      { ids: new FixedIdGenerator(['id-2']), clock },
    );
    expect(result).toEqual({
      success: false,
      error: 'Invalid action "gift": expected Deposit, Withdraw, Buy, Sell',
    });
  });
});

describe('addDividend', () => {
  it('appends a dividend with Yes/No reinvested flag', async () => {
    const store = new MemoryTabularStore();
    const result = await addDividend(
      store,
      { name: 'VTI', category: 'Stocks', amount: '8.25', reinvested: true },
      { ids: new FixedIdGenerator(['id-3']), clock },
    );

    expect(result.success).toBe(true);
    expect(await store.readAll('dividends')).toEqual([
      {
        ID: 'id-3',
        Date: '2024-06-15',
        'Asset Name': 'VTI',
        Category: 'Stocks',
        'Dividend Amount': '8.25',
        Reinvested: 'Yes',
        Note: '',
      },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

describe('addCategory', () => {
  it('fills the first row without a category', async () => {
    const store = settingsStore();
    const result = await addCategory(store, 'Cash', '10');

    expect(result).toEqual({
      success: true,
      category: { name: 'Cash', active: true, target_pct: '10' },
    });
    expect((await store.readAll('settings'))[2]).toEqual({
      Category: 'Cash',
      Active: 'TRUE',
      Target: '10',
      Asset: 'Gold',
      'Asset Active': 'TRUE',
    });
  });

  it('appends when every row has a category', async () => {
    const store = settingsStore();
    await addCategory(store, 'Cash', '10');
    await addCategory(store, 'REITs');

    const rows = await store.readAll('settings');
    expect(rows).toHaveLength(4);
    expect(rows[3]).toEqual({
      Category: 'REITs',
      Active: 'TRUE',
      Target: '0',
      Asset: '',
      'Asset Active': '',
    });
  });

  it('rejects duplicates ignoring case', async () => {
    const result = await addCategory(settingsStore(), 'stocks');
    expect(result).toEqual({ success: false, error: "Category 'stocks' already exists" });
  });

  it('rejects a target outside 0..100', async () => {
    const result = await addCategory(settingsStore(), 'Cash', '150');
    expect(result).toEqual({
      success: false,
      error: 'Invalid percentage "150": expected a number between 0 and 100',
    });
  });

  it('rejects a blank name', async () => {
    const result = await addCategory(settingsStore(), '  ');
    expect(result).toEqual({
      success: false,
      error: 'Invalid category "  ": expected a non-empty value',
    });
  });
});

describe('toggleCategory', () => {
  it('flips the active flag in place', async () => {
    const store = settingsStore();
    const result = await toggleCategory(store, 'bonds');

    expect(result).toEqual({
      success: true,
      category: { name: 'Bonds', active: false, target_pct: '40' },
    });
    expect((await store.readAll('settings'))[1]?.Active).toBe('FALSE');
  });

  it('reports an unknown category', async () => {
    expect(await toggleCategory(settingsStore(), 'Nope')).toEqual({
      success: false,
      error: "Category 'Nope' not found",
    });
  });
});

describe('setCategoryTarget', () => {
  it('updates the target and keeps the asset cells', async () => {
    const store = settingsStore();
    const result = await setCategoryTarget(store, 'Stocks', '55.5%');

    expect(result).toEqual({
      success: true,
      category: { name: 'Stocks', active: true, target_pct: '55.5' },
    });
    expect((await store.readAll('settings'))[0]).toEqual({
      Category: 'Stocks',
      Active: 'TRUE',
      Target: '55.5',
      Asset: 'VTI',
      'Asset Active': 'TRUE',
    });
  });

  it('rejects a non-numeric target', async () => {
    const result = await setCategoryTarget(settingsStore(), 'Stocks', 'abc');
    expect(result.success).toBe(false);
  });
});

describe('addTrackedAsset', () => {
  it('fills the first row without an asset', async () => {
    const store = settingsStore();
    const result = await addTrackedAsset(store, 'BND');

    expect(result).toEqual({ success: true, asset: { name: 'BND', active: true } });
    expect((await store.readAll('settings'))[1]).toEqual({
      Category: 'Bonds',
      Active: 'TRUE',
      Target: '40',
      Asset: 'BND',
      'Asset Active': 'TRUE',
    });
  });

  it('rejects duplicates ignoring case', async () => {
    expect(await addTrackedAsset(settingsStore(), 'vti')).toEqual({
      success: false,
      error: "Asset 'vti' already exists",
    });
  });
});

describe('toggleAsset', () => {
  it('flips the asset flag in place', async () => {
    const store = settingsStore();
    expect(await toggleAsset(store, 'gold')).toEqual({
      success: true,
      asset: { name: 'Gold', active: false },
    });
    expect((await store.readAll('settings'))[2]?.['Asset Active']).toBe('FALSE');
  });

  it('reports an unknown asset', async () => {
    expect(await toggleAsset(settingsStore(), 'none')).toEqual({
      success: false,
      error: "Asset 'none' not found",
    });
  });
});
