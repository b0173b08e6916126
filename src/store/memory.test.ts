import { describe, it, expect } from 'vitest';
import { StoreUnavailable } from '../errors.js';
import { MemoryTabularStore } from './memory.js';

describe('MemoryTabularStore', () => {
  it('starts with empty tables', async () => {
    const store = new MemoryTabularStore();
    expect(await store.readAll('settings')).toEqual([]);
    expect(await store.readAll('dividends')).toEqual([]);
  });

  it('returns seeded rows in order', async () => {
    const store = new MemoryTabularStore({
      current_asset: [{ Description: 'A' }, { Description: 'B' }],
    });
    expect(await store.readAll('current_asset')).toEqual([
      { Description: 'A' },
      { Description: 'B' },
    ]);
  });

  it('appends to the end of a table', async () => {
    const store = new MemoryTabularStore({ investment: [{ Asset: 'A' }] });
    await store.appendRow('investment', { Asset: 'B' });
    expect((await store.readAll('investment')).map((r) => r.Asset)).toEqual(['A', 'B']);
  });

  it('replaces a row in place', async () => {
    const store = new MemoryTabularStore({ settings: [{ Category: 'A' }, { Category: 'B' }] });
    await store.updateRow('settings', 1, { Category: 'C' });
    expect(await store.readAll('settings')).toEqual([{ Category: 'A' }, { Category: 'C' }]);
  });

  it('rejects updates outside the table', async () => {
    const store = new MemoryTabularStore({ settings: [{ Category: 'A' }] });
    await expect(store.updateRow('settings', 1, { Category: 'C' })).rejects.toBeInstanceOf(
      StoreUnavailable,
    );
    await expect(store.updateRow('settings', -1, { Category: 'C' })).rejects.toThrow(
      'Store update failed for settings: row -1 out of range (0..0)',
    );
  });

  it('hands out copies', async () => {
    const seed = [{ Category: 'A' }];
    const store = new MemoryTabularStore({ settings: seed });
    seed[0] = { Category: 'changed' };
    const read = await store.readAll('settings');
    read.pop();
    expect(await store.readAll('settings')).toEqual([{ Category: 'A' }]);
  });
});
