import { describe, it, expect } from 'vitest';
import { StoreUnavailable } from '../errors.js';
import { GoogleSheetsStore, type SheetValuesClient } from './sheets.js';

const WORKSHEETS = {
  settings: 'Settings',
  current_asset: 'Current Asset',
  investment: "Bob's Trades",
  dividends: 'Dividends',
};

/** In-process stand-in for the Sheets values API, keyed by worksheet title. */
class FakeValuesClient implements SheetValuesClient {
  readonly sheets = new Map<string, string[][]>();
  readonly calls: string[] = [];
  failWith?: Error;

  async get(range: string): Promise<string[][]> {
    this.calls.push(`get ${range}`);
    this.maybeFail();
    const { title, suffix } = splitRange(range);
    const values = this.sheets.get(title) ?? [];
    if (suffix === '1:1') return values.slice(0, 1).map((r) => [...r]);
    return values.map((r) => [...r]);
  }

  async append(range: string, values: string[][]): Promise<void> {
    this.calls.push(`append ${range}`);
    this.maybeFail();
    const { title } = splitRange(range);
    const sheet = this.sheet(title);
    sheet.push(...values.map((r) => [...r]));
  }

  async update(range: string, values: string[][]): Promise<void> {
    this.calls.push(`update ${range}`);
    this.maybeFail();
    const { title, suffix } = splitRange(range);
    const match = /^A(\d+)$/.exec(suffix ?? '');
    if (match === null) throw new Error(`unsupported range ${range}`);
    const sheet = this.sheet(title);
    const start = Number(match[1]) - 1;
    values.forEach((r, i) => {
      sheet[start + i] = [...r];
    });
  }

  private sheet(title: string): string[][] {
    let sheet = this.sheets.get(title);
    if (sheet === undefined) {
      sheet = [];
      this.sheets.set(title, sheet);
    }
    return sheet;
  }

  private maybeFail(): void {
    if (this.failWith !== undefined) throw this.failWith;
  }
}

function splitRange(range: string): { title: string; suffix?: string } {
  const m = /^'((?:[^']|'')*)'(?:!(.+))?$/.exec(range);
  if (m === null) throw new Error(`unquoted range ${range}`);
  const title = (m[1] ?? '').replace(/''/g, "'");
  return m[2] !== undefined ? { title, suffix: m[2] } : { title };
}

describe('GoogleSheetsStore.readAll', () => {
  it('maps data rows onto the header row', async () => {
    const client = new FakeValuesClient();
    client.sheets.set('Current Asset', [
      ['ID', 'Date', 'Amount', 'Description', 'Category'],
      ['s1', '2024-01-31', '1,000.00', 'VTI', 'Stocks'],
      ['s2', '2024-01-31', '500'],
    ]);
    const store = new GoogleSheetsStore(client, WORKSHEETS);

    expect(await store.readAll('current_asset')).toEqual([
      { ID: 's1', Date: '2024-01-31', Amount: '1,000.00', Description: 'VTI', Category: 'Stocks' },
      { ID: 's2', Date: '2024-01-31', Amount: '500', Description: '', Category: '' },
    ]);
    expect(client.calls).toEqual(["get 'Current Asset'"]);
  });

  it('skips columns without a header', async () => {
    const client = new FakeValuesClient();
    client.sheets.set('Settings', [
      ['Category', '', 'Target'],
      ['Stocks', 'scratch', '60'],
    ]);
    const store = new GoogleSheetsStore(client, WORKSHEETS);
    expect(await store.readAll('settings')).toEqual([{ Category: 'Stocks', Target: '60' }]);
  });

  it('returns nothing for an empty worksheet', async () => {
    const store = new GoogleSheetsStore(new FakeValuesClient(), WORKSHEETS);
    expect(await store.readAll('dividends')).toEqual([]);
  });

  it('quotes worksheet titles containing apostrophes', async () => {
    const client = new FakeValuesClient();
    const store = new GoogleSheetsStore(client, WORKSHEETS);
    await store.readAll('investment');
    expect(client.calls).toEqual(["get 'Bob''s Trades'"]);
  });
});

describe('GoogleSheetsStore.appendRow', () => {
  it('lays the row out in header order', async () => {
    const client = new FakeValuesClient();
    client.sheets.set('Dividends', [['ID', 'Date', 'Dividend Amount', 'Asset Name']]);
    const store = new GoogleSheetsStore(client, WORKSHEETS);

    await store.appendRow('dividends', { 'Asset Name': 'VTI', ID: 'd1', Date: '2024-02-01' });

    expect(client.sheets.get('Dividends')).toEqual([
      ['ID', 'Date', 'Dividend Amount', 'Asset Name'],
      ['d1', '2024-02-01', '', 'VTI'],
    ]);
    expect(client.calls).toEqual(["get 'Dividends'!1:1", "append 'Dividends'!A1"]);
  });

  it('writes a header row into an empty worksheet first', async () => {
    const client = new FakeValuesClient();
    const store = new GoogleSheetsStore(client, WORKSHEETS);

    await store.appendRow('settings', { Category: 'Cash', Active: 'TRUE' });

    expect(client.sheets.get('Settings')).toEqual([
      ['Category', 'Active'],
      ['Cash', 'TRUE'],
    ]);
  });

  it('fails on a column the worksheet does not have', async () => {
    const client = new FakeValuesClient();
    client.sheets.set('Settings', [['Category']]);
    const store = new GoogleSheetsStore(client, WORKSHEETS);

    await expect(store.appendRow('settings', { Bogus: 'x' })).rejects.toThrow(
      "Store append failed for settings: column 'Bogus' is not in the worksheet header",
    );
  });
});

describe('GoogleSheetsStore.updateRow', () => {
  it('addresses data row i at sheet row i + 2', async () => {
    const client = new FakeValuesClient();
    client.sheets.set('Settings', [
      ['Category', 'Active', 'Target'],
      ['Stocks', 'TRUE', '60'],
      ['Bonds', 'TRUE', '40'],
    ]);
    const store = new GoogleSheetsStore(client, WORKSHEETS);

    await store.updateRow('settings', 1, { Category: 'Bonds', Active: 'FALSE', Target: '40' });

    expect(client.calls).toContain("update 'Settings'!A3");
    expect(await store.readAll('settings')).toEqual([
      { Category: 'Stocks', Active: 'TRUE', Target: '60' },
      { Category: 'Bonds', Active: 'FALSE', Target: '40' },
    ]);
  });

  it('rejects a negative row index', async () => {
    const store = new GoogleSheetsStore(new FakeValuesClient(), WORKSHEETS);
    await expect(store.updateRow('settings', -1, {})).rejects.toThrow(
      'Store update failed for settings: invalid row index -1',
    );
  });
});

describe('GoogleSheetsStore errors', () => {
  it('wraps client failures in StoreUnavailable with the cause', async () => {
    const client = new FakeValuesClient();
    const cause = new Error('quota exceeded');
    client.failWith = cause;
    const store = new GoogleSheetsStore(client, WORKSHEETS);

    try {
      await store.readAll('investment');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(StoreUnavailable);
      if (err instanceof StoreUnavailable) {
        expect(err.table).toBe('investment');
        expect(err.operation).toBe('read');
        expect(err.cause).toBe(cause);
        expect(err.message).toBe('Store read failed for investment: quota exceeded');
      }
    }
  });
});
