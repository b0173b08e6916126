/**
 * Google Sheets adapter.
 *
 * Each table maps to one worksheet of a single spreadsheet. Row 1 holds the
 * headers; data row `i` lives on sheet row `i + 2`. Values are read as the
 * formatted text the sheet shows and written back raw, so cells round-trip as
 * the exact strings the row mappers produce.
 */

import { google } from 'googleapis';

import { StoreUnavailable, type StoreOperation } from '../errors.js';
import type { TableName } from './schema.js';
import type { Row, TabularStore } from './store.js';

export const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

/**
 * The slice of the Sheets `values` API this adapter needs. Ranges are in A1
 * notation including the quoted worksheet title.
 */
export interface SheetValuesClient {
  get(range: string): Promise<string[][]>;
  append(range: string, values: string[][]): Promise<void>;
  update(range: string, values: string[][]): Promise<void>;
}

/** Build a values client authenticated with a service-account key file. */
export function googleSheetValuesClient(spreadsheetId: string, keyFile: string): SheetValuesClient {
  const auth = new google.auth.GoogleAuth({ keyFile, scopes: SHEETS_SCOPES });
  const sheets = google.sheets({ version: 'v4', auth });

  return {
    async get(range) {
      const res = await sheets.spreadsheets.values.get({
        spreadsheetId,
        range,
        valueRenderOption: 'FORMATTED_VALUE',
      });
      const values: unknown[][] = res.data.values ?? [];
      return values.map((r) => r.map((c) => (c === null || c === undefined ? '' : String(c))));
    },
    async append(range, values) {
      await sheets.spreadsheets.values.append({
        spreadsheetId,
        range,
        valueInputOption: 'RAW',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values },
      });
    },
    async update(range, values) {
      await sheets.spreadsheets.values.update({
        spreadsheetId,
        range,
        valueInputOption: 'RAW',
        requestBody: { values },
      });
    },
  };
}

function quoteTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

export class GoogleSheetsStore implements TabularStore {
  private readonly client: SheetValuesClient;
  private readonly worksheets: Readonly<Record<TableName, string>>;

  constructor(client: SheetValuesClient, worksheets: Readonly<Record<TableName, string>>) {
    this.client = client;
    this.worksheets = worksheets;
  }

  async readAll(table: TableName): Promise<Row[]> {
    return this.guard(table, 'read', async () => {
      const values = await this.client.get(quoteTitle(this.worksheets[table]));
      const header = values[0] ?? [];
      return values.slice(1).map((cells) => {
        const row: Record<string, string> = {};
        header.forEach((name, i) => {
          if (name.trim() !== '') row[name] = cells[i] ?? '';
        });
        return row;
      });
    });
  }

  async appendRow(table: TableName, row: Row): Promise<void> {
    await this.guard(table, 'append', async () => {
      const title = quoteTitle(this.worksheets[table]);
      let header = await this.header(table);
      if (header.length === 0) {
        header = Object.keys(row);
        await this.client.update(`${title}!A1`, [header]);
      }
      await this.client.append(`${title}!A1`, [toCells(header, row)]);
    });
  }

  async updateRow(table: TableName, rowIndex: number, row: Row): Promise<void> {
    await this.guard(table, 'update', async () => {
      if (!Number.isInteger(rowIndex) || rowIndex < 0) {
        throw new RangeError(`invalid row index ${String(rowIndex)}`);
      }
      const header = await this.header(table);
      const sheetRow = rowIndex + 2;
      await this.client.update(`${quoteTitle(this.worksheets[table])}!A${String(sheetRow)}`, [
        toCells(header, row),
      ]);
    });
  }

  private async header(table: TableName): Promise<string[]> {
    const values = await this.client.get(`${quoteTitle(this.worksheets[table])}!1:1`);
    return values[0] ?? [];
  }

  private async guard<T>(table: TableName, op: StoreOperation, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StoreUnavailable) throw err;
      throw new StoreUnavailable(table, op, err);
    }
  }
}

/** Lay a row out in header order; a key the header does not know is an error. */
function toCells(header: readonly string[], row: Row): string[] {
  const byTrimmed = new Map<string, number>();
  header.forEach((name, i) => byTrimmed.set(name.trim(), i));

  const cells = header.map(() => '');
  for (const [key, value] of Object.entries(row)) {
    const idx = byTrimmed.get(key.trim());
    if (idx === undefined) {
      throw new Error(`column '${key}' is not in the worksheet header`);
    }
    cells[idx] = value;
  }
  return cells;
}
