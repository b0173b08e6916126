import { Decimal } from '../decimal.js';
import { parseDate } from '../format/date.js';
import { AssetSnapshot, type AssetSnapshotType } from '../models/asset.js';
import { Dividend, type DividendType } from '../models/dividend.js';
import {
  Investment,
  type InvestmentAction,
  type InvestmentType,
} from '../models/investment.js';
import type { EngineConfig } from './models.js';

let counter = 0;
function nextId(prefix: string): string {
  counter += 1;
  return `${prefix}-${String(counter)}`;
}

export function snap(
  date: string,
  category: string,
  amount: string,
  name: string = category,
): AssetSnapshotType {
  return AssetSnapshot.new({
    id: nextId('s'),
    date: parseDate(date),
    name,
    category,
    amount: new Decimal(amount),
  });
}

export function tx(
  date: string,
  action: InvestmentAction,
  category: string,
  amount: string,
): InvestmentType {
  return Investment.new({
    id: nextId('t'),
    date: parseDate(date),
    action,
    name: category,
    category,
    amount: new Decimal(amount),
    note: '',
  });
}

export function div(date: string, name: string, amount: string, reinvested = false): DividendType {
  return Dividend.new({
    id: nextId('d'),
    date: parseDate(date),
    name,
    category: 'Stocks',
    amount: new Decimal(amount),
    reinvested,
    note: '',
  });
}

export function targets(entries: Record<string, string>): EngineConfig {
  return {
    categories: Object.entries(entries).map(([name, pct]) => ({
      name,
      target_pct: new Decimal(pct),
    })),
  };
}
