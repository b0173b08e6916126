import { describe, it, expect } from 'vitest';
import { dividendTotals, dividendsByPeriod } from './dividends.js';
import { div } from './test-fixtures.js';

const dividends = [
  div('2023-12-15', 'VTI', '10', true),
  div('2024-01-15', 'VTI', '12.5'),
  div('2024-01-20', 'BND', '3', true),
  div('2024-03-01', 'VTI', '7.5'),
];

describe('dividendTotals', () => {
  it('splits reinvested from received', () => {
    const totals = dividendTotals(dividends);
    expect(totals.total.toFixed()).toBe('33');
    expect(totals.reinvested.toFixed()).toBe('13');
    expect(totals.received.toFixed()).toBe('20');
  });

  it('is zero without dividends', () => {
    const totals = dividendTotals([]);
    expect(totals.total.isZero()).toBe(true);
  });
});

describe('dividendsByPeriod', () => {
  it('groups by year', () => {
    expect(
      dividendsByPeriod(dividends, 'year').map((b) => [b.period, b.amount.toFixed()]),
    ).toEqual([
      ['2023', '10'],
      ['2024', '23'],
    ]);
  });

  it('groups by month, skipping empty months', () => {
    expect(
      dividendsByPeriod(dividends, 'month').map((b) => [b.period, b.amount.toFixed()]),
    ).toEqual([
      ['2023-12', '10'],
      ['2024-01', '15.5'],
      ['2024-03', '7.5'],
    ]);
  });
});
