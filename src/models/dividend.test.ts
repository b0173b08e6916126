import { describe, it, expect } from 'vitest';
import { FixedClock } from '../clock.js';
import { FixedIdGenerator } from './id-generator.js';
import { Dividend } from './dividend.js';

const clock = new FixedClock(new Date('2024-06-15T12:00:00Z'));

describe('Dividend.fromRow', () => {
  it('maps worksheet columns', () => {
    const dividend = Dividend.fromRow({
      ID: 'd-1',
      Date: '2024-03-20',
      'Asset Name': 'VTI',
      Category: 'Stocks',
      'Dividend Amount': '$12.34',
      Reinvested: 'Yes',
      Note: 'Q1',
    });
    expect(dividend.name).toBe('VTI');
    expect(dividend.amount.toFixed()).toBe('12.34');
    expect(dividend.reinvested).toBe(true);
    expect(dividend.note).toBe('Q1');
  });

  it('reads a blank Reinvested cell as not reinvested', () => {
    const dividend = Dividend.fromRow({
      ID: 'd-2',
      Date: '2024-03-20',
      'Asset Name': 'BND',
      Category: 'Bonds',
      'Dividend Amount': '5',
      Reinvested: '',
    });
    expect(dividend.reinvested).toBe(false);
  });

  it('rejects an unknown Reinvested value', () => {
    expect(() =>
      Dividend.fromRow({
        ID: 'd-3',
        Date: '2024-03-20',
        'Asset Name': 'BND',
        'Dividend Amount': '5',
        Reinvested: 'sometimes',
      }),
    ).toThrow('Invalid flag "sometimes": expected TRUE or FALSE');
  });
});

describe('Dividend.fromInput / toRow', () => {
  it('writes Yes/No and reads back the same record', () => {
    const created = Dividend.fromInput(
      { name: 'VTI', category: 'Stocks', amount: '8.5', reinvested: true, note: ' drip ' },
      new FixedIdGenerator(['id-3']),
      clock,
    );
    const row = Dividend.toRow(created);
    expect(row).toEqual({
      ID: 'id-3',
      Date: '2024-06-15',
      'Asset Name': 'VTI',
      Category: 'Stocks',
      'Dividend Amount': '8.5',
      Reinvested: 'Yes',
      Note: 'drip',
    });
    expect(Dividend.fromRow(row)).toEqual(created);
  });

  it('defaults to not reinvested', () => {
    const created = Dividend.fromInput(
      { name: 'BND', amount: '3' },
      new FixedIdGenerator(['id-4']),
      clock,
    );
    expect(created.reinvested).toBe(false);
    expect(Dividend.toRow(created).Reinvested).toBe('No');
  });
});
