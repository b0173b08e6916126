import { describe, it, expect } from 'vitest';
import { FormatError } from '../errors.js';
import { parseAmount } from '../format/amount.js';
import { cell } from '../store/store.js';
import {
  UNCATEGORIZED,
  categoryOf,
  formatBoolean,
  isBlankRow,
  parseBoolean,
  parseRows,
  requireText,
} from './fields.js';

describe('parseBoolean', () => {
  it('accepts TRUE/YES/1 in any case', () => {
    for (const text of ['TRUE', 'true', 'Yes', 'YES', '1', ' true ']) {
      expect(parseBoolean(text)).toBe(true);
    }
  });

  it('accepts FALSE/NO/0 and empty as false', () => {
    for (const text of ['FALSE', 'false', 'No', '0', '', '  ']) {
      expect(parseBoolean(text)).toBe(false);
    }
  });

  it('rejects anything else', () => {
    expect(() => parseBoolean('maybe')).toThrow('Invalid flag "maybe": expected TRUE or FALSE');
  });

  it('formats as sheet booleans', () => {
    expect(formatBoolean(true)).toBe('TRUE');
    expect(formatBoolean(false)).toBe('FALSE');
  });
});

describe('requireText', () => {
  it('trims', () => {
    expect(requireText('name', '  VTI ')).toBe('VTI');
  });

  it('rejects blank text', () => {
    expect(() => requireText('name', '   ')).toThrow(
      'Invalid name "   ": expected a non-empty value',
    );
  });
});

describe('categoryOf', () => {
  it('falls back to Uncategorized for blank cells', () => {
    expect(categoryOf('')).toBe(UNCATEGORIZED);
    expect(categoryOf('  ')).toBe('Uncategorized');
    expect(categoryOf(' Stocks ')).toBe('Stocks');
  });
});

describe('isBlankRow', () => {
  it('is true only when every cell is blank', () => {
    expect(isBlankRow({})).toBe(true);
    expect(isBlankRow({ A: '', B: '  ' })).toBe(true);
    expect(isBlankRow({ A: '', B: 'x' })).toBe(false);
  });
});

describe('parseRows', () => {
  const parseAmountRow = (row: Record<string, string>): string =>
    parseAmount(cell(row, 'Amount')).toFixed();

  it('skips blank rows', () => {
    const rows = [{ Amount: '1' }, { Amount: '' }, { Amount: '3' }];
    expect(parseRows('investment', rows, parseAmountRow)).toEqual(['1', '3']);
  });

  it('passes the store row index to the parser', () => {
    const rows = [{ Amount: '' }, { Amount: '5' }];
    expect(parseRows('investment', rows, (_row, rowIndex) => rowIndex)).toEqual([1]);
  });

  it('attaches the table and row to a format error', () => {
    const rows = [{ Amount: '1' }, { Amount: '' }, { Amount: 'abc' }];
    try {
      parseRows('investment', rows, parseAmountRow);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FormatError);
      if (err instanceof FormatError) {
        expect(err.location).toEqual({ table: 'investment', rowIndex: 2 });
        expect(err.raw).toBe('abc');
        expect(err.message).toBe('Invalid amount "abc" in investment row 3: expected a number');
      }
    }
  });

  it('rethrows other errors unchanged', () => {
    const boom = new Error('boom');
    expect(() =>
      parseRows('settings', [{ A: 'x' }], () => {
        throw boom;
      }),
    ).toThrow(boom);
  });
});
