/**
 * Amount parsing and formatting shared by the row mappers, the engine output
 * and the CLI.
 */

import { Decimal } from '../decimal.js';
import { FormatError } from '../errors.js';

const CURRENCY_SIGNS = /\p{Sc}/gu;
const WHITESPACE = /\s+/g;
const PLAIN_NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parse a money amount such as `"฿1,000.50"`, `"-$ 25"` or `"1000"`.
 *
 * The configured currency symbol, any other currency sign, `,` thousands
 * separators and whitespace are stripped; what remains must be a plain
 * decimal number with an optional sign.
 *
 * @throws FormatError when nothing numeric remains (including empty input).
 */
export function parseAmount(text: string, opts: AmountDisplayOptions = {}): Decimal {
  const symbol = opts.currency_symbol ?? '';
  const unsymboled = symbol === '' ? text : text.split(symbol).join('');
  const cleaned = unsymboled.replace(CURRENCY_SIGNS, '').replace(/,/g, '').replace(WHITESPACE, '');
  if (!PLAIN_NUMBER.test(cleaned)) {
    throw new FormatError('amount', text, 'a number');
  }
  return new Decimal(cleaned);
}

/** Like {@link parseAmount} but an empty cell means "not given". */
export function parseOptionalAmount(text: string): Decimal | undefined {
  if (text.trim() === '') return undefined;
  return parseAmount(text);
}

export function isValidAmount(text: string): boolean {
  try {
    parseAmount(text);
    return true;
  } catch (err) {
    if (err instanceof FormatError) return false;
    throw err;
  }
}

/**
 * Format a Decimal to string, stripping trailing zeros.
 */
export function decStr(d: Decimal): string {
  // Decimal.js toFixed() keeps trailing zeros; we need to strip them.
  const s = d.toFixed();
  if (!s.includes('.')) return s === '-0' ? '0' : s;
  let result = s.replace(/0+$/, '');
  if (result.endsWith('.')) {
    result = result.slice(0, -1);
  }
  if (result === '-0') return '0';
  return result;
}

/**
 * Round a Decimal to at most `dp` decimal places (half-up) and format it with
 * {@link decStr}.
 */
export function decStrRounded(d: Decimal, dp: number | undefined): string {
  if (dp === undefined) return decStr(d);
  if (!Number.isInteger(dp) || dp < 0) return decStr(d);
  return decStr(d.toDecimalPlaces(dp, Decimal.ROUND_HALF_UP));
}

function groupIntDigits(intPart: string): string {
  if (intPart.length <= 3) return intPart;
  let out = '';
  for (let i = 0; i < intPart.length; i++) {
    out += intPart[i];
    const remaining = intPart.length - i - 1;
    if (remaining > 0 && remaining % 3 === 0) out += ',';
  }
  return out;
}

function groupNumberString(s: string): string {
  const dot = s.indexOf('.');
  if (dot === -1) return groupIntDigits(s);
  return `${groupIntDigits(s.slice(0, dot))}.${s.slice(dot + 1)}`;
}

export type AmountDisplayOptions = {
  currency_symbol?: string;
  currency_decimals?: number;
  currency_grouping?: boolean;
};

export const DEFAULT_AMOUNT_DISPLAY: Required<AmountDisplayOptions> = {
  currency_symbol: '$',
  currency_decimals: 2,
  currency_grouping: true,
};

/**
 * Format an amount for display: fixed decimals (half-up), optional thousands
 * grouping, currency symbol after the sign (`-$1,234.50`).
 *
 * Everything this produces parses back with {@link parseAmount}, given the
 * same options, to the rounded value.
 */
export function formatAmount(d: Decimal, opts: AmountDisplayOptions = {}): string {
  const symbol = opts.currency_symbol ?? DEFAULT_AMOUNT_DISPLAY.currency_symbol;
  const dp = opts.currency_decimals ?? DEFAULT_AMOUNT_DISPLAY.currency_decimals;
  const grouping = opts.currency_grouping ?? DEFAULT_AMOUNT_DISPLAY.currency_grouping;

  const rounded = d.toDecimalPlaces(dp, Decimal.ROUND_HALF_UP);
  const negative = rounded.isNeg() && !rounded.isZero();

  let s = rounded.abs().toFixed(dp);
  if (grouping) s = groupNumberString(s);

  return `${negative ? '-' : ''}${symbol}${s}`;
}

/**
 * Parse a target percentage such as `"60"`, `"12.5%"` or `""` (zero).
 *
 * @throws FormatError unless the value is a number within 0..100.
 */
export function parsePercent(text: string): Decimal {
  const cleaned = text.replace(WHITESPACE, '').replace(/%$/, '');
  if (cleaned === '') return new Decimal(0);
  if (!PLAIN_NUMBER.test(cleaned)) {
    throw new FormatError('percentage', text, 'a number between 0 and 100');
  }
  const pct = new Decimal(cleaned);
  if (pct.lt(0) || pct.gt(100)) {
    throw new FormatError('percentage', text, 'a number between 0 and 100');
  }
  return pct.isZero() ? new Decimal(0) : pct;
}
