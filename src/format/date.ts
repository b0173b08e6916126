/**
 * Calendar-date parsing and formatting.
 *
 * Dates in the worksheets are plain calendar days with no time zone, so they
 * are carried as `Ymd` values rather than `Date` instants.
 */

import { FormatError } from '../errors.js';

export type Ymd = { readonly y: number; readonly m: number; readonly d: number };

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

function isLeapYear(y: number): boolean {
  return (y % 4 === 0 && y % 100 !== 0) || y % 400 === 0;
}

/** Days in month `m` (1-12) of the proleptic Gregorian calendar. */
function daysInMonth(y: number, m: number): number {
  if (m === 2 && isLeapYear(y)) return 29;
  return MONTH_DAYS[m - 1] ?? 0;
}

/**
 * Parse a "YYYY-MM-DD" date. Surrounding whitespace is ignored; the day must
 * exist in the calendar.
 *
 * @throws FormatError for any other shape, or an impossible day like 2024-02-30.
 */
export function parseDate(text: string): Ymd {
  const m = text.trim().match(ISO_DATE);
  if (!m) throw new FormatError('date', text, 'YYYY-MM-DD');
  const y = Number.parseInt(m[1], 10);
  const mo = Number.parseInt(m[2], 10);
  const d = Number.parseInt(m[3], 10);
  if (mo < 1 || mo > 12 || d < 1 || d > daysInMonth(y, mo)) {
    throw new FormatError('date', text, 'a calendar day in YYYY-MM-DD');
  }
  return { y, m: mo, d };
}

/** Inverse of {@link parseDate}. */
export function formatDate(ymd: Ymd): string {
  return `${ymd.y.toString().padStart(4, '0')}-${pad2(ymd.m)}-${pad2(ymd.d)}`;
}

/** "DD/MM/YYYY", the day-first form used for display. */
export function formatDisplayDate(ymd: Ymd): string {
  return `${pad2(ymd.d)}/${pad2(ymd.m)}/${ymd.y.toString().padStart(4, '0')}`;
}

export function isValidDate(text: string): boolean {
  try {
    parseDate(text);
    return true;
  } catch (err) {
    if (err instanceof FormatError) return false;
    throw err;
  }
}

/** "YYYY-MM" bucket key. */
export function monthKey(ymd: Ymd): string {
  return `${ymd.y.toString().padStart(4, '0')}-${pad2(ymd.m)}`;
}

export function compareYmd(a: Ymd, b: Ymd): number {
  if (a.y !== b.y) return a.y < b.y ? -1 : 1;
  if (a.m !== b.m) return a.m < b.m ? -1 : 1;
  if (a.d !== b.d) return a.d < b.d ? -1 : 1;
  return 0;
}

/** True when `x` lies within the inclusive range; either bound may be absent. */
export function ymdInRange(x: Ymd, start?: Ymd, end?: Ymd): boolean {
  if (start !== undefined && compareYmd(x, start) < 0) return false;
  if (end !== undefined && compareYmd(x, end) > 0) return false;
  return true;
}

/** The calendar day an instant falls on in the given IANA time zone. */
export function ymdFromInstant(date: Date, timeZone = 'UTC'): Ymd {
  const dtf = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  const parts = dtf.formatToParts(date);
  const get = (type: string): string => {
    const p = parts.find((x) => x.type === type);
    if (!p) throw new Error(`Failed to format date in timezone '${timeZone}'`);
    return p.value;
  };
  return {
    y: Number.parseInt(get('year'), 10),
    m: Number.parseInt(get('month'), 10),
    d: Number.parseInt(get('day'), 10),
  };
}
