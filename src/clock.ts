import { type Ymd, ymdFromInstant } from './format/date.js';

/**
 * Source of "today" for records entered without a date.
 *
 * Worksheet dates are calendar days, so the clock answers in days for a
 * configured time zone rather than in instants.
 */
export interface Clock {
  now(): Date;
  today(): Ymd;
}

/** Real wall-clock backed by `Date.now()`. */
export class SystemClock implements Clock {
  private readonly timeZone: string;

  constructor(timeZone = 'UTC') {
    this.timeZone = timeZone;
  }

  now(): Date {
    return new Date();
  }

  today(): Ymd {
    return ymdFromInstant(this.now(), this.timeZone);
  }
}

/** Clock frozen at a specific instant. Useful for deterministic tests. */
export class FixedClock implements Clock {
  private readonly _now: Date;
  private readonly timeZone: string;

  constructor(now: Date, timeZone = 'UTC') {
    this._now = new Date(now.getTime());
    this.timeZone = timeZone;
  }

  now(): Date {
    return new Date(this._now.getTime());
  }

  today(): Ymd {
    return ymdFromInstant(this._now, this.timeZone);
  }
}
