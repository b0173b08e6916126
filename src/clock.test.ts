import { describe, it, expect } from 'vitest';
import { SystemClock, FixedClock, type Clock } from './clock.js';

describe('SystemClock', () => {
  it('implements Clock interface', () => {
    const clock: Clock = new SystemClock();
    expect(clock.now()).toBeInstanceOf(Date);
  });

  it('today() matches the UTC date of now() by default', () => {
    const clock = new SystemClock();
    const today = clock.today();
    const iso = clock.now().toISOString().slice(0, 10);
    const [y, m, d] = iso.split('-').map((p) => Number.parseInt(p, 10));
    // Guard against a midnight rollover between the two calls.
    if (clock.now().toISOString().slice(0, 10) === iso) {
      expect(today).toEqual({ y, m, d });
    }
  });
});

describe('FixedClock', () => {
  it('now() always returns the fixed instant', () => {
    const date = new Date('2024-06-15T12:30:00Z');
    const clock = new FixedClock(date);
    expect(clock.now().getTime()).toBe(date.getTime());
    expect(clock.now().getTime()).toBe(date.getTime());
  });

  it('now() returns a copy, not the same reference', () => {
    const date = new Date('2024-06-15T12:30:00Z');
    const clock = new FixedClock(date);
    expect(clock.now()).not.toBe(clock.now());
  });

  it('today() uses UTC unless told otherwise', () => {
    const clock = new FixedClock(new Date('2024-06-15T23:59:59Z'));
    expect(clock.today()).toEqual({ y: 2024, m: 6, d: 15 });
  });

  it('today() follows the configured time zone', () => {
    const clock = new FixedClock(new Date('2024-06-15T23:59:59Z'), 'Asia/Bangkok');
    expect(clock.today()).toEqual({ y: 2024, m: 6, d: 16 });
  });
});
