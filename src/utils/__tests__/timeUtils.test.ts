import { describe, it, expect } from 'vitest';
import { formatPrice, formatUtcTime, getDayKey } from '../timeUtils.js';

describe('timeUtils', () => {
  it('formats UTC wall-clock time as HH:MM', () => {
    expect(formatUtcTime(new Date('2026-01-05T07:05:59Z'))).toBe('07:05');
  });

  it('keys days by UTC date', () => {
    expect(getDayKey(new Date('2026-01-05T23:59:00Z'))).toBe('2026-01-05');
    expect(getDayKey(new Date('2026-01-05T23:59:00-02:00'))).toBe('2026-01-06');
  });

  it('formats prices by instrument type', () => {
    expect(formatPrice(1.234567, 'EURUSD')).toBe('1.23457');
    expect(formatPrice(151.2341, 'USDJPY')).toBe('151.234');
    expect(formatPrice(64250.129, 'BTCUSD')).toBe('64250.13');
  });
});
