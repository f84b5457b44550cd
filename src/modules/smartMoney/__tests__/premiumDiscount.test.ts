import { describe, it, expect } from 'vitest';
import { calculatePremiumDiscount, classifyZone } from '../premiumDiscount.js';
import { flatBars, makeBars } from '../../../testUtils/bars.js';

function rangeEndingAt(close: number) {
  return makeBars([
    [100, 101, 100, 100.5],
    [105, 110, 104, close],
  ]);
}

describe('classifyZone', () => {
  it('uses strict thresholds at 0.618, 0.5 and 0.382', () => {
    expect(classifyZone(0.619)).toBe('Premium');
    expect(classifyZone(0.618)).toBe('Premium (Weak)');
    expect(classifyZone(0.5)).toBe('Equilibrium');
    expect(classifyZone(0.382)).toBe('Discount');
    expect(classifyZone(0)).toBe('Discount');
  });
});

describe('calculatePremiumDiscount', () => {
  it('places a close at 70% of the range in Premium', () => {
    const zone = calculatePremiumDiscount(rangeEndingAt(107));

    expect(zone.rangeHigh).toBe(110);
    expect(zone.rangeLow).toBe(100);
    expect(zone.position).toBeCloseTo(0.7, 10);
    expect(zone.zone).toBe('Premium');
    expect(zone.strength).toBe('STRONG SHORT ZONE');
  });

  it('places a close at 55% of the range in Premium (Weak)', () => {
    const zone = calculatePremiumDiscount(rangeEndingAt(105.5));
    expect(zone.zone).toBe('Premium (Weak)');
    expect(zone.strength).toBe('MODERATE SHORT ZONE');
  });

  it('places a close at 30% of the range in Discount', () => {
    const zone = calculatePremiumDiscount(rangeEndingAt(103));
    expect(zone.position).toBeCloseTo(0.3, 10);
    expect(zone.zone).toBe('Discount');
    expect(zone.strength).toBe('LONG ZONE');
  });

  it('sits on equilibrium when the range is flat', () => {
    const zone = calculatePremiumDiscount(flatBars(20, 1.2345));

    expect(zone.position).toBe(0.5);
    expect(zone.zone).toBe('Equilibrium');
    expect(zone.strength).toBe('NEUTRAL ZONE');
  });

  it('sits on equilibrium for an empty series', () => {
    const zone = calculatePremiumDiscount([]);
    expect(zone.position).toBe(0.5);
    expect(zone.currentPrice).toBe(0);
  });

  it('measures the range over the trailing window only', () => {
    const bars = makeBars([
      [150, 200, 150, 150],
      [100, 101, 100, 100.5],
      [105, 110, 104, 107],
    ]);

    expect(calculatePremiumDiscount(bars, 2).rangeHigh).toBe(110);
    expect(calculatePremiumDiscount(bars, 3).rangeHigh).toBe(200);
  });

  it('lists the Fibonacci levels from high to low', () => {
    const { levels } = calculatePremiumDiscount(rangeEndingAt(107));

    expect(levels.map(l => l.label)).toEqual([
      '1.0 (High)', '0.786', '0.618 (Golden)', '0.5 (Equilibrium)', '0.382', '0.236', '0.0 (Low)',
    ]);
    expect(levels[0].price).toBe(110);
    expect(levels[2].price).toBeCloseTo(106.18, 10);
    expect(levels[3].price).toBe(105);
    expect(levels[6].price).toBe(100);
  });
});
