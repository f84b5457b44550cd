/**
 * Premium/Discount Zone Calculator
 * Places the current close inside the recent high-low range using
 * Fibonacci retracement ratios.
 *
 * Premium: above 0.618 (expensive, favours shorts)
 * Equilibrium: 0.382 - 0.5
 * Discount: 0.382 and below (cheap, favours longs)
 */

import type { Bar, FibonacciLevel, PremiumDiscountZone, ZoneName } from './types.js';

export const DEFAULT_ZONE_WINDOW = 50;

const FIBONACCI_LEVELS: ReadonlyArray<{ ratio: number; label: string }> = [
  { ratio: 1.0, label: '1.0 (High)' },
  { ratio: 0.786, label: '0.786' },
  { ratio: 0.618, label: '0.618 (Golden)' },
  { ratio: 0.5, label: '0.5 (Equilibrium)' },
  { ratio: 0.382, label: '0.382' },
  { ratio: 0.236, label: '0.236' },
  { ratio: 0.0, label: '0.0 (Low)' },
];

const ZONE_STRENGTH: Record<ZoneName, string> = {
  'Premium': 'STRONG SHORT ZONE',
  'Premium (Weak)': 'MODERATE SHORT ZONE',
  'Equilibrium': 'NEUTRAL ZONE',
  'Discount': 'LONG ZONE',
};

export function classifyZone(position: number): ZoneName {
  if (position > 0.618) return 'Premium';
  if (position > 0.5) return 'Premium (Weak)';
  if (position > 0.382) return 'Equilibrium';
  return 'Discount';
}

export function calculatePremiumDiscount(
  bars: readonly Bar[],
  window: number = DEFAULT_ZONE_WINDOW
): PremiumDiscountZone {
  const recent = bars.slice(-Math.max(1, window));

  if (recent.length === 0) {
    return buildZone(0, 0, 0);
  }

  let rangeHigh = -Infinity;
  let rangeLow = Infinity;
  for (const bar of recent) {
    rangeHigh = Math.max(rangeHigh, bar.high);
    rangeLow = Math.min(rangeLow, bar.low);
  }

  return buildZone(recent[recent.length - 1].close, rangeHigh, rangeLow);
}

function buildZone(currentPrice: number, rangeHigh: number, rangeLow: number): PremiumDiscountZone {
  const rangeSize = rangeHigh - rangeLow;

  // Flat window: no range to measure against, sit on equilibrium
  const position = rangeSize > 0
    ? clampUnit((currentPrice - rangeLow) / rangeSize)
    : 0.5;
  const zone = classifyZone(position);

  const levels: FibonacciLevel[] = FIBONACCI_LEVELS.map(({ ratio, label }) => ({
    ratio,
    label,
    price: ratio === 1 ? rangeHigh : rangeLow + rangeSize * ratio,
  }));

  return {
    currentPrice,
    rangeHigh,
    rangeLow,
    position,
    zone,
    strength: ZONE_STRENGTH[zone],
    levels,
  };
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}
