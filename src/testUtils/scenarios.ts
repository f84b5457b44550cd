/**
 * Pipeline scenarios built on a steady 29-bar climb from 99.9 to 105.9
 * followed by one decisive bar.
 *
 * The climb has no swings, order blocks or opposite-colour candles, so the
 * last bar alone decides zone, sweep and confirmation.
 */

import type { AnalysisBar } from '../modules/smartMoney/types.js';
import { makeBar, withRsi, type Ohlc } from './bars.js';

export const CLIMB_LENGTH = 29;

function climb(length: number = CLIMB_LENGTH): AnalysisBar[] {
  return Array.from({ length }, (_, i) => {
    const open = 100 + 0.2 * i;
    return makeBar(i, [open, open + 0.3, open - 0.1, open + 0.2]);
  });
}

function climbThen(last: Ohlc): AnalysisBar[] {
  const bars = climb();
  return [...bars, makeBar(bars.length, last)];
}

/**
 * Last bar runs the prior highs to 109.9 and closes at 107.4: Premium at
 * 75% of the 99.9-109.9 range with a 2.5 upper wick on a 0.5 body.
 */
export function premiumSweepBars(): AnalysisBar[] {
  return climbThen([106.9, 109.9, 106.8, 107.4]);
}

/**
 * Last bar spikes to 109.9 but closes at 102.9: Discount at 30% of the
 * range, below every prior low, with a small lower wick.
 */
export function discountBars(): AnalysisBar[] {
  return climbThen([103.4, 109.9, 102.8, 102.9]);
}

/**
 * Long steady climb (enough for SMA200) ending in a high sweep
 */
export function bullishTrendBars(length: number = 220): AnalysisBar[] {
  const bars = climb(length - 1);
  const top = bars[bars.length - 1].high;
  return [...bars, makeBar(bars.length, [top, top + 2, top - 0.1, top + 0.5])];
}

/** Reflects prices through `pivot`, turning highs into lows and rallies into declines */
export function mirrorBars(bars: readonly AnalysisBar[], pivot: number = 220): AnalysisBar[] {
  return bars.map(bar => ({
    ...bar,
    open: pivot - bar.open,
    high: pivot - bar.low,
    low: pivot - bar.high,
    close: pivot - bar.close,
  }));
}

/**
 * Mirror of premiumSweepBars: a decline to 110.1 that closes at 112.6,
 * Discount at 25% of the range with a 2.5 lower wick
 */
export function discountSweepBars(): AnalysisBar[] {
  return mirrorBars(premiumSweepBars());
}

/**
 * Last bar takes the highs to 107.5 with a 0.1 upper wick on a 1.4 body,
 * while supplied RSI drops from 70 to 60
 */
export function divergenceSweepBars(): AnalysisBar[] {
  const bars = climbThen([106.0, 107.5, 105.95, 107.4]);
  const last = bars.length - 1;
  return withRsi(bars, bars.map((_, i) => (i === last - 1 ? 70 : i === last ? 60 : null)));
}

/**
 * Slow climb with a swing high of 110 at bar 5 and a lower swing high of
 * 105 at bar 23; the last bar closes at 106, above the lower high
 */
export function bullishShiftBars(): AnalysisBar[] {
  const bars = Array.from({ length: CLIMB_LENGTH }, (_, i) => {
    const open = 100 + 0.05 * i;
    const high = i === 5 ? 110 : i === 23 ? 105 : open + 0.3;
    return makeBar(i, [open, high, open - 0.3, open + 0.1]);
  });
  return [...bars, makeBar(bars.length, [101.5, 106.5, 101.4, 106])];
}
