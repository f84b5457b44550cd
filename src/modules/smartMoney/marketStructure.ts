/**
 * Market Structure Shift (MSS) Detection
 *
 * Bearish MSS: the latest swing low printed a higher low, and price has
 *              since closed back below it.
 * Bullish MSS: the latest swing high printed a lower high, and price has
 *              since closed back above it.
 *
 * The bearish condition is checked first and wins when both are present.
 */

import type { Bar, MarketStructureShift, SwingSet } from './types.js';

export function detectMarketStructureShift(
  bars: readonly Bar[],
  swings: SwingSet
): MarketStructureShift | null {
  if (bars.length === 0) return null;

  const currentClose = bars[bars.length - 1].close;

  if (swings.lows.length >= 2) {
    const [earlier, later] = swings.lows.slice(-2);
    if (later.price > earlier.price && currentClose < later.price) {
      return {
        type: 'Bearish MSS',
        brokenLevel: later.price,
        swingIndex: later.index,
        strength: 'Strong',
        implication: 'Trend reversal to downside',
      };
    }
  }

  if (swings.highs.length >= 2) {
    const [earlier, later] = swings.highs.slice(-2);
    if (later.price < earlier.price && currentClose > later.price) {
      return {
        type: 'Bullish MSS',
        brokenLevel: later.price,
        swingIndex: later.index,
        strength: 'Strong',
        implication: 'Trend reversal to upside',
      };
    }
  }

  return null;
}
