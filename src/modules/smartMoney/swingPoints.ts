/**
 * Swing Point Locator
 * A bar is a swing high when its high equals the highest high of the
 * symmetric window [i - lookback, i + lookback]; swing lows mirror this.
 * Ties qualify, so a flat top can yield several adjacent swing highs.
 */

import type { Bar, SwingSet } from './types.js';

export const DEFAULT_SWING_LOOKBACK = 5;

export function locateSwings(bars: readonly Bar[], lookback: number = DEFAULT_SWING_LOOKBACK): SwingSet {
  const swings: SwingSet = { highs: [], lows: [] };

  if (lookback < 1 || bars.length < lookback * 2 + 1) return swings;

  for (let i = lookback; i < bars.length - lookback; i++) {
    const bar = bars[i];
    let windowHigh = -Infinity;
    let windowLow = Infinity;

    for (let j = i - lookback; j <= i + lookback; j++) {
      windowHigh = Math.max(windowHigh, bars[j].high);
      windowLow = Math.min(windowLow, bars[j].low);
    }

    if (bar.high === windowHigh) {
      swings.highs.push({ kind: 'high', index: i, price: bar.high, timestamp: bar.timestamp });
    }

    if (bar.low === windowLow) {
      swings.lows.push({ kind: 'low', index: i, price: bar.low, timestamp: bar.timestamp });
    }
  }

  return swings;
}
