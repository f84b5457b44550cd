/**
 * Fair Value Gap (FVG) Detection Module
 * Three-bar imbalances where the first and third candles do not overlap
 *
 * Bearish FVG: candle 1's low above candle 3's high (price fell fast)
 * Bullish FVG: candle 1's high below candle 3's low (price rose fast)
 */

import type { Bar, FairValueGap } from './types.js';

export const MAX_FAIR_VALUE_GAPS = 5;

export function detectFairValueGaps(bars: readonly Bar[]): FairValueGap[] {
  const fairValueGaps: FairValueGap[] = [];

  for (let i = 2; i < bars.length; i++) {
    const first = bars[i - 2];
    const third = bars[i];

    if (first.low > third.high) {
      fairValueGaps.push({
        type: 'bearish',
        index: i,
        top: first.low,
        bottom: third.high,
        size: first.low - third.high,
        timestamp: third.timestamp,
      });
    } else if (first.high < third.low) {
      fairValueGaps.push({
        type: 'bullish',
        index: i,
        top: third.low,
        bottom: first.high,
        size: third.low - first.high,
        timestamp: third.timestamp,
      });
    }
  }

  return fairValueGaps.slice(-MAX_FAIR_VALUE_GAPS);
}
