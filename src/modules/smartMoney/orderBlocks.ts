/**
 * Order Block Detection Module
 *
 * Bearish OB: last bullish candle before a bearish candle that closes below its low
 * Bullish OB: last bearish candle before a bullish candle that closes above its high
 *
 * Strength is how far the displacement candle closed beyond the anchor's extreme.
 */

import type { Bar, OrderBlock, Polarity } from './types.js';
import { DEFAULT_SWING_LOOKBACK } from './swingPoints.js';

export const MAX_ORDER_BLOCKS = 3;

function isBullishCandle(bar: Bar): boolean {
  return bar.close > bar.open;
}

function isBearishCandle(bar: Bar): boolean {
  return bar.close < bar.open;
}

export function detectOrderBlocks(
  bars: readonly Bar[],
  type: Polarity,
  lookback: number = DEFAULT_SWING_LOOKBACK
): OrderBlock[] {
  const orderBlocks: OrderBlock[] = [];

  for (let i = Math.max(0, lookback); i < bars.length - 1; i++) {
    const ob = type === 'bearish'
      ? detectBearishOrderBlock(bars[i], bars[i + 1], i)
      : detectBullishOrderBlock(bars[i], bars[i + 1], i);

    if (ob) orderBlocks.push(ob);
  }

  // Array.prototype.sort is stable, so equal strengths keep scan order
  return orderBlocks
    .sort((a, b) => b.strength - a.strength)
    .slice(0, MAX_ORDER_BLOCKS);
}

function detectBearishOrderBlock(anchor: Bar, next: Bar, index: number): OrderBlock | null {
  if (!isBullishCandle(anchor)) return null;
  if (!isBearishCandle(next) || next.close >= anchor.low) return null;

  return {
    type: 'bearish',
    anchorIndex: index,
    top: anchor.high,
    bottom: anchor.low,
    strength: Math.abs(next.close - anchor.low),
    timestamp: anchor.timestamp,
  };
}

function detectBullishOrderBlock(anchor: Bar, next: Bar, index: number): OrderBlock | null {
  if (!isBearishCandle(anchor)) return null;
  if (!isBullishCandle(next) || next.close <= anchor.high) return null;

  return {
    type: 'bullish',
    anchorIndex: index,
    top: anchor.high,
    bottom: anchor.low,
    strength: Math.abs(next.close - anchor.high),
    timestamp: anchor.timestamp,
  };
}
