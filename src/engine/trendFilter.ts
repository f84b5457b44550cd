/**
 * Trend Filter Engine
 * Classifies the higher-timeframe context from the close against SMA50/SMA200
 *
 * Rules:
 * - BEARISH: close below both SMA50 and SMA200
 * - BULLISH: close above both SMA50 and SMA200
 * - RANGING: otherwise, or when either average is unavailable (< 200 bars)
 */

import type { Bar, TradeSide } from '../modules/smartMoney/types.js';
import { latestSMA } from './indicatorService.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('TrendFilter');

export type TrendLabel = 'Bearish' | 'Bullish' | 'Ranging';

export interface TrendAnalysis {
  trend: TrendLabel;
  price: number;
  sma50: number | null;
  sma200: number | null;
  reason: string;
}

export const FAST_SMA_PERIOD = 50;
export const SLOW_SMA_PERIOD = 200;

export function analyzeTrend(bars: readonly Bar[]): TrendAnalysis {
  const price = bars.length > 0 ? bars[bars.length - 1].close : 0;
  const sma50 = latestSMA(bars, FAST_SMA_PERIOD);
  const sma200 = latestSMA(bars, SLOW_SMA_PERIOD);

  if (sma50 === null || sma200 === null) {
    logger.debug(`Trend unavailable: ${bars.length} bars < ${SLOW_SMA_PERIOD}`);
    return { trend: 'Ranging', price, sma50, sma200, reason: 'Insufficient bars for SMA200' };
  }

  if (price < sma50 && price < sma200) {
    return { trend: 'Bearish', price, sma50, sma200, reason: 'Close below SMA50 and SMA200' };
  }

  if (price > sma50 && price > sma200) {
    return { trend: 'Bullish', price, sma50, sma200, reason: 'Close above SMA50 and SMA200' };
  }

  return { trend: 'Ranging', price, sma50, sma200, reason: 'Close between SMA50 and SMA200' };
}

export function isTrendAligned(trend: TrendLabel, side: TradeSide): boolean {
  return side === 'short' ? trend === 'Bearish' : trend === 'Bullish';
}

export function isCounterTrend(trend: TrendLabel, side: TradeSide): boolean {
  return side === 'short' ? trend === 'Bullish' : trend === 'Bearish';
}

/** Swing sequence label for the snapshot: LH/HL style read of the last two swings */
export function describeStructure(
  lastHighs: readonly { price: number }[],
  lastLows: readonly { price: number }[]
): string {
  if (lastHighs.length < 2 || lastLows.length < 2) return 'Range';

  const [prevHigh, high] = lastHighs.slice(-2);
  const [prevLow, low] = lastLows.slice(-2);
  const highLabel = high.price > prevHigh.price ? 'HH' : 'LH';
  const lowLabel = low.price > prevLow.price ? 'HL' : 'LL';

  return `${highLabel}/${lowLabel}`;
}
