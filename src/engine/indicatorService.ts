/**
 * Indicator Service
 * Builds the analysis bar series: OHLCV plus RSI(14), ATR(14) and cumulative
 * VWAP. Values a data provider already supplied are kept; missing ones are
 * computed locally with rolling-window formulas.
 *
 * Rolling windows that are not yet full yield null, never a number.
 */

import type { AnalysisBar, Bar, BarSeries } from '../modules/smartMoney/types.js';

export const RSI_PERIOD = 14;
export const ATR_PERIOD = 14;

/** Bar as delivered by a data provider, indicators optional */
export type RawBar = Bar & Partial<Pick<AnalysisBar, 'rsi' | 'atr' | 'vwap'>>;

export function buildBarSeries(raw: readonly RawBar[]): BarSeries {
  const rsi = calculateRSI(raw, RSI_PERIOD);
  const atr = calculateATR(raw, ATR_PERIOD);
  const vwap = calculateVWAP(raw);

  return raw.map((bar, i) => ({
    timestamp: bar.timestamp,
    open: bar.open,
    high: bar.high,
    low: bar.low,
    close: bar.close,
    volume: bar.volume,
    rsi: finiteOrNull(bar.rsi) ?? rsi[i],
    atr: finiteOrNull(bar.atr) ?? atr[i],
    vwap: finiteOrNull(bar.vwap) ?? vwap[i],
  }));
}

function finiteOrNull(value: number | null | undefined): number | null {
  return value !== null && value !== undefined && Number.isFinite(value) ? value : null;
}

/**
 * RSI from simple rolling means of gains and losses
 */
export function calculateRSI(bars: readonly Bar[], period: number = RSI_PERIOD): (number | null)[] {
  const results: (number | null)[] = bars.map(() => null);
  if (bars.length < period + 1) return results;

  const gains: number[] = [0];
  const losses: number[] = [0];
  for (let i = 1; i < bars.length; i++) {
    const change = bars[i].close - bars[i - 1].close;
    gains.push(change > 0 ? change : 0);
    losses.push(change < 0 ? -change : 0);
  }

  for (let i = period; i < bars.length; i++) {
    const avgGain = mean(gains, i - period + 1, i + 1);
    const avgLoss = mean(losses, i - period + 1, i + 1);

    if (avgLoss === 0) {
      // No losses in the window; a fully flat window has no defined RSI
      results[i] = avgGain === 0 ? null : 100;
      continue;
    }

    const rs = avgGain / avgLoss;
    results[i] = 100 - (100 / (1 + rs));
  }

  return results;
}

/**
 * ATR as the simple rolling mean of true range
 */
export function calculateATR(bars: readonly Bar[], period: number = ATR_PERIOD): (number | null)[] {
  const results: (number | null)[] = bars.map(() => null);
  if (bars.length < period) return results;

  const trueRanges = bars.map((bar, i) => {
    if (i === 0) return bar.high - bar.low;
    const prevClose = bars[i - 1].close;
    return Math.max(
      bar.high - bar.low,
      Math.abs(bar.high - prevClose),
      Math.abs(bar.low - prevClose)
    );
  });

  for (let i = period - 1; i < bars.length; i++) {
    results[i] = mean(trueRanges, i - period + 1, i + 1);
  }

  return results;
}

/**
 * Cumulative typical-price VWAP; null until some volume has traded
 */
export function calculateVWAP(bars: readonly Bar[]): (number | null)[] {
  let cumulativePV = 0;
  let cumulativeVolume = 0;

  return bars.map(bar => {
    const typical = (bar.high + bar.low + bar.close) / 3;
    cumulativePV += typical * bar.volume;
    cumulativeVolume += bar.volume;
    return cumulativeVolume > 0 ? cumulativePV / cumulativeVolume : null;
  });
}

/**
 * Simple moving average of closes ending at the last bar
 */
export function latestSMA(bars: readonly Bar[], period: number): number | null {
  if (period < 1 || bars.length < period) return null;
  return mean(bars.map(b => b.close), bars.length - period, bars.length);
}

function mean(values: readonly number[], start: number, end: number): number {
  let sum = 0;
  for (let i = start; i < end; i++) sum += values[i];
  return sum / (end - start);
}
