/**
 * Liquidity Sweep & Confirmation
 * Evaluates the latest bar for a stop-hunt through the recent extreme and
 * for the exhaustion / RSI divergence that confirms a reversal.
 *
 * short: current high takes out the prior highs (buy-side liquidity)
 * long:  current low takes out the prior lows (sell-side liquidity)
 */

import type { AnalysisBar, Bar, LiquidityEvaluation, LiquiditySweep, TradeSide } from './types.js';

export interface LiquidityConfig {
  sweepLookback: number;
  exhaustionMultiplier: number;
}

export const DEFAULT_LIQUIDITY_CONFIG: LiquidityConfig = {
  sweepLookback: 10,
  exhaustionMultiplier: 1.0,
};

export function detectSweep(
  bars: readonly Bar[],
  side: TradeSide,
  lookback: number = DEFAULT_LIQUIDITY_CONFIG.sweepLookback
): LiquiditySweep | null {
  if (bars.length < 2 || lookback < 1) return null;

  const current = bars[bars.length - 1];
  const prior = bars.slice(Math.max(0, bars.length - 1 - lookback), bars.length - 1);

  if (side === 'short') {
    const priorHigh = Math.max(...prior.map(b => b.high));
    if (current.high <= priorHigh) return null;
    return {
      type: 'Local High Sweep',
      side,
      sweptLevel: priorHigh,
      extreme: current.high,
      lookback: prior.length,
    };
  }

  const priorLow = Math.min(...prior.map(b => b.low));
  if (current.low >= priorLow) return null;
  return {
    type: 'Local Low Sweep',
    side,
    sweptLevel: priorLow,
    extreme: current.low,
    lookback: prior.length,
  };
}

export function sweepSideWick(bar: Bar, side: TradeSide): number {
  return side === 'short'
    ? bar.high - Math.max(bar.open, bar.close)
    : Math.min(bar.open, bar.close) - bar.low;
}

export function isExhaustion(bar: Bar, side: TradeSide, multiplier: number): boolean {
  const body = Math.abs(bar.close - bar.open);
  return sweepSideWick(bar, side) >= body * multiplier;
}

export function hasRsiDivergence(current: AnalysisBar, previous: AnalysisBar, side: TradeSide): boolean {
  if (current.rsi === null || previous.rsi === null) return false;

  if (side === 'short') {
    return current.high > previous.high && current.rsi < previous.rsi;
  }
  return current.low < previous.low && current.rsi > previous.rsi;
}

export function evaluateLiquidity(
  bars: readonly AnalysisBar[],
  side: TradeSide,
  config: Partial<LiquidityConfig> = {}
): LiquidityEvaluation {
  const cfg = { ...DEFAULT_LIQUIDITY_CONFIG, ...config };

  if (bars.length < 2) {
    return {
      side,
      sweep: null,
      exhaustion: false,
      divergence: false,
      wickSize: 0,
      bodySize: 0,
      confirmed: false,
    };
  }

  const current = bars[bars.length - 1];
  const previous = bars[bars.length - 2];

  const sweep = detectSweep(bars, side, cfg.sweepLookback);
  const exhaustion = isExhaustion(current, side, cfg.exhaustionMultiplier);
  const divergence = hasRsiDivergence(current, previous, side);

  return {
    side,
    sweep,
    exhaustion,
    divergence,
    wickSize: sweepSideWick(current, side),
    bodySize: Math.abs(current.close - current.open),
    confirmed: divergence || exhaustion,
  };
}
