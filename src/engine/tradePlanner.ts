/**
 * Trade Planner
 * Entry, stop, target and R:R for a confirmed sweep on the latest bar.
 *
 * Stop sits beyond the sweep extreme by a buffer of the bar range; the
 * target is a fixed multiple of the resulting risk.
 */

import type { Bar, TradeSide } from '../modules/smartMoney/types.js';

export interface PlanLevels {
  entry: number;
  entryZoneStart: number;
  entryZoneEnd: number;
  stopLoss: number;
  takeProfit: number;
  risk: number;
  reward: number;
  riskReward: number;
}

export interface PlannerConfig {
  stopBufferRatio: number;
  rewardMultiple: number;
}

const DEFAULT_CONFIG: PlannerConfig = {
  stopBufferRatio: 0.1,
  rewardMultiple: 2,
};

export function planTrade(bar: Bar, side: TradeSide, config: Partial<PlannerConfig> = {}): PlanLevels {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const entry = bar.close;
  const buffer = (bar.high - bar.low) * cfg.stopBufferRatio;

  if (side === 'short') {
    const stopLoss = bar.high + buffer;
    const risk = stopLoss - entry;
    const reward = risk * cfg.rewardMultiple;
    return {
      entry,
      entryZoneStart: entry,
      entryZoneEnd: entry + buffer,
      stopLoss,
      takeProfit: entry - reward,
      risk,
      reward,
      riskReward: risk > 0 ? reward / risk : 0,
    };
  }

  const stopLoss = bar.low - buffer;
  const risk = entry - stopLoss;
  const reward = risk * cfg.rewardMultiple;
  return {
    entry,
    entryZoneStart: entry - buffer,
    entryZoneEnd: entry,
    stopLoss,
    takeProfit: entry + reward,
    risk,
    reward,
    riskReward: risk > 0 ? reward / risk : 0,
  };
}
