/**
 * SMC Analyzer
 * Runs every structural detector over one bar series and returns the
 * snapshot the decision pipeline and the scorers read from.
 */

import type { Bar, SmcAnalysis } from './types.js';
import { locateSwings, DEFAULT_SWING_LOOKBACK } from './swingPoints.js';
import { detectOrderBlocks } from './orderBlocks.js';
import { detectFairValueGaps } from './fairValueGaps.js';
import { calculatePremiumDiscount, DEFAULT_ZONE_WINDOW } from './premiumDiscount.js';
import { detectMarketStructureShift } from './marketStructure.js';

export interface SmcConfig {
  swingLookback: number;
  zoneWindow: number;
}

const DEFAULT_CONFIG: SmcConfig = {
  swingLookback: DEFAULT_SWING_LOOKBACK,
  zoneWindow: DEFAULT_ZONE_WINDOW,
};

export function analyzeSmartMoney(bars: readonly Bar[], config: Partial<SmcConfig> = {}): SmcAnalysis {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const swings = locateSwings(bars, cfg.swingLookback);

  return {
    swings,
    orderBlocks: {
      bearish: detectOrderBlocks(bars, 'bearish', cfg.swingLookback),
      bullish: detectOrderBlocks(bars, 'bullish', cfg.swingLookback),
    },
    fairValueGaps: detectFairValueGaps(bars),
    premiumDiscount: calculatePremiumDiscount(bars, cfg.zoneWindow),
    marketStructureShift: detectMarketStructureShift(bars, swings),
  };
}

export function formatSmcSummary(smc: SmcAnalysis): string {
  const pd = smc.premiumDiscount;
  const lines = [
    `Zone: ${pd.zone} (${(pd.position * 100).toFixed(1)}%) - ${pd.strength}`,
    `OB: ${smc.orderBlocks.bearish.length} bearish / ${smc.orderBlocks.bullish.length} bullish`,
    `FVGs: ${smc.fairValueGaps.length} active`,
  ];

  if (smc.marketStructureShift) {
    lines.push(`MSS: ${smc.marketStructureShift.type} - ${smc.marketStructureShift.implication}`);
  }

  return lines.join(' | ');
}
