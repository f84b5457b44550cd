/**
 * Setup, plan and SMC fixtures for scorer and storage tests
 */

import type { SmcAnalysis } from '../modules/smartMoney/types.js';
import type { TradePlan, TradeSetup } from '../types/analysis.js';

export function buildSetup(overrides: Partial<TradeSetup> = {}): TradeSetup {
  return {
    direction: 'SHORT',
    instrument: 'EURUSD',
    assetClass: 'forex',
    session: 'LONDON',
    htfTrend: 'Ranging',
    htfStructure: 'Range',
    keyLevel: 1.1,
    liquidityEvent: null,
    hasLargeWick: false,
    atrValue: 0.001,
    rsiDivergence: false,
    vwapDistance: 0,
    spread: 0,
    newsProximityMinutes: null,
    premiumPosition: 0.5,
    zone: 'Equilibrium',
    inPremiumZone: false,
    bearishObCount: 0,
    bullishObCount: 0,
    fvgCount: 0,
    hasBearishMss: false,
    hasBullishMss: false,
    ...overrides,
  };
}

export function buildSmc(position: number, overrides: Partial<SmcAnalysis> = {}): SmcAnalysis {
  return {
    swings: { highs: [], lows: [] },
    orderBlocks: { bearish: [], bullish: [] },
    fairValueGaps: [],
    premiumDiscount: {
      currentPrice: 100 + position * 10,
      rangeHigh: 110,
      rangeLow: 100,
      position,
      zone: 'Equilibrium',
      strength: 'NEUTRAL ZONE',
      levels: [],
    },
    marketStructureShift: null,
    ...overrides,
  };
}

export function buildPlan(overrides: Partial<TradePlan> = {}): TradePlan {
  return {
    direction: 'SHORT',
    entryZoneStart: 1.1,
    entryZoneEnd: 1.101,
    stopLoss: 1.105,
    takeProfit1: 1.09,
    takeProfit2: null,
    estimatedRR: 2,
    probabilityScore: 60,
    scoreSource: 'rule-based',
    ...overrides,
  };
}
