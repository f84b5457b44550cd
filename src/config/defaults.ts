/**
 * Default Engine Settings
 * Relaxed direction-aware thresholds; every value can be overridden from
 * config/engine.config.json.
 */

import type { EngineConfig } from '../validation/schemas.js';

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  // ═══════════════════════════════════════════════════════════════
  // STRUCTURE & CONFIRMATION
  // ═══════════════════════════════════════════════════════════════
  analysis: {
    swingLookback: 5,          // bars either side of a swing point
    zoneWindow: 50,            // trailing bars for premium/discount range
    sweepLookback: 10,         // prior bars the sweep must take out
    exhaustionMultiplier: 1.0, // wick >= body x this (legacy single-direction build used 1.5)
    stopBufferRatio: 0.1,      // stop beyond the sweep extreme by 10% of the bar range
    rewardMultiple: 2,         // target = 2R
    blockCounterTrend: false,
  },

  // ═══════════════════════════════════════════════════════════════
  // ZONE ACCEPTANCE (per asset class and direction)
  // Crypto is more volatile, so it also trades from equilibrium
  // ═══════════════════════════════════════════════════════════════
  zones: {
    forex: {
      short: ['Premium', 'Premium (Weak)'],
      long: ['Discount', 'Equilibrium'],
    },
    crypto: {
      short: ['Premium', 'Premium (Weak)', 'Equilibrium'],
      long: ['Discount', 'Equilibrium', 'Premium (Weak)'],
    },
  },

  // ═══════════════════════════════════════════════════════════════
  // RISK RULES
  // ═══════════════════════════════════════════════════════════════
  risk: {
    maxTradesPerDay: 3,
    consecutiveLossStopCount: 2,
    maxDailyDrawdownPct: 4,    // 4% max daily loss
    minRiskReward: 2.0,
  },

  filters: {
    maxSpread: 0.5,
    minProbabilityPct: 50,
  },

  // ═══════════════════════════════════════════════════════════════
  // SESSIONS (UTC, inclusive)
  // ═══════════════════════════════════════════════════════════════
  tradingHours: {
    london: { start: '07:00', end: '16:00' },
    newYork: { start: '13:00', end: '17:00' },
  },

  news: {
    blockWindowMinutes: 15,
    currency: 'USD',
    impact: 'High',
  },

  instruments: [],
};
