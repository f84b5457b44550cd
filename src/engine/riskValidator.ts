/**
 * Risk Validator
 * Session windows, daily account limits and per-setup quality thresholds.
 *
 * Risk counters live in a caller-owned RiskState. The transitions below are
 * pure: they return a new state and never mutate the one passed in.
 */

import type { EngineConfig, Filters, RiskRules, TradingHours } from '../validation/schemas.js';
import type { SessionName } from '../types/analysis.js';
import type { OutcomeLabel } from '../types/collaborators.js';
import { formatUtcTime, getDayKey } from '../utils/timeUtils.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('RiskValidator');

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface RiskCheck {
  allowed: boolean;
  reason: string;
}

export interface RiskState {
  dayKey: string;
  dailyTrades: number;
  consecutiveLosses: number;
  dailyDrawdownPct: number;
}

// ═══════════════════════════════════════════════════════════════
// RISK STATE TRANSITIONS
// ═══════════════════════════════════════════════════════════════

export function createRiskState(now: Date = new Date()): RiskState {
  return {
    dayKey: getDayKey(now),
    dailyTrades: 0,
    consecutiveLosses: 0,
    dailyDrawdownPct: 0,
  };
}

/**
 * Reset daily counters when the UTC day has changed. The loss streak
 * carries over.
 */
export function rollRiskDay(state: RiskState, now: Date = new Date()): RiskState {
  const dayKey = getDayKey(now);
  if (dayKey === state.dayKey) return state;
  return { ...state, dayKey, dailyTrades: 0, dailyDrawdownPct: 0 };
}

export function recordTrade(state: RiskState): RiskState {
  return { ...state, dailyTrades: state.dailyTrades + 1 };
}

/**
 * @param lossPct account percentage lost on the trade (positive number), 0 for wins
 */
export function recordOutcome(state: RiskState, outcome: OutcomeLabel, lossPct: number = 0): RiskState {
  switch (outcome) {
    case 'LOSS':
      return {
        ...state,
        consecutiveLosses: state.consecutiveLosses + 1,
        dailyDrawdownPct: state.dailyDrawdownPct + Math.abs(lossPct),
      };
    case 'WIN':
      return { ...state, consecutiveLosses: 0 };
    case 'BREAK_EVEN':
      return state;
  }
}

// ═══════════════════════════════════════════════════════════════
// VALIDATOR
// ═══════════════════════════════════════════════════════════════

export class RiskValidator {
  constructor(
    private readonly risk: RiskRules,
    private readonly filters: Filters,
    private readonly hours: TradingHours
  ) {}

  static fromConfig(config: EngineConfig): RiskValidator {
    return new RiskValidator(config.risk, config.filters, config.tradingHours);
  }

  /**
   * Active session for a UTC instant. Bounds are inclusive and London wins
   * the overlap.
   */
  sessionFor(date: Date): SessionName | null {
    const time = formatUtcTime(date);

    if (time >= this.hours.london.start && time <= this.hours.london.end) {
      return 'LONDON';
    }
    if (time >= this.hours.newYork.start && time <= this.hours.newYork.end) {
      return 'NEW_YORK';
    }
    return null;
  }

  canTrade(state: RiskState): RiskCheck {
    if (state.dailyTrades >= this.risk.maxTradesPerDay) {
      return { allowed: false, reason: 'Max daily trades reached' };
    }
    if (state.consecutiveLosses >= this.risk.consecutiveLossStopCount) {
      return { allowed: false, reason: 'Stopped due to consecutive losses' };
    }
    if (state.dailyDrawdownPct >= this.risk.maxDailyDrawdownPct) {
      return { allowed: false, reason: 'Max daily drawdown reached' };
    }
    return { allowed: true, reason: 'OK' };
  }

  validateSetup(riskReward: number, spread: number, probability: number): RiskCheck {
    if (riskReward < this.risk.minRiskReward) {
      return { allowed: false, reason: `R:R ${riskReward} < ${this.risk.minRiskReward}` };
    }
    if (spread > this.filters.maxSpread) {
      return { allowed: false, reason: `Spread ${spread} > ${this.filters.maxSpread}` };
    }
    if (probability < this.filters.minProbabilityPct) {
      logger.debug(`Probability ${probability}% below threshold`);
      return { allowed: false, reason: `Probability ${probability}% < ${this.filters.minProbabilityPct}%` };
    }
    return { allowed: true, reason: 'Valid' };
  }
}
