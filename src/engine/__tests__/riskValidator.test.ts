import { describe, it, expect } from 'vitest';
import {
  RiskValidator,
  createRiskState,
  recordOutcome,
  recordTrade,
  rollRiskDay,
  type RiskState,
} from '../riskValidator.js';
import { DEFAULT_ENGINE_CONFIG } from '../../config/defaults.js';

const validator = RiskValidator.fromConfig(DEFAULT_ENGINE_CONFIG);

function at(time: string): Date {
  return new Date(`2026-01-05T${time}:00Z`);
}

function state(overrides: Partial<RiskState> = {}): RiskState {
  return { ...createRiskState(at('08:00')), ...overrides };
}

describe('RiskValidator.sessionFor', () => {
  it('maps UTC clock time to the session window', () => {
    expect(validator.sessionFor(at('08:30'))).toBe('LONDON');
    expect(validator.sessionFor(at('16:30'))).toBe('NEW_YORK');
    expect(validator.sessionFor(at('17:30'))).toBeNull();
    expect(validator.sessionFor(at('06:59'))).toBeNull();
  });

  it('treats both bounds as inclusive', () => {
    expect(validator.sessionFor(at('07:00'))).toBe('LONDON');
    expect(validator.sessionFor(at('17:00'))).toBe('NEW_YORK');
  });

  it('gives London the overlap', () => {
    expect(validator.sessionFor(at('14:00'))).toBe('LONDON');
    expect(validator.sessionFor(at('16:00'))).toBe('LONDON');
  });
});

describe('RiskValidator.canTrade', () => {
  it('allows a fresh day', () => {
    expect(validator.canTrade(state())).toEqual({ allowed: true, reason: 'OK' });
  });

  it('reports the first breached limit', () => {
    expect(validator.canTrade(state({ dailyTrades: 3, consecutiveLosses: 2 }))).toEqual({
      allowed: false,
      reason: 'Max daily trades reached',
    });
    expect(validator.canTrade(state({ consecutiveLosses: 2, dailyDrawdownPct: 5 })).reason)
      .toBe('Stopped due to consecutive losses');
    expect(validator.canTrade(state({ dailyDrawdownPct: 4 })).reason).toBe('Max daily drawdown reached');
  });
});

describe('RiskValidator.validateSetup', () => {
  it('accepts a setup meeting every threshold', () => {
    expect(validator.validateSetup(2, 0.5, 50)).toEqual({ allowed: true, reason: 'Valid' });
  });

  it('checks R:R, then spread, then probability', () => {
    expect(validator.validateSetup(1.5, 0.6, 40).reason).toBe('R:R 1.5 < 2');
    expect(validator.validateSetup(2, 0.6, 40).reason).toBe('Spread 0.6 > 0.5');
    expect(validator.validateSetup(2, 0.1, 45).reason).toBe('Probability 45% < 50%');
  });
});

describe('risk state transitions', () => {
  it('counts trades without mutating the input', () => {
    const before = state();
    const after = recordTrade(before);

    expect(after.dailyTrades).toBe(1);
    expect(before.dailyTrades).toBe(0);
  });

  it('tracks loss streaks and drawdown', () => {
    const lost = recordOutcome(recordOutcome(state(), 'LOSS', 1), 'LOSS', 1.5);
    expect(lost.consecutiveLosses).toBe(2);
    expect(lost.dailyDrawdownPct).toBe(2.5);

    const won = recordOutcome(lost, 'WIN');
    expect(won.consecutiveLosses).toBe(0);
    expect(won.dailyDrawdownPct).toBe(2.5);

    expect(recordOutcome(lost, 'BREAK_EVEN')).toBe(lost);
  });

  it('resets daily counters on a new UTC day', () => {
    const busy = state({ dailyTrades: 3, consecutiveLosses: 1, dailyDrawdownPct: 2 });

    expect(rollRiskDay(busy, at('23:59'))).toBe(busy);
    expect(rollRiskDay(busy, new Date('2026-01-06T00:01:00Z'))).toEqual({
      dayKey: '2026-01-06',
      dailyTrades: 0,
      consecutiveLosses: 1,
      dailyDrawdownPct: 0,
    });
  });
});
