/**
 * Performance Review
 * Periodic read of recorded outcomes: win rate per session and expectancy
 * (average realized R) per liquidity event. Conditions with negative
 * expectancy are flagged as loss-prone.
 */

import type { OutcomeRecord } from '../types/collaborators.js';

export const SAMPLE_TOO_SMALL = 'NO STRUCTURAL CONCLUSIONS – SAMPLE TOO SMALL';

export interface GroupStats {
  key: string;
  trades: number;
  wins: number;
  losses: number;
  winRate: number;      // percent, 1 decimal
  averageR: number;     // 2 decimals
}

export interface PerformanceReview {
  sampleSize: number;
  sufficient: boolean;
  message: string;
  overall: GroupStats | null;
  bySession: GroupStats[];
  byLiquidityEvent: GroupStats[];
  highPerforming: string[];
  lossProne: string[];
}

export interface ReviewOptions {
  minSample: number;
}

const DEFAULT_OPTIONS: ReviewOptions = {
  minSample: 20,
};

export function generatePerformanceReview(
  outcomes: readonly OutcomeRecord[],
  options: Partial<ReviewOptions> = {}
): PerformanceReview {
  const { minSample } = { ...DEFAULT_OPTIONS, ...options };

  if (outcomes.length === 0 || outcomes.length < minSample) {
    return {
      sampleSize: outcomes.length,
      sufficient: false,
      message: SAMPLE_TOO_SMALL,
      overall: null,
      bySession: [],
      byLiquidityEvent: [],
      highPerforming: [],
      lossProne: [],
    };
  }

  const bySession = groupStats(outcomes, o => o.session ?? 'OFF_SESSION');
  const byLiquidityEvent = groupStats(outcomes, o => o.liquidityEvent ?? 'None');
  const labelled = [
    ...bySession.map(s => ({ label: `Session ${s.key}`, stats: s })),
    ...byLiquidityEvent.map(s => ({ label: `Liquidity ${s.key}`, stats: s })),
  ];

  return {
    sampleSize: outcomes.length,
    sufficient: true,
    message: `Sample Size: ${outcomes.length} trades`,
    overall: summarize('ALL', outcomes),
    bySession,
    byLiquidityEvent,
    highPerforming: labelled.filter(l => l.stats.averageR > 0).map(l => l.label),
    lossProne: labelled.filter(l => l.stats.averageR < 0).map(l => l.label),
  };
}

function groupStats(outcomes: readonly OutcomeRecord[], keyOf: (o: OutcomeRecord) => string): GroupStats[] {
  const groups = new Map<string, OutcomeRecord[]>();
  for (const outcome of outcomes) {
    const key = keyOf(outcome);
    const group = groups.get(key);
    if (group) {
      group.push(outcome);
    } else {
      groups.set(key, [outcome]);
    }
  }

  return [...groups.entries()]
    .map(([key, group]) => summarize(key, group))
    .sort((a, b) => a.key.localeCompare(b.key));
}

function summarize(key: string, group: readonly OutcomeRecord[]): GroupStats {
  const wins = group.filter(o => o.outcome === 'WIN').length;
  const losses = group.filter(o => o.outcome === 'LOSS').length;
  const totalR = group.reduce((sum, o) => sum + o.realizedR, 0);

  return {
    key,
    trades: group.length,
    wins,
    losses,
    winRate: round(wins / group.length * 100, 1),
    averageR: round(totalR / group.length, 2),
  };
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Plain-text report for logs and the review endpoint
 */
export function formatPerformanceReview(review: PerformanceReview): string {
  if (!review.sufficient) return review.message;

  const row = (s: GroupStats): string =>
    `  ${s.key.padEnd(18)} ${String(s.trades).padStart(4)} trades  ${s.winRate.toFixed(1).padStart(5)}% win  ${s.averageR.toFixed(2).padStart(6)}R`;

  return [
    'SELF-LEARNING REVIEW',
    review.message,
    '',
    'BY SESSION',
    ...review.bySession.map(row),
    '',
    'BY LIQUIDITY EVENT',
    ...review.byLiquidityEvent.map(row),
    '',
    `Avoid (negative expectancy): ${review.lossProne.length > 0 ? review.lossProne.join(', ') : 'none'}`,
  ].join('\n');
}
