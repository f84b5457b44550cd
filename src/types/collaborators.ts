/**
 * Collaborator Interfaces
 * Boundaries the core consumes but does not own: market data, news,
 * learned models, persistence and notification.
 */

import type { RawBar } from '../engine/indicatorService.js';
import type { PerformanceReview } from '../engine/performanceReview.js';
import type { AnalysisResult, NewsProximity, SessionName, TradeDirection, TradePlan, TradeSetup } from './analysis.js';

export interface BarRequest {
  period: string;      // e.g. '5d'
  interval: string;    // e.g. '15m'
}

export interface MarketDataProvider {
  fetchBars(symbol: string, request: BarRequest): Promise<RawBar[]>;
}

export interface NewsProvider {
  nearestHighImpact(now: Date): Promise<NewsProximity>;
}

/** Numeric feature vector keyed by feature name */
export type SetupFeatures = Record<string, number>;

export interface ProbabilityModel {
  isReady(): boolean;
  /** Success probability in percent (0-100) */
  predict(features: SetupFeatures): number;
}

export type OutcomeLabel = 'WIN' | 'LOSS' | 'BREAK_EVEN';

export interface TradeOutcomeInput {
  planId: number;
  entryPrice: number;
  exitPrice: number;
  outcome: OutcomeLabel;
  realizedR: number;
  pnlPercent?: number;
  comments?: string;
}

export interface OutcomeRecord {
  planId: number;
  instrument: string;
  direction: TradeDirection;
  session: SessionName | null;
  liquidityEvent: string | null;
  outcome: OutcomeLabel;
  realizedR: number;
}

export interface AnalysisStore {
  saveSnapshot(setup: TradeSetup, timestamp: string): Promise<number>;
  savePlan(snapshotId: number, plan: TradePlan): Promise<number>;
  recordOutcome(outcome: TradeOutcomeInput): Promise<number>;
  recentOutcomes(limit: number): Promise<OutcomeRecord[]>;
  saveReview(review: PerformanceReview): Promise<number>;
}

export interface TradeNotifier {
  notify(result: AnalysisResult): Promise<void>;
}
