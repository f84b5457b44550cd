/**
 * Analysis Types
 * Records produced by the decision pipeline and handed to persistence and
 * notification collaborators
 */

import type {
  LiquidityEvaluation,
  LiquidityEventType,
  SmcAnalysis,
  TradeSide,
  ZoneName,
} from '../modules/smartMoney/types.js';
import type { TrendAnalysis, TrendLabel } from '../engine/trendFilter.js';
import type { AssetClass, DirectionMode } from '../validation/schemas.js';

// ═══════════════════════════════════════════════════════════════
// VERDICT
// ═══════════════════════════════════════════════════════════════

export type Verdict = 'VALID SETUP' | 'NO TRADE';

export type TradeDirection = 'SHORT' | 'LONG';

export type SessionName = 'LONDON' | 'NEW_YORK';

export type ScoreSource = 'rule-based' | 'model';

export function toTradeDirection(side: TradeSide): TradeDirection {
  return side === 'short' ? 'SHORT' : 'LONG';
}

export function toTradeSide(direction: TradeDirection): TradeSide {
  return direction === 'SHORT' ? 'short' : 'long';
}

// ═══════════════════════════════════════════════════════════════
// SETUP SNAPSHOT & TRADE PLAN
// ═══════════════════════════════════════════════════════════════

export interface TradeSetup {
  direction: TradeDirection;
  instrument: string;
  assetClass: AssetClass;
  session: SessionName | null;

  // HTF context
  htfTrend: TrendLabel;
  htfStructure: string;
  keyLevel: number;              // liquidity level the sweep took out

  // Liquidity & exhaustion
  liquidityEvent: LiquidityEventType | null;
  hasLargeWick: boolean;
  atrValue: number | null;

  // Confirmation
  rsiDivergence: boolean;
  vwapDistance: number | null;
  spread: number;
  newsProximityMinutes: number | null;

  // SMC
  premiumPosition: number;
  zone: ZoneName;
  inPremiumZone: boolean;
  bearishObCount: number;
  bullishObCount: number;
  fvgCount: number;
  hasBearishMss: boolean;
  hasBullishMss: boolean;
}

export interface TradePlan {
  direction: TradeDirection;
  entryZoneStart: number;
  entryZoneEnd: number;
  stopLoss: number;
  takeProfit1: number;
  takeProfit2: number | null;
  estimatedRR: number;
  probabilityScore: number;
  scoreSource: ScoreSource;
}

export interface ScoreResult {
  probability: number;
  source: ScoreSource;
}

// ═══════════════════════════════════════════════════════════════
// PIPELINE OUTPUT
// ═══════════════════════════════════════════════════════════════

export type BranchStage =
  | 'trend'
  | 'zone'
  | 'mss'
  | 'sweep'
  | 'confirmation'
  | 'risk'
  | 'passed';

export interface BranchResult {
  direction: TradeDirection;
  verdict: Verdict;
  stage: BranchStage;
  reason: string;
  liquidity: LiquidityEvaluation | null;
  setup: TradeSetup | null;
  plan: TradePlan | null;
}

export interface NewsProximity {
  /** Absolute minutes to the nearest qualifying event; null or Infinity when none */
  minutesToEvent: number | null;
  eventName: string;
}

export type GateStage = 'data' | 'news' | 'branches';

export interface AnalysisResult {
  verdict: Verdict;
  reason: string;
  stage: GateStage;
  instrument: string;
  assetClass: AssetClass;
  directionMode: DirectionMode;
  direction: TradeDirection | null;
  session: SessionName | null;
  news: NewsProximity | null;
  trend: TrendAnalysis | null;
  smc: SmcAnalysis | null;
  setup: TradeSetup | null;
  plan: TradePlan | null;
  branches: BranchResult[];
  timestamp: string;
}
