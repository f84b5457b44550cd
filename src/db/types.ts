/**
 * Database Type Definitions
 * Kysely schema types for analysis snapshots, plans, outcomes and reviews
 */

import type { Generated, Insertable, Selectable } from 'kysely';

// ═══════════════════════════════════════════════════════════════
// PLAN STATUS
// ═══════════════════════════════════════════════════════════════

export type PlanStatus =
  | 'PENDING'     // Generated, not yet acted on
  | 'EXECUTED'    // User took the trade
  | 'CANCELLED'
  | 'IGNORED';

// ═══════════════════════════════════════════════════════════════
// TABLE DEFINITIONS
// ═══════════════════════════════════════════════════════════════

export interface MarketSnapshotsTable {
  id: Generated<number>;
  timestamp: string;
  instrument: string;
  asset_class: string;
  direction: string;
  session: string | null;

  // HTF context
  htf_trend: string;
  htf_structure: string;
  key_level: number;

  // Liquidity & exhaustion
  liquidity_event_type: string | null;
  has_large_wick: boolean;
  atr_value: number | null;

  // Confirmation
  rsi_divergence: boolean;
  vwap_distance: number | null;
  spread_value: number;
  news_event_proximity_minutes: number | null;

  // SMC
  premium_position: number;
  zone: string;
  bearish_ob_count: number;
  bullish_ob_count: number;
  fvg_count: number;
  has_bearish_mss: boolean;
  has_bullish_mss: boolean;
}

export interface TradePlansTable {
  id: Generated<number>;
  snapshot_id: number;
  created_at: Generated<string>;
  direction: string;
  entry_zone_start: number;
  entry_zone_end: number;
  stop_loss: number;
  tp1: number;
  tp2: number | null;
  estimated_rr: number;
  probability_score: number;
  score_source: string;
  status: Generated<string>;
}

export interface TradeOutcomesTable {
  id: Generated<number>;
  plan_id: number;
  entry_price: number;
  exit_price: number;
  outcome: string;
  realized_r_multiple: number;
  pnl_percent: number | null;
  comments: string | null;
  created_at: Generated<string>;
}

export interface LearningLogsTable {
  id: Generated<number>;
  review_date: Generated<string>;
  sample_size: number;
  high_performing_conditions: string | null;
  loss_prone_conditions: string | null;
  action_items: string | null;
}

// ═══════════════════════════════════════════════════════════════
// DATABASE INTERFACE
// ═══════════════════════════════════════════════════════════════

export interface Database {
  market_snapshots: MarketSnapshotsTable;
  trade_plans: TradePlansTable;
  trade_outcomes: TradeOutcomesTable;
  learning_logs: LearningLogsTable;
}

// ═══════════════════════════════════════════════════════════════
// HELPER TYPES
// ═══════════════════════════════════════════════════════════════

export type MarketSnapshot = Selectable<MarketSnapshotsTable>;
export type NewMarketSnapshot = Insertable<MarketSnapshotsTable>;

export type TradePlanRow = Selectable<TradePlansTable>;
export type NewTradePlan = Insertable<TradePlansTable>;

export type TradeOutcomeRow = Selectable<TradeOutcomesTable>;
export type NewTradeOutcome = Insertable<TradeOutcomesTable>;

export type NewLearningLog = Insertable<LearningLogsTable>;
