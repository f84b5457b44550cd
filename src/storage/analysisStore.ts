/**
 * Analysis Store
 * PostgreSQL persistence through Kysely when DATABASE_URL is set, in-memory
 * otherwise. Both implement the AnalysisStore collaborator.
 */

import type { Kysely } from 'kysely';
import type { Database, NewMarketSnapshot, NewTradePlan } from '../db/types.js';
import type { SessionName, TradeDirection, TradePlan, TradeSetup } from '../types/analysis.js';
import type { AnalysisStore, OutcomeLabel, OutcomeRecord, TradeOutcomeInput } from '../types/collaborators.js';
import type { PerformanceReview } from '../engine/performanceReview.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('AnalysisStore');

export class UnknownPlanError extends Error {
  constructor(public readonly planId: number) {
    super(`Trade plan ${planId} not found`);
    this.name = 'UnknownPlanError';
  }
}

// ═══════════════════════════════════════════════════════════════
// ROW MAPPERS
// ═══════════════════════════════════════════════════════════════

export function toSnapshotRow(setup: TradeSetup, timestamp: string): NewMarketSnapshot {
  return {
    timestamp,
    instrument: setup.instrument,
    asset_class: setup.assetClass,
    direction: setup.direction,
    session: setup.session,
    htf_trend: setup.htfTrend,
    htf_structure: setup.htfStructure,
    key_level: setup.keyLevel,
    liquidity_event_type: setup.liquidityEvent,
    has_large_wick: setup.hasLargeWick,
    atr_value: setup.atrValue,
    rsi_divergence: setup.rsiDivergence,
    vwap_distance: setup.vwapDistance,
    spread_value: setup.spread,
    news_event_proximity_minutes: setup.newsProximityMinutes,
    premium_position: setup.premiumPosition,
    zone: setup.zone,
    bearish_ob_count: setup.bearishObCount,
    bullish_ob_count: setup.bullishObCount,
    fvg_count: setup.fvgCount,
    has_bearish_mss: setup.hasBearishMss,
    has_bullish_mss: setup.hasBullishMss,
  };
}

export function toPlanRow(snapshotId: number, plan: TradePlan): NewTradePlan {
  return {
    snapshot_id: snapshotId,
    direction: plan.direction,
    entry_zone_start: plan.entryZoneStart,
    entry_zone_end: plan.entryZoneEnd,
    stop_loss: plan.stopLoss,
    tp1: plan.takeProfit1,
    tp2: plan.takeProfit2,
    estimated_rr: plan.estimatedRR,
    probability_score: plan.probabilityScore,
    score_source: plan.scoreSource,
  };
}

function parseDirection(value: string): TradeDirection {
  return value === 'LONG' ? 'LONG' : 'SHORT';
}

function parseSession(value: string | null): SessionName | null {
  return value === 'LONDON' || value === 'NEW_YORK' ? value : null;
}

function parseOutcome(value: string): OutcomeLabel {
  return value === 'WIN' || value === 'LOSS' ? value : 'BREAK_EVEN';
}

// ═══════════════════════════════════════════════════════════════
// POSTGRES STORE
// ═══════════════════════════════════════════════════════════════

export class KyselyAnalysisStore implements AnalysisStore {
  constructor(private readonly db: Kysely<Database>) {}

  async saveSnapshot(setup: TradeSetup, timestamp: string): Promise<number> {
    const row = await this.db
      .insertInto('market_snapshots')
      .values(toSnapshotRow(setup, timestamp))
      .returning('id')
      .executeTakeFirstOrThrow();
    return row.id;
  }

  async savePlan(snapshotId: number, plan: TradePlan): Promise<number> {
    const row = await this.db
      .insertInto('trade_plans')
      .values(toPlanRow(snapshotId, plan))
      .returning('id')
      .executeTakeFirstOrThrow();
    logger.info(`Saved ${plan.direction} plan #${row.id}`);
    return row.id;
  }

  async recordOutcome(outcome: TradeOutcomeInput): Promise<number> {
    const plan = await this.db
      .selectFrom('trade_plans')
      .select('id')
      .where('id', '=', outcome.planId)
      .executeTakeFirst();
    if (!plan) throw new UnknownPlanError(outcome.planId);

    const row = await this.db
      .insertInto('trade_outcomes')
      .values({
        plan_id: outcome.planId,
        entry_price: outcome.entryPrice,
        exit_price: outcome.exitPrice,
        outcome: outcome.outcome,
        realized_r_multiple: outcome.realizedR,
        pnl_percent: outcome.pnlPercent ?? null,
        comments: outcome.comments ?? null,
      })
      .returning('id')
      .executeTakeFirstOrThrow();

    await this.db
      .updateTable('trade_plans')
      .set({ status: 'EXECUTED' })
      .where('id', '=', outcome.planId)
      .execute();

    return row.id;
  }

  async recentOutcomes(limit: number): Promise<OutcomeRecord[]> {
    const rows = await this.db
      .selectFrom('trade_outcomes as o')
      .innerJoin('trade_plans as p', 'p.id', 'o.plan_id')
      .innerJoin('market_snapshots as s', 's.id', 'p.snapshot_id')
      .select([
        'o.plan_id',
        's.instrument',
        'p.direction',
        's.session',
        's.liquidity_event_type',
        'o.outcome',
        'o.realized_r_multiple',
      ])
      .orderBy('o.id', 'desc')
      .limit(limit)
      .execute();

    return rows.map(row => ({
      planId: row.plan_id,
      instrument: row.instrument,
      direction: parseDirection(row.direction),
      session: parseSession(row.session),
      liquidityEvent: row.liquidity_event_type,
      outcome: parseOutcome(row.outcome),
      realizedR: row.realized_r_multiple,
    }));
  }

  async saveReview(review: PerformanceReview): Promise<number> {
    const row = await this.db
      .insertInto('learning_logs')
      .values({
        sample_size: review.sampleSize,
        high_performing_conditions: review.highPerforming.join(', ') || null,
        loss_prone_conditions: review.lossProne.join(', ') || null,
        action_items: review.lossProne.length > 0 ? `Avoid: ${review.lossProne.join(', ')}` : null,
      })
      .returning('id')
      .executeTakeFirstOrThrow();
    return row.id;
  }
}

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY STORE
// ═══════════════════════════════════════════════════════════════

interface StoredPlan {
  id: number;
  snapshotId: number;
  plan: TradePlan;
}

export class InMemoryAnalysisStore implements AnalysisStore {
  private readonly snapshots = new Map<number, TradeSetup>();
  private readonly plans = new Map<number, StoredPlan>();
  private readonly outcomes: (TradeOutcomeInput & { id: number })[] = [];
  private readonly reviews: PerformanceReview[] = [];
  private nextId = 1;

  async saveSnapshot(setup: TradeSetup, _timestamp: string): Promise<number> {
    const id = this.nextId++;
    this.snapshots.set(id, setup);
    return id;
  }

  async savePlan(snapshotId: number, plan: TradePlan): Promise<number> {
    const id = this.nextId++;
    this.plans.set(id, { id, snapshotId, plan });
    return id;
  }

  async recordOutcome(outcome: TradeOutcomeInput): Promise<number> {
    if (!this.plans.has(outcome.planId)) throw new UnknownPlanError(outcome.planId);
    const id = this.nextId++;
    this.outcomes.push({ ...outcome, id });
    return id;
  }

  async recentOutcomes(limit: number): Promise<OutcomeRecord[]> {
    const records: OutcomeRecord[] = [];

    for (const outcome of [...this.outcomes].reverse().slice(0, limit)) {
      const stored = this.plans.get(outcome.planId);
      const setup = stored ? this.snapshots.get(stored.snapshotId) : undefined;
      if (!stored || !setup) continue;

      records.push({
        planId: outcome.planId,
        instrument: setup.instrument,
        direction: stored.plan.direction,
        session: setup.session,
        liquidityEvent: setup.liquidityEvent,
        outcome: outcome.outcome,
        realizedR: outcome.realizedR,
      });
    }

    return records;
  }

  async saveReview(review: PerformanceReview): Promise<number> {
    this.reviews.push(review);
    return this.reviews.length;
  }

  get snapshotCount(): number {
    return this.snapshots.size;
  }

  get planCount(): number {
    return this.plans.size;
  }
}
