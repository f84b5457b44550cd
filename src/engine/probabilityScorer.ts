/**
 * Probability Scorer
 * Estimates the success probability (0-100) of an assembled setup.
 *
 * - RuleBasedScorer: additive point scale, always available
 * - ModelScorer: inference through a learned ProbabilityModel
 * - FallbackScorer: model first, rules whenever the model cannot answer
 *
 * The implementation is chosen once in createScorer(); callers only see
 * the ProbabilityScorer interface.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import type { SmcAnalysis } from '../modules/smartMoney/types.js';
import { toTradeSide, type ScoreResult, type ScoreSource, type TradeSetup } from '../types/analysis.js';
import { isTrendAligned } from './trendFilter.js';
import type { ProbabilityModel, SetupFeatures } from '../types/collaborators.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('ProbabilityScorer');

export interface ProbabilityScorer {
  readonly source: ScoreSource;
  score(setup: TradeSetup, smc: SmcAnalysis): ScoreResult;
}

// ═══════════════════════════════════════════════════════════════
// FEATURES
// ═══════════════════════════════════════════════════════════════

export const FEATURE_NAMES = [
  'is_short',
  'trend_aligned',
  'trend_ranging',
  'has_liquidity_event',
  'rsi_divergence',
  'large_wick',
  'atr_value',
  'vwap_distance',
  'premium_position',
  'in_premium',
  'bearish_ob_count',
  'bullish_ob_count',
  'fvg_count',
  'has_bearish_mss',
  'has_bullish_mss',
] as const;

export type FeatureName = typeof FEATURE_NAMES[number];

export function extractFeatures(setup: TradeSetup, smc: SmcAnalysis): Record<FeatureName, number> {
  const isShort = setup.direction === 'SHORT';
  const mss = smc.marketStructureShift;

  return {
    is_short: isShort ? 1 : 0,
    trend_aligned: isTrendAligned(setup.htfTrend, toTradeSide(setup.direction)) ? 1 : 0,
    trend_ranging: setup.htfTrend === 'Ranging' ? 1 : 0,
    has_liquidity_event: setup.liquidityEvent ? 1 : 0,
    rsi_divergence: setup.rsiDivergence ? 1 : 0,
    large_wick: setup.hasLargeWick ? 1 : 0,
    atr_value: setup.atrValue ?? 0,
    vwap_distance: setup.vwapDistance ?? 0,
    premium_position: smc.premiumDiscount.position,
    in_premium: smc.premiumDiscount.zone.startsWith('Premium') ? 1 : 0,
    bearish_ob_count: smc.orderBlocks.bearish.length,
    bullish_ob_count: smc.orderBlocks.bullish.length,
    fvg_count: smc.fairValueGaps.length,
    has_bearish_mss: mss?.type === 'Bearish MSS' ? 1 : 0,
    has_bullish_mss: mss?.type === 'Bullish MSS' ? 1 : 0,
  };
}

// ═══════════════════════════════════════════════════════════════
// RULE-BASED
// ═══════════════════════════════════════════════════════════════

export const RULE_POINTS = {
  trendAlignment: 30,
  liquidityEvent: 25,
  divergence: 10,
  largeWick: 10,
  extremeZone: 15,
  orderBlock: 10,
  marketStructureShift: 10,
} as const;

const EXTREME_ZONE_THRESHOLD = 0.7;

export class RuleBasedScorer implements ProbabilityScorer {
  readonly source = 'rule-based' as const;

  score(setup: TradeSetup, smc: SmcAnalysis): ScoreResult {
    const isShort = setup.direction === 'SHORT';
    let points = 0;

    if (isTrendAligned(setup.htfTrend, toTradeSide(setup.direction))) points += RULE_POINTS.trendAlignment;
    if (setup.liquidityEvent) points += RULE_POINTS.liquidityEvent;
    if (setup.rsiDivergence) points += RULE_POINTS.divergence;
    if (setup.hasLargeWick) points += RULE_POINTS.largeWick;

    // distance from the opposite end of the range, so 0.3 long mirrors 0.7 short
    const position = smc.premiumDiscount.position;
    const depth = isShort ? position : 1 - position;
    const extreme = depth > EXTREME_ZONE_THRESHOLD;
    if (extreme) points += RULE_POINTS.extremeZone;

    const matchingBlocks = isShort ? smc.orderBlocks.bearish : smc.orderBlocks.bullish;
    if (matchingBlocks.length > 0) points += RULE_POINTS.orderBlock;

    const matchingMss = isShort ? 'Bearish MSS' : 'Bullish MSS';
    if (smc.marketStructureShift?.type === matchingMss) points += RULE_POINTS.marketStructureShift;

    return { probability: Math.min(points, 100), source: this.source };
  }
}

// ═══════════════════════════════════════════════════════════════
// LEARNED MODEL
// ═══════════════════════════════════════════════════════════════

export class ModelScorer implements ProbabilityScorer {
  readonly source = 'model' as const;

  constructor(private readonly model: ProbabilityModel) {}

  isReady(): boolean {
    return this.model.isReady();
  }

  score(setup: TradeSetup, smc: SmcAnalysis): ScoreResult {
    const probability = this.model.predict(extractFeatures(setup, smc));
    if (!Number.isFinite(probability)) {
      throw new Error(`Model returned non-finite probability: ${probability}`);
    }
    return { probability: Math.min(100, Math.max(0, probability)), source: this.source };
  }
}

export class FallbackScorer implements ProbabilityScorer {
  readonly source = 'model' as const;

  constructor(
    private readonly primary: ModelScorer,
    private readonly fallback: RuleBasedScorer = new RuleBasedScorer()
  ) {}

  score(setup: TradeSetup, smc: SmcAnalysis): ScoreResult {
    if (!this.primary.isReady()) {
      return this.fallback.score(setup, smc);
    }

    try {
      return this.primary.score(setup, smc);
    } catch (error) {
      logger.warn('Model prediction failed, using rule-based score', { error });
      return this.fallback.score(setup, smc);
    }
  }
}

export function createScorer(model?: ProbabilityModel | null): ProbabilityScorer {
  if (!model) {
    logger.info('No probability model configured, using rule-based scoring');
    return new RuleBasedScorer();
  }
  return new FallbackScorer(new ModelScorer(model));
}

// ═══════════════════════════════════════════════════════════════
// LOGISTIC MODEL (JSON weights)
// ═══════════════════════════════════════════════════════════════

export const LogisticModelFileSchema = z.object({
  trainedAt: z.string().optional(),
  features: z.array(z.string()).min(1),
  means: z.array(z.number()),
  scales: z.array(z.number()),
  weights: z.array(z.number()),
  intercept: z.number(),
}).refine(
  m => m.means.length === m.features.length
    && m.scales.length === m.features.length
    && m.weights.length === m.features.length,
  { message: 'features, means, scales and weights must have the same length' }
);

export type LogisticModelFile = z.infer<typeof LogisticModelFileSchema>;

/**
 * Standardized logistic regression: p = sigmoid(b + sum(w * (x - mean) / scale))
 */
export class LogisticModel implements ProbabilityModel {
  constructor(private readonly params: LogisticModelFile) {}

  isReady(): boolean {
    return this.params.features.length > 0;
  }

  predict(features: SetupFeatures): number {
    let z = this.params.intercept;

    this.params.features.forEach((name, i) => {
      const value = features[name];
      if (value === undefined) {
        throw new Error(`Missing feature: ${name}`);
      }
      const scale = this.params.scales[i] === 0 ? 1 : this.params.scales[i];
      z += this.params.weights[i] * ((value - this.params.means[i]) / scale);
    });

    return 100 / (1 + Math.exp(-z));
  }
}

/**
 * Load model weights; null when the file is absent or unusable, in which
 * case scoring stays rule-based.
 */
export function loadLogisticModel(path: string): LogisticModel | null {
  if (!existsSync(path)) {
    logger.info(`Model file not found at ${path}, running untrained`);
    return null;
  }

  try {
    const parsed = LogisticModelFileSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    if (!parsed.success) {
      logger.warn(`Model file ${path} is invalid, ignoring`, { issues: parsed.error.issues.map(i => i.message) });
      return null;
    }
    logger.info(`Model loaded from ${path}`, { features: parsed.data.features.length });
    return new LogisticModel(parsed.data);
  } catch (error) {
    logger.warn(`Failed to read model file ${path}`, { error });
    return null;
  }
}
