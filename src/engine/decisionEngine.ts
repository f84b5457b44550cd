/**
 * Decision Engine
 * Main orchestrator that combines structure, liquidity, scoring and risk
 * into a final verdict for one instrument.
 *
 * Gate order:
 *   data guard → news gate → trend + SMC snapshot → direction branches
 *
 * Branch order (per direction):
 *   counter-trend (optional) → zone → opposing MSS → sweep → confirmation
 *   → plan → score → account limits → setup thresholds
 *
 * BOTH mode tries SHORT first and only evaluates LONG when SHORT fails.
 */

import type { AnalysisBar, BarSeries, SmcAnalysis, TradeSide } from '../modules/smartMoney/types.js';
import { analyzeSmartMoney, evaluateLiquidity } from '../modules/smartMoney/index.js';
import type { AssetClass, DirectionMode, EngineConfig, Instrument } from '../validation/schemas.js';
import type {
  AnalysisResult,
  BranchResult,
  BranchStage,
  NewsProximity,
  SessionName,
  TradePlan,
  TradeSetup,
} from '../types/analysis.js';
import { toTradeDirection } from '../types/analysis.js';
import type {
  AnalysisStore,
  BarRequest,
  MarketDataProvider,
  NewsProvider,
  ProbabilityModel,
  TradeNotifier,
} from '../types/collaborators.js';
import { DEFAULT_ENGINE_CONFIG } from '../config/defaults.js';
import { getAcceptedZones } from '../config/engineConfig.js';
import { getAssetClass } from '../config/universe.js';
import { buildBarSeries, type RawBar } from './indicatorService.js';
import { analyzeTrend, describeStructure, isCounterTrend, type TrendAnalysis } from './trendFilter.js';
import { planTrade } from './tradePlanner.js';
import { createScorer, type ProbabilityScorer } from './probabilityScorer.js';
import { RiskValidator, createRiskState, recordTrade, rollRiskDay, type RiskState } from './riskValidator.js';
import { formatPrice } from '../utils/timeUtils.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('DecisionEngine');

// ═══════════════════════════════════════════════════════════════
// CONTEXT
// ═══════════════════════════════════════════════════════════════

export interface EngineContext {
  config: EngineConfig;
  scorer: ProbabilityScorer;
  validator: RiskValidator;
}

export interface EngineContextOptions {
  model?: ProbabilityModel | null;
  scorer?: ProbabilityScorer;
}

export function createEngineContext(
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
  options: EngineContextOptions = {}
): EngineContext {
  return {
    config,
    scorer: options.scorer ?? createScorer(options.model),
    validator: RiskValidator.fromConfig(config),
  };
}

export function minimumBars(config: EngineConfig): number {
  return 2 * config.analysis.swingLookback + 2;
}

// ═══════════════════════════════════════════════════════════════
// SINGLE INSTRUMENT ANALYSIS
// ═══════════════════════════════════════════════════════════════

export interface AnalysisInput {
  symbol: string;
  /** Display label; defaults to the symbol */
  instrument?: string;
  assetClass?: AssetClass;
  direction: DirectionMode;
  bars: readonly RawBar[];
  spread?: number;
  news?: NewsProximity | null;
  riskState?: RiskState;
  now?: Date;
}

export function analyzeMarket(input: AnalysisInput, ctx: EngineContext): AnalysisResult {
  const now = input.now ?? new Date();
  const instrument = input.instrument ?? input.symbol;
  const assetClass = input.assetClass ?? getAssetClass(input.symbol);
  const session = ctx.validator.sessionFor(now);
  const news = input.news ?? null;

  const base: AnalysisResult = {
    verdict: 'NO TRADE',
    reason: '',
    stage: 'data',
    instrument,
    assetClass,
    directionMode: input.direction,
    direction: null,
    session,
    news,
    trend: null,
    smc: null,
    setup: null,
    plan: null,
    branches: [],
    timestamp: now.toISOString(),
  };

  // Step 1: Data guard
  const required = minimumBars(ctx.config);
  if (input.bars.length < required) {
    logger.debug(`${instrument}: ${input.bars.length} bars < ${required} required`);
    return { ...base, reason: 'Insufficient price data' };
  }

  // Step 2: News gate
  const minutes = news?.minutesToEvent;
  if (
    news &&
    minutes !== null &&
    minutes !== undefined &&
    Number.isFinite(minutes) &&
    Math.abs(minutes) <= ctx.config.news.blockWindowMinutes
  ) {
    return {
      ...base,
      stage: 'news',
      reason: `High Impact News: ${news.eventName} in ${Math.round(minutes)} min`,
    };
  }

  // Step 3: Context
  const series = buildBarSeries(input.bars);
  const trend = analyzeTrend(series);
  const smc = analyzeSmartMoney(series, {
    swingLookback: ctx.config.analysis.swingLookback,
    zoneWindow: ctx.config.analysis.zoneWindow,
  });

  // Step 4: Direction branches
  const riskState = rollRiskDay(input.riskState ?? createRiskState(now), now);
  const sides: TradeSide[] =
    input.direction === 'SHORT' ? ['short'] :
    input.direction === 'LONG' ? ['long'] :
    ['short', 'long'];

  const branches: BranchResult[] = [];
  for (const side of sides) {
    const branch = evaluateBranch(side, {
      ctx,
      series,
      trend,
      smc,
      assetClass,
      instrument,
      session,
      news,
      riskState,
      spread: input.spread ?? 0,
    });
    branches.push(branch);
    if (branch.verdict === 'VALID SETUP') break;
  }

  const winner = branches.find(b => b.verdict === 'VALID SETUP');
  const snapshot = branches.find(b => b.setup !== null);

  const result: AnalysisResult = {
    ...base,
    stage: 'branches',
    trend,
    smc,
    branches,
  };

  if (winner) {
    logger.info(`${instrument}: VALID ${winner.direction} setup`, {
      probability: winner.plan?.probabilityScore,
      zone: smc.premiumDiscount.zone,
    });
    return {
      ...result,
      verdict: 'VALID SETUP',
      reason: winner.reason,
      direction: winner.direction,
      setup: winner.setup,
      plan: winner.plan,
    };
  }

  return {
    ...result,
    reason: branches.length === 1
      ? branches[0].reason
      : branches.map(b => `${b.direction}: ${b.reason}`).join('; '),
    direction: branches.length === 1 ? branches[0].direction : null,
    setup: snapshot?.setup ?? null,
    plan: snapshot?.plan ?? null,
  };
}

// ═══════════════════════════════════════════════════════════════
// DIRECTION BRANCH
// ═══════════════════════════════════════════════════════════════

interface BranchContext {
  ctx: EngineContext;
  series: BarSeries;
  trend: TrendAnalysis;
  smc: SmcAnalysis;
  assetClass: AssetClass;
  instrument: string;
  session: SessionName | null;
  news: NewsProximity | null;
  riskState: RiskState;
  spread: number;
}

function evaluateBranch(side: TradeSide, bc: BranchContext): BranchResult {
  const { ctx, smc, trend } = bc;
  const { analysis } = ctx.config;
  const direction = toTradeDirection(side);

  const reject = (
    stage: BranchStage,
    reason: string,
    extras: Partial<Pick<BranchResult, 'liquidity' | 'setup' | 'plan'>> = {}
  ): BranchResult => ({
    direction,
    verdict: 'NO TRADE',
    stage,
    reason,
    liquidity: extras.liquidity ?? null,
    setup: extras.setup ?? null,
    plan: extras.plan ?? null,
  });

  if (analysis.blockCounterTrend && isCounterTrend(trend.trend, side)) {
    return reject('trend', side === 'short' ? 'Strong Bullish Momentum' : 'Strong Bearish Momentum');
  }

  const zone = smc.premiumDiscount.zone;
  if (!getAcceptedZones(ctx.config, bc.assetClass, side).includes(zone)) {
    return reject('zone', `Not in accepted zone for ${direction} (Current: ${zone})`);
  }

  const mss = smc.marketStructureShift;
  if (side === 'short' && mss?.type === 'Bullish MSS') {
    return reject('mss', 'Bullish Market Structure Shift detected');
  }
  if (side === 'long' && mss?.type === 'Bearish MSS') {
    return reject('mss', 'Bearish Market Structure Shift detected');
  }

  const liquidity = evaluateLiquidity(bc.series, side, {
    sweepLookback: analysis.sweepLookback,
    exhaustionMultiplier: analysis.exhaustionMultiplier,
  });
  if (!liquidity.sweep) {
    return reject('sweep', 'No Liquidity Sweep', { liquidity });
  }
  if (!liquidity.confirmed) {
    return reject('confirmation', 'No Confirmation (RSI/Wick)', { liquidity });
  }

  const latest: AnalysisBar = bc.series[bc.series.length - 1];
  const levels = planTrade(latest, side, {
    stopBufferRatio: analysis.stopBufferRatio,
    rewardMultiple: analysis.rewardMultiple,
  });

  const minutes = bc.news?.minutesToEvent;
  const setup: TradeSetup = {
    direction,
    instrument: bc.instrument,
    assetClass: bc.assetClass,
    session: bc.session,
    htfTrend: trend.trend,
    htfStructure: describeStructure(smc.swings.highs, smc.swings.lows),
    keyLevel: liquidity.sweep.sweptLevel,
    liquidityEvent: liquidity.sweep.type,
    hasLargeWick: liquidity.exhaustion,
    atrValue: latest.atr,
    rsiDivergence: liquidity.divergence,
    vwapDistance: latest.vwap !== null ? Math.abs(latest.close - latest.vwap) : null,
    spread: bc.spread,
    newsProximityMinutes: minutes !== null && minutes !== undefined && Number.isFinite(minutes) ? minutes : null,
    premiumPosition: smc.premiumDiscount.position,
    zone,
    inPremiumZone: zone === 'Premium' || zone === 'Premium (Weak)',
    bearishObCount: smc.orderBlocks.bearish.length,
    bullishObCount: smc.orderBlocks.bullish.length,
    fvgCount: smc.fairValueGaps.length,
    hasBearishMss: mss?.type === 'Bearish MSS',
    hasBullishMss: mss?.type === 'Bullish MSS',
  };

  const score = ctx.scorer.score(setup, smc);

  const plan: TradePlan = {
    direction,
    entryZoneStart: levels.entryZoneStart,
    entryZoneEnd: levels.entryZoneEnd,
    stopLoss: levels.stopLoss,
    takeProfit1: levels.takeProfit,
    takeProfit2: null,
    estimatedRR: levels.riskReward,
    probabilityScore: score.probability,
    scoreSource: score.source,
  };

  const account = ctx.validator.canTrade(bc.riskState);
  if (!account.allowed) {
    return reject('risk', account.reason, { liquidity, setup, plan });
  }

  const quality = ctx.validator.validateSetup(levels.riskReward, bc.spread, score.probability);
  if (!quality.allowed) {
    return reject('risk', quality.reason, { liquidity, setup, plan });
  }

  return {
    direction,
    verdict: 'VALID SETUP',
    stage: 'passed',
    reason: 'All checks passed (SMC + Traditional)',
    liquidity,
    setup,
    plan,
  };
}

// ═══════════════════════════════════════════════════════════════
// PERSISTENCE
// ═══════════════════════════════════════════════════════════════

/**
 * Store the setup snapshot and, for valid setups, the plan.
 * Returns the plan id when one was written.
 */
export async function persistAnalysis(store: AnalysisStore, result: AnalysisResult): Promise<number | null> {
  if (!result.setup) return null;

  const snapshotId = await store.saveSnapshot(result.setup, result.timestamp);
  if (result.verdict !== 'VALID SETUP' || !result.plan) return null;

  return store.savePlan(snapshotId, result.plan);
}

// ═══════════════════════════════════════════════════════════════
// SCAN
// ═══════════════════════════════════════════════════════════════

export interface ScanDependencies {
  context: EngineContext;
  marketData: MarketDataProvider;
  news?: NewsProvider;
  store?: AnalysisStore;
  notifier?: TradeNotifier;
}

export interface ScanOptions {
  now?: Date;
  riskState?: RiskState;
  requireSession?: boolean;
  barRequest?: BarRequest;
  spread?: number;
}

export interface ScanReport {
  session: SessionName | null;
  marketClosed: boolean;
  stoppedReason: string | null;
  results: AnalysisResult[];
  skipped: { instrument: string; reason: string }[];
  riskState: RiskState;
}

const DEFAULT_BAR_REQUEST: BarRequest = { period: '5d', interval: '15m' };

export async function scanInstruments(
  instruments: readonly Instrument[],
  deps: ScanDependencies,
  options: ScanOptions = {}
): Promise<ScanReport> {
  const now = options.now ?? new Date();
  const { validator } = deps.context;
  const session = validator.sessionFor(now);
  let riskState = rollRiskDay(options.riskState ?? createRiskState(now), now);

  const report: ScanReport = {
    session,
    marketClosed: false,
    stoppedReason: null,
    results: [],
    skipped: [],
    riskState,
  };

  if (options.requireSession && session === null) {
    logger.info('Market closed, skipping scan');
    return { ...report, marketClosed: true };
  }

  const news = deps.news ? await readNews(deps.news, now) : null;
  const enabled = instruments.filter(i => i.enabled);

  logger.info(`Scanning ${enabled.length} instruments`, { session, news: news?.eventName ?? null });

  for (const instrument of enabled) {
    const account = validator.canTrade(riskState);
    if (!account.allowed) {
      logger.warn(`Scan stopped: ${account.reason}`);
      report.stoppedReason = account.reason;
      break;
    }

    let bars: RawBar[];
    try {
      bars = await deps.marketData.fetchBars(instrument.symbol, options.barRequest ?? DEFAULT_BAR_REQUEST);
    } catch (error) {
      logger.error(`Failed to fetch bars for ${instrument.displayName}`, { error });
      report.skipped.push({
        instrument: instrument.displayName,
        reason: error instanceof Error ? error.message : 'Unknown error',
      });
      continue;
    }

    const result = analyzeMarket({
      symbol: instrument.symbol,
      instrument: instrument.displayName,
      assetClass: instrument.assetClass,
      direction: instrument.direction ?? 'BOTH',
      bars,
      spread: options.spread,
      news,
      riskState,
      now,
    }, deps.context);

    report.results.push(result);
    logger.info(formatDecisionSummary(result));

    if (result.verdict === 'VALID SETUP') {
      riskState = recordTrade(riskState);
    }

    if (deps.store) {
      try {
        await persistAnalysis(deps.store, result);
      } catch (error) {
        logger.error(`Failed to persist analysis for ${instrument.displayName}`, { error });
      }
    }

    if (deps.notifier && result.verdict === 'VALID SETUP') {
      try {
        await deps.notifier.notify(result);
      } catch (error) {
        logger.error(`Failed to notify for ${instrument.displayName}`, { error });
      }
    }
  }

  return { ...report, riskState };
}

async function readNews(provider: NewsProvider, now: Date): Promise<NewsProximity | null> {
  try {
    return await provider.nearestHighImpact(now);
  } catch (error) {
    logger.warn('News calendar unavailable, news gate skipped', { error });
    return null;
  }
}

// ═══════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════

export function formatDecisionSummary(result: AnalysisResult): string {
  const direction = result.direction ? ` ${result.direction}` : '';
  const head = `${result.instrument} ${result.verdict}${direction}: ${result.reason}`;

  if (result.verdict !== 'VALID SETUP' || !result.plan) {
    return head;
  }

  const plan = result.plan;
  const price = (value: number): string => formatPrice(value, result.instrument);
  return [
    head,
    `Entry ${price(plan.entryZoneStart)}-${price(plan.entryZoneEnd)}`,
    `SL ${price(plan.stopLoss)}`,
    `TP ${price(plan.takeProfit1)}`,
    `R:R ${plan.estimatedRR.toFixed(1)}`,
    `P ${plan.probabilityScore.toFixed(0)}% (${plan.scoreSource})`,
  ].join(' | ');
}
