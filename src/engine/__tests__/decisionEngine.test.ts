import { describe, it, expect } from 'vitest';
import {
  analyzeMarket,
  createEngineContext,
  formatDecisionSummary,
  minimumBars,
  scanInstruments,
  type AnalysisInput,
  type EngineContext,
} from '../decisionEngine.js';
import { createRiskState } from '../riskValidator.js';
import type { ProbabilityScorer } from '../probabilityScorer.js';
import { DEFAULT_ENGINE_CONFIG } from '../../config/defaults.js';
import { InMemoryAnalysisStore } from '../../storage/analysisStore.js';
import type { AnalysisResult, NewsProximity } from '../../types/analysis.js';
import type { MarketDataProvider, TradeNotifier } from '../../types/collaborators.js';
import type { RawBar } from '../indicatorService.js';
import type { EngineConfig, Instrument } from '../../validation/schemas.js';
import {
  bullishShiftBars,
  bullishTrendBars,
  discountBars,
  discountSweepBars,
  divergenceSweepBars,
  premiumSweepBars,
} from '../../testUtils/scenarios.js';
import { calculateVWAP } from '../indicatorService.js';

const NOW = new Date('2026-01-05T08:30:00Z');

function analyze(overrides: Partial<AnalysisInput> = {}, ctx: EngineContext = createEngineContext()): AnalysisResult {
  return analyzeMarket({
    symbol: 'EURUSD',
    assetClass: 'forex',
    direction: 'SHORT',
    bars: premiumSweepBars(),
    now: NOW,
    ...overrides,
  }, ctx);
}

function withConfig(patch: Partial<EngineConfig>): EngineContext {
  return createEngineContext({ ...DEFAULT_ENGINE_CONFIG, ...patch });
}

describe('analyzeMarket', () => {
  it('accepts a confirmed premium sweep for a short', () => {
    const result = analyze();

    expect(result.verdict).toBe('VALID SETUP');
    expect(result.reason).toBe('All checks passed (SMC + Traditional)');
    expect(result.direction).toBe('SHORT');
    expect(result.session).toBe('LONDON');
    expect(result.smc?.premiumDiscount.zone).toBe('Premium');
    expect(result.smc?.premiumDiscount.position).toBeCloseTo(0.75, 10);

    expect(result.plan).toMatchObject({
      direction: 'SHORT',
      estimatedRR: 2,
      probabilityScore: 50,
      scoreSource: 'rule-based',
      takeProfit2: null,
    });
    expect(result.plan?.stopLoss).toBeCloseTo(110.21, 10);
    expect(result.plan?.takeProfit1).toBeCloseTo(101.78, 10);

    expect(result.setup).toMatchObject({
      liquidityEvent: 'Local High Sweep',
      hasLargeWick: true,
      rsiDivergence: false,
      htfTrend: 'Ranging',
      htfStructure: 'Range',
      zone: 'Premium',
      inPremiumZone: true,
      session: 'LONDON',
    });
    expect(result.setup?.keyLevel).toBeCloseTo(105.9, 10);
  });

  it('rejects a short from the discount zone', () => {
    const result = analyze({ bars: discountBars() });

    expect(result.verdict).toBe('NO TRADE');
    expect(result.reason).toBe('Not in accepted zone for SHORT (Current: Discount)');
    expect(result.branches[0].stage).toBe('zone');
    expect(result.setup).toBeNull();
  });

  it('rejects a long from premium on forex', () => {
    const result = analyze({ direction: 'LONG' });
    expect(result.reason).toBe('Not in accepted zone for LONG (Current: Premium)');
  });

  it('tries short first in BOTH mode and stops at the first valid branch', () => {
    const result = analyze({ direction: 'BOTH' });

    expect(result.verdict).toBe('VALID SETUP');
    expect(result.branches.map(b => b.direction)).toEqual(['SHORT']);
  });

  it('joins both branch reasons when neither direction qualifies', () => {
    const result = analyze({ direction: 'BOTH', bars: discountBars() });

    expect(result.verdict).toBe('NO TRADE');
    expect(result.direction).toBeNull();
    expect(result.reason).toBe(
      'SHORT: Not in accepted zone for SHORT (Current: Discount); LONG: No Confirmation (RSI/Wick)'
    );
    expect(result.branches.map(b => b.stage)).toEqual(['zone', 'confirmation']);
    expect(result.branches[1].liquidity?.sweep?.type).toBe('Local Low Sweep');
  });

  it('accepts a confirmed discount sweep for a long', () => {
    const bars = discountSweepBars();
    const result = analyze({ direction: 'LONG', bars });

    expect(result.verdict).toBe('VALID SETUP');
    expect(result.direction).toBe('LONG');
    expect(result.smc?.premiumDiscount.zone).toBe('Discount');
    expect(result.smc?.premiumDiscount.position).toBeCloseTo(0.25, 10);
    expect(result.setup).toMatchObject({
      liquidityEvent: 'Local Low Sweep',
      hasLargeWick: true,
      inPremiumZone: false,
    });
    expect(result.plan).toMatchObject({ direction: 'LONG', estimatedRR: 2, probabilityScore: 50 });
    expect(result.plan?.stopLoss).toBeCloseTo(109.79, 10);
    expect(result.plan?.takeProfit1).toBeCloseTo(118.22, 10);
  });

  it('stores the VWAP distance as an absolute value', () => {
    const bars = discountSweepBars();
    const vwap = calculateVWAP(bars)[bars.length - 1] ?? 0;
    const close = bars[bars.length - 1].close;
    expect(close).toBeLessThan(vwap);

    const result = analyze({ direction: 'LONG', bars });
    expect(result.setup?.vwapDistance).toBeCloseTo(vwap - close, 10);
  });

  it('falls through to a valid long in BOTH mode when the short fails', () => {
    const result = analyze({ direction: 'BOTH', bars: discountSweepBars() });

    expect(result.verdict).toBe('VALID SETUP');
    expect(result.direction).toBe('LONG');
    expect(result.reason).toBe('All checks passed (SMC + Traditional)');
    expect(result.branches.map(b => b.reason)).toEqual([
      'Not in accepted zone for SHORT (Current: Discount)',
      'All checks passed (SMC + Traditional)',
    ]);
  });

  it('confirms a sweep by RSI divergence alone', () => {
    const result = analyze({ bars: divergenceSweepBars() });

    expect(result.verdict).toBe('VALID SETUP');
    expect(result.setup).toMatchObject({
      rsiDivergence: true,
      hasLargeWick: false,
      liquidityEvent: 'Local High Sweep',
      zone: 'Premium',
    });
    expect(result.plan?.probabilityScore).toBe(50);
  });

  it('rejects a short after a bullish structure shift', () => {
    const result = analyze({ bars: bullishShiftBars() });

    expect(result.smc?.premiumDiscount.zone).toBe('Premium (Weak)');
    expect(result.smc?.marketStructureShift).toMatchObject({ type: 'Bullish MSS', brokenLevel: 105, swingIndex: 23 });
    expect(result.verdict).toBe('NO TRADE');
    expect(result.reason).toBe('Bullish Market Structure Shift detected');
    expect(result.branches[0].stage).toBe('mss');
    expect(result.branches[0].liquidity).toBeNull();
  });

  it('refuses to analyze fewer than 2L+2 bars', () => {
    expect(minimumBars(DEFAULT_ENGINE_CONFIG)).toBe(12);

    const result = analyze({ bars: premiumSweepBars().slice(-11) });
    expect(result.verdict).toBe('NO TRADE');
    expect(result.stage).toBe('data');
    expect(result.reason).toBe('Insufficient price data');
  });

  describe('news gate', () => {
    const news = (minutesToEvent: number | null): NewsProximity => ({ minutesToEvent, eventName: 'US CPI' });

    it('blocks within fifteen minutes of a high-impact event', () => {
      const result = analyze({ news: news(14) });

      expect(result.verdict).toBe('NO TRADE');
      expect(result.stage).toBe('news');
      expect(result.reason).toBe('High Impact News: US CPI in 14 min');
      expect(result.smc).toBeNull();
    });

    it('blocks at exactly fifteen minutes', () => {
      expect(analyze({ news: news(15) }).stage).toBe('news');
    });

    it('passes at sixteen minutes or with no event', () => {
      expect(analyze({ news: news(16) }).verdict).toBe('VALID SETUP');
      expect(analyze({ news: news(Infinity) }).verdict).toBe('VALID SETUP');
      expect(analyze({ news: news(null) }).verdict).toBe('VALID SETUP');
    });

    it('records the distance on the setup snapshot', () => {
      expect(analyze({ news: news(45) }).setup?.newsProximityMinutes).toBe(45);
      expect(analyze({ news: news(Infinity) }).setup?.newsProximityMinutes).toBeNull();
    });
  });

  describe('risk stage', () => {
    it('rejects when the daily trade limit is reached but keeps the snapshot', () => {
      const result = analyze({ riskState: { ...createRiskState(NOW), dailyTrades: 3 } });

      expect(result.verdict).toBe('NO TRADE');
      expect(result.reason).toBe('Max daily trades reached');
      expect(result.branches[0].stage).toBe('risk');
      expect(result.setup?.liquidityEvent).toBe('Local High Sweep');
      expect(result.plan?.estimatedRR).toBe(2);
    });

    it('resets yesterday\'s counters before checking limits', () => {
      const stale = { dayKey: '2026-01-04', dailyTrades: 3, consecutiveLosses: 0, dailyDrawdownPct: 3.9 };
      expect(analyze({ riskState: stale }).verdict).toBe('VALID SETUP');
    });

    it('rejects a wide spread', () => {
      expect(analyze({ spread: 0.6 }).reason).toBe('Spread 0.6 > 0.5');
    });

    it('rejects a probability under the configured minimum', () => {
      const ctx = withConfig({ filters: { maxSpread: 0.5, minProbabilityPct: 60 } });
      expect(analyze({}, ctx).reason).toBe('Probability 50% < 60%');
    });
  });

  describe('trend', () => {
    it('ignores counter-trend by default', () => {
      const result = analyze({ bars: bullishTrendBars() });

      expect(result.trend?.trend).toBe('Bullish');
      expect(result.verdict).toBe('VALID SETUP');
    });

    it('blocks counter-trend branches when configured', () => {
      const ctx = withConfig({ analysis: { ...DEFAULT_ENGINE_CONFIG.analysis, blockCounterTrend: true } });
      const result = analyze({ bars: bullishTrendBars() }, ctx);

      expect(result.reason).toBe('Strong Bullish Momentum');
      expect(result.branches[0].stage).toBe('trend');
    });
  });

  it('uses the injected scorer', () => {
    const scorer: ProbabilityScorer = {
      source: 'model',
      score: () => ({ probability: 90, source: 'model' }),
    };
    const result = analyze({}, createEngineContext(DEFAULT_ENGINE_CONFIG, { scorer }));

    expect(result.plan?.probabilityScore).toBe(90);
    expect(result.plan?.scoreSource).toBe('model');
  });
});

describe('formatDecisionSummary', () => {
  it('renders plan levels for a valid setup', () => {
    expect(formatDecisionSummary(analyze())).toBe(
      'EURUSD VALID SETUP SHORT: All checks passed (SMC + Traditional) | Entry 107.40000-107.71000 | ' +
      'SL 110.21000 | TP 101.78000 | R:R 2.0 | P 50% (rule-based)'
    );
  });

  it('renders the reason for a rejection', () => {
    expect(formatDecisionSummary(analyze({ bars: discountBars() }))).toBe(
      'EURUSD NO TRADE SHORT: Not in accepted zone for SHORT (Current: Discount)'
    );
  });
});

describe('scanInstruments', () => {
  const INSTRUMENTS: Instrument[] = [
    { displayName: 'EURUSD', symbol: 'EURUSD=X', assetClass: 'forex', enabled: true, direction: 'SHORT' },
    { displayName: 'GBPUSD', symbol: 'GBPUSD=X', assetClass: 'forex', enabled: true },
    { displayName: 'US30', symbol: '^DJI', assetClass: 'index', enabled: false },
  ];

  class FakeMarketData implements MarketDataProvider {
    readonly requested: string[] = [];

    constructor(private readonly series: Record<string, RawBar[] | Error>) {}

    async fetchBars(symbol: string): Promise<RawBar[]> {
      this.requested.push(symbol);
      const entry = this.series[symbol];
      if (entry === undefined) throw new Error(`unknown symbol ${symbol}`);
      if (entry instanceof Error) throw entry;
      return entry;
    }
  }

  class CollectingNotifier implements TradeNotifier {
    readonly sent: AnalysisResult[] = [];

    async notify(result: AnalysisResult): Promise<void> {
      this.sent.push(result);
    }
  }

  function marketData(gbp: RawBar[] | Error = discountBars()): FakeMarketData {
    return new FakeMarketData({ 'EURUSD=X': premiumSweepBars(), 'GBPUSD=X': gbp });
  }

  it('analyzes enabled instruments, persists and notifies valid setups', async () => {
    const data = marketData();
    const store = new InMemoryAnalysisStore();
    const notifier = new CollectingNotifier();

    const report = await scanInstruments(INSTRUMENTS, {
      context: createEngineContext(),
      marketData: data,
      store,
      notifier,
    }, { now: NOW });

    expect(data.requested).toEqual(['EURUSD=X', 'GBPUSD=X']);
    expect(report.session).toBe('LONDON');
    expect(report.results.map(r => [r.instrument, r.verdict])).toEqual([
      ['EURUSD', 'VALID SETUP'],
      ['GBPUSD', 'NO TRADE'],
    ]);
    expect(report.riskState.dailyTrades).toBe(1);
    expect(store.snapshotCount).toBe(1);
    expect(store.planCount).toBe(1);
    expect(notifier.sent.map(r => r.instrument)).toEqual(['EURUSD']);
  });

  it('skips an instrument whose data fetch fails', async () => {
    const report = await scanInstruments(INSTRUMENTS, {
      context: createEngineContext(),
      marketData: marketData(new Error('feed down')),
    }, { now: NOW });

    expect(report.results).toHaveLength(1);
    expect(report.skipped).toEqual([{ instrument: 'GBPUSD', reason: 'feed down' }]);
  });

  it('stops once the account limits are hit', async () => {
    const report = await scanInstruments(INSTRUMENTS, {
      context: createEngineContext(),
      marketData: marketData(),
    }, { now: NOW, riskState: { ...createRiskState(NOW), dailyTrades: 2 } });

    expect(report.results.map(r => r.instrument)).toEqual(['EURUSD']);
    expect(report.stoppedReason).toBe('Max daily trades reached');
    expect(report.riskState.dailyTrades).toBe(3);
  });

  it('returns without analysis when the market is closed', async () => {
    const data = marketData();
    const report = await scanInstruments(INSTRUMENTS, {
      context: createEngineContext(),
      marketData: data,
    }, { now: new Date('2026-01-05T18:00:00Z'), requireSession: true });

    expect(report.marketClosed).toBe(true);
    expect(report.results).toEqual([]);
    expect(data.requested).toEqual([]);
  });

  it('applies one news snapshot to every instrument', async () => {
    const report = await scanInstruments(INSTRUMENTS, {
      context: createEngineContext(),
      marketData: marketData(),
      news: { nearestHighImpact: async () => ({ minutesToEvent: 5, eventName: 'FOMC' }) },
    }, { now: NOW });

    expect(report.results.map(r => r.reason)).toEqual([
      'High Impact News: FOMC in 5 min',
      'High Impact News: FOMC in 5 min',
    ]);
  });

  it('keeps scanning when persistence fails', async () => {
    const store = new InMemoryAnalysisStore();
    store.saveSnapshot = async () => {
      throw new Error('disk full');
    };
    const notifier = new CollectingNotifier();

    const report = await scanInstruments(INSTRUMENTS, {
      context: createEngineContext(),
      marketData: marketData(),
      store,
      notifier,
    }, { now: NOW });

    expect(report.results).toHaveLength(2);
    expect(notifier.sent).toHaveLength(1);
  });
});
