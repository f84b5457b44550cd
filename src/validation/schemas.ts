import { z } from 'zod';
import { ZONE_NAMES } from '../modules/smartMoney/types.js';

// ═══════════════════════════════════════════════════════════════
// ENGINE CONFIGURATION
// ═══════════════════════════════════════════════════════════════

const HHMM = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected UTC time as HH:MM');

export const AssetClassSchema = z.enum(['forex', 'crypto', 'metal', 'index', 'energy']);

export const DirectionModeSchema = z.enum(['SHORT', 'LONG', 'BOTH']);

const ZoneNameSchema = z.enum(ZONE_NAMES);

export const ZoneAcceptanceSchema = z.object({
  short: z.array(ZoneNameSchema).min(1),
  long: z.array(ZoneNameSchema).min(1),
});

export const AnalysisSettingsSchema = z.object({
  swingLookback: z.number().int().min(1).max(50).default(5),
  zoneWindow: z.number().int().min(2).max(1000).default(50),
  sweepLookback: z.number().int().min(1).max(200).default(10),
  exhaustionMultiplier: z.number().positive().default(1.0),
  stopBufferRatio: z.number().min(0).max(1).default(0.1),
  rewardMultiple: z.number().positive().default(2),
  blockCounterTrend: z.boolean().default(false),
});

export const RiskRulesSchema = z.object({
  maxTradesPerDay: z.number().int().min(1),
  consecutiveLossStopCount: z.number().int().min(1),
  maxDailyDrawdownPct: z.number().positive(),
  minRiskReward: z.number().positive(),
});

export const FiltersSchema = z.object({
  maxSpread: z.number().min(0),
  minProbabilityPct: z.number().min(0).max(100),
});

const SessionWindowSchema = z.object({
  start: HHMM,
  end: HHMM,
});

export const TradingHoursSchema = z.object({
  london: SessionWindowSchema,
  newYork: SessionWindowSchema,
});

export const NewsSettingsSchema = z.object({
  blockWindowMinutes: z.number().min(0).default(15),
  currency: z.string().min(3).max(3).default('USD'),
  impact: z.string().min(1).default('High'),
});

export const InstrumentSchema = z.object({
  displayName: z.string().min(1).max(20),
  symbol: z.string().min(1).max(20),
  assetClass: AssetClassSchema,
  enabled: z.boolean().default(true),
  direction: DirectionModeSchema.optional(),
});

export const EngineConfigSchema = z.object({
  analysis: AnalysisSettingsSchema.default({}),
  zones: z.object({
    forex: ZoneAcceptanceSchema,
    crypto: ZoneAcceptanceSchema,
    metal: ZoneAcceptanceSchema.optional(),
    index: ZoneAcceptanceSchema.optional(),
    energy: ZoneAcceptanceSchema.optional(),
  }),
  risk: RiskRulesSchema,
  filters: FiltersSchema,
  tradingHours: TradingHoursSchema,
  news: NewsSettingsSchema.default({}),
  instruments: z.array(InstrumentSchema).default([]),
});

// ═══════════════════════════════════════════════════════════════
// API REQUEST SCHEMAS
// ═══════════════════════════════════════════════════════════════

export const BarInputSchema = z.object({
  timestamp: z.string().min(1),
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  volume: z.number().min(0).default(0),
  rsi: z.number().finite().nullable().optional(),
  atr: z.number().finite().nullable().optional(),
  vwap: z.number().finite().nullable().optional(),
}).refine(bar => bar.high >= bar.low, { message: 'high must be >= low' });

export const RiskStateSchema = z.object({
  dayKey: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  dailyTrades: z.number().int().min(0),
  consecutiveLosses: z.number().int().min(0),
  dailyDrawdownPct: z.number().min(0),
});

export const NewsProximitySchema = z.object({
  minutesToEvent: z.number().nullable(),
  eventName: z.string(),
});

export const AnalyzeRequestSchema = z.object({
  symbol: z.string().min(1).max(20).transform(s => s.toUpperCase()),
  assetClass: AssetClassSchema.optional(),
  direction: DirectionModeSchema.optional().default('BOTH'),
  bars: z.array(BarInputSchema).min(1).max(10000),
  spread: z.number().min(0).optional(),
  news: NewsProximitySchema.optional(),
  riskState: RiskStateSchema.optional(),
});

export const OutcomeRequestSchema = z.object({
  planId: z.number().int().positive(),
  entryPrice: z.number().positive(),
  exitPrice: z.number().positive(),
  outcome: z.enum(['WIN', 'LOSS', 'BREAK_EVEN']),
  realizedR: z.number(),
  pnlPercent: z.number().optional(),
  comments: z.string().max(2000).optional(),
});

export const ReviewQuerySchema = z.object({
  limit: z.coerce.number().min(1).max(1000).optional().default(200),
});

// ═══════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════

export const EnvSchema = z.object({
  PORT: z.coerce.number().min(1).max(65535).optional().default(3000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional().default('info'),
  DATABASE_URL: z.string().optional(),
  ENGINE_CONFIG_PATH: z.string().optional().default('config/engine.config.json'),
  MODEL_PATH: z.string().optional(),
  NEWS_CALENDAR_PATH: z.string().optional(),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type AnalysisSettings = z.infer<typeof AnalysisSettingsSchema>;
export type ZoneAcceptance = z.infer<typeof ZoneAcceptanceSchema>;
export type RiskRules = z.infer<typeof RiskRulesSchema>;
export type Filters = z.infer<typeof FiltersSchema>;
export type TradingHours = z.infer<typeof TradingHoursSchema>;
export type Instrument = z.infer<typeof InstrumentSchema>;
export type AssetClass = z.infer<typeof AssetClassSchema>;
export type DirectionMode = z.infer<typeof DirectionModeSchema>;
export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;
export type OutcomeRequest = z.infer<typeof OutcomeRequestSchema>;
export type Env = z.infer<typeof EnvSchema>;
