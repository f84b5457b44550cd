/**
 * Smart Money Concepts (SMC) Type Definitions
 * Structural facts derived from a single-timeframe bar series
 */

export interface Bar {
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Bar with the per-bar indicators the pipeline reads.
 * Values are null at the head of the series until the rolling window fills.
 */
export interface AnalysisBar extends Bar {
  rsi: number | null;
  atr: number | null;
  vwap: number | null;
}

export type BarSeries = readonly AnalysisBar[];

export type Polarity = 'bullish' | 'bearish';

export type TradeSide = 'short' | 'long';

export interface SwingPoint {
  kind: 'high' | 'low';
  index: number;
  price: number;
  timestamp: string;
}

export interface SwingSet {
  highs: SwingPoint[];
  lows: SwingPoint[];
}

export interface OrderBlock {
  type: Polarity;
  anchorIndex: number;
  top: number;
  bottom: number;
  strength: number;       // displacement close beyond the anchor's extreme
  timestamp: string;
}

export interface FairValueGap {
  type: Polarity;
  index: number;          // third bar of the pattern
  top: number;
  bottom: number;
  size: number;
  timestamp: string;
}

export const ZONE_NAMES = ['Premium', 'Premium (Weak)', 'Equilibrium', 'Discount'] as const;

export type ZoneName = typeof ZONE_NAMES[number];

export interface FibonacciLevel {
  ratio: number;
  label: string;
  price: number;
}

export interface PremiumDiscountZone {
  currentPrice: number;
  rangeHigh: number;
  rangeLow: number;
  position: number;       // 0 = range low, 1 = range high
  zone: ZoneName;
  strength: string;
  levels: FibonacciLevel[];
}

export type MssType = 'Bearish MSS' | 'Bullish MSS';

export interface MarketStructureShift {
  type: MssType;
  brokenLevel: number;
  swingIndex: number;
  strength: 'Strong';
  implication: string;
}

export interface SmcAnalysis {
  swings: SwingSet;
  orderBlocks: {
    bearish: OrderBlock[];
    bullish: OrderBlock[];
  };
  fairValueGaps: FairValueGap[];
  premiumDiscount: PremiumDiscountZone;
  marketStructureShift: MarketStructureShift | null;
}

export type LiquidityEventType = 'Local High Sweep' | 'Local Low Sweep';

export interface LiquiditySweep {
  type: LiquidityEventType;
  side: TradeSide;
  sweptLevel: number;     // prior extreme that was taken out
  extreme: number;        // current bar's high (short) or low (long)
  lookback: number;
}

export interface LiquidityEvaluation {
  side: TradeSide;
  sweep: LiquiditySweep | null;
  exhaustion: boolean;
  divergence: boolean;
  wickSize: number;
  bodySize: number;
  confirmed: boolean;
}
