/**
 * Bar fixtures for tests: deterministic 15-minute candles from OHLC tuples
 */

import type { AnalysisBar } from '../modules/smartMoney/types.js';

export type Ohlc = [open: number, high: number, low: number, close: number];

const START = Date.UTC(2026, 0, 5, 0, 0);
const STEP_MS = 15 * 60_000;

export function timestampAt(index: number): string {
  return new Date(START + index * STEP_MS).toISOString();
}

export function makeBar(index: number, [open, high, low, close]: Ohlc, volume: number = 1000): AnalysisBar {
  return {
    timestamp: timestampAt(index),
    open,
    high,
    low,
    close,
    volume,
    rsi: null,
    atr: null,
    vwap: null,
  };
}

export function makeBars(rows: readonly Ohlc[]): AnalysisBar[] {
  return rows.map((row, i) => makeBar(i, row));
}

/** Doji-like candles with a fixed range around one price */
export function flatBars(count: number, price: number, halfRange: number = 0): AnalysisBar[] {
  return Array.from({ length: count }, (_, i) =>
    makeBar(i, [price, price + halfRange, price - halfRange, price])
  );
}

export function withRsi(bars: readonly AnalysisBar[], values: readonly (number | null)[]): AnalysisBar[] {
  return bars.map((bar, i) => ({ ...bar, rsi: values[i] ?? null }));
}
