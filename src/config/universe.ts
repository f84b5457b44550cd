/**
 * Instrument Universe
 * Known symbols per asset class and helpers over the configured instrument list
 */

import type { AssetClass, EngineConfig, Instrument } from '../validation/schemas.js';

export const FOREX_SYMBOLS = [
  'AUDUSD', 'EURGBP', 'EURJPY', 'EURUSD', 'GBPJPY', 'GBPUSD',
  'NZDUSD', 'USDCAD', 'USDCHF', 'USDJPY',
] as const;

export const CRYPTO_SYMBOLS = [
  'BTCUSD', 'ETHUSD', 'SOLUSD', 'XRPUSD',
  'ADAUSD', 'BCHUSD', 'BNBUSD', 'LTCUSD',
] as const;

export const METAL_SYMBOLS = [
  'XAUUSD',
  'XAGUSD',
] as const;

const CRYPTO_SET: ReadonlySet<string> = new Set(CRYPTO_SYMBOLS);
const METAL_SET: ReadonlySet<string> = new Set(METAL_SYMBOLS);

export function normalizeSymbol(symbol: string): string {
  return symbol.toUpperCase().replace(/[^A-Z0-9]/g, '');
}

/**
 * Asset class from the symbol alone ("XAU/USD", "btc-usd" are accepted)
 */
export function getAssetClass(symbol: string): AssetClass {
  const normalized = normalizeSymbol(symbol);
  if (CRYPTO_SET.has(normalized)) return 'crypto';
  if (METAL_SET.has(normalized)) return 'metal';
  return 'forex';
}

export function getEnabledInstruments(config: EngineConfig): Instrument[] {
  return config.instruments.filter(i => i.enabled);
}

export function getInstrumentByName(config: EngineConfig, displayName: string): Instrument | null {
  return config.instruments.find(i => i.displayName === displayName) ?? null;
}
