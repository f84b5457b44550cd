/**
 * Time Utilities
 * UTC clock helpers for session windows and daily risk counters
 */

/**
 * UTC wall-clock time as HH:MM (zero padded, so lexicographic order is time order)
 */
export function formatUtcTime(date: Date): string {
  return date.toISOString().slice(11, 16);
}

/**
 * UTC calendar day as YYYY-MM-DD; risk counters reset when this changes
 */
export function getDayKey(date: Date): string {
  return date.toISOString().split('T')[0];
}

/**
 * Format price with appropriate decimal places
 * @param price The price to format
 * @param symbol The trading symbol (for JPY detection)
 */
export function formatPrice(price: number, symbol: string): string {
  const upper = symbol.toUpperCase();
  const isJpy = upper.includes('JPY');
  const isCrypto = ['BTC', 'ETH', 'SOL', 'XRP', 'ADA', 'BNB', 'BCH', 'LTC'].some(c => upper.includes(c));

  if (isCrypto) {
    return price.toFixed(2);
  }
  if (isJpy) {
    return price.toFixed(3);
  }
  return price.toFixed(5);
}
