/** Binance spot REST payloads and request weights. */

export const BINANCE_DEFAULT_API_URL = 'https://api.binance.com/api/v3';

/** Published spot REST budget (request weight per minute per IP) */
export const BINANCE_DEFAULT_WEIGHT_PER_MINUTE = 6000;

/** Binance API error code for an unknown symbol */
export const BINANCE_INVALID_SYMBOL_CODE = -1121;

export const TICKER_PRICE_WEIGHT = 2;

/** Weight of GET /depth grows with the requested limit. */
export function depthRequestWeight(limit: number): number {
  if (limit <= 100) return 5;
  if (limit <= 500) return 25;
  if (limit <= 1000) return 50;
  return 250;
}

export interface BinanceApiError {
  code: number;
  msg: string;
}
