import {
  MarketDataError,
  MARKET_DATA_ERROR_CODES,
} from '../../common/errors/index.js';
import type {
  OrderBook,
  PriceLevel,
  PriceQuote,
} from '../../common/types/index.js';
import type { BinanceApiError } from './binance.types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseFailure(symbol: string, message: string): MarketDataError {
  return new MarketDataError(
    MARKET_DATA_ERROR_CODES.PARSE_FAILURE,
    `Malformed market data for ${symbol}: ${message}`,
    symbol,
  );
}

/** Binance encodes decimals as strings; anything non-numeric or <= 0 is rejected. */
function parsePositive(raw: unknown, field: string, symbol: string): number {
  const value = typeof raw === 'string' ? Number(raw) : NaN;
  if (!Number.isFinite(value) || value <= 0) {
    throw parseFailure(symbol, `${field} is not a positive number (${String(raw)})`);
  }
  return value;
}

export function parseJson(text: string, symbol: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw parseFailure(
      symbol,
      `invalid JSON (${error instanceof Error ? error.message : String(error)})`,
    );
  }
}

export function parseTickerPrice(body: unknown, symbol: string): PriceQuote {
  if (!isRecord(body)) {
    throw parseFailure(symbol, 'ticker payload is not an object');
  }
  return {
    symbol,
    price: parsePositive(body.price, 'price', symbol),
    timestamp: new Date(),
  };
}

function parseLevels(
  raw: unknown,
  side: 'bids' | 'asks',
  symbol: string,
): PriceLevel[] {
  if (!Array.isArray(raw)) {
    throw parseFailure(symbol, `${side} is not an array`);
  }
  return raw.map((entry: unknown, index): PriceLevel => {
    if (!Array.isArray(entry) || entry.length < 2) {
      throw parseFailure(symbol, `${side}[${index}] is not a [price, qty] pair`);
    }
    const [price, quantity]: unknown[] = entry;
    return {
      price: parsePositive(price, `${side}[${index}].price`, symbol),
      quantity: parsePositive(quantity, `${side}[${index}].quantity`, symbol),
    };
  });
}

/** Asks ascending, bids descending; index 0 is best on each side. */
export function parseDepth(body: unknown, symbol: string): OrderBook {
  if (!isRecord(body)) {
    throw parseFailure(symbol, 'depth payload is not an object');
  }
  const bids = parseLevels(body.bids, 'bids', symbol).sort(
    (a, b) => b.price - a.price,
  );
  const asks = parseLevels(body.asks, 'asks', symbol).sort(
    (a, b) => a.price - b.price,
  );
  return {
    symbol,
    bids,
    asks,
    bestBid: bids[0]?.price ?? null,
    bestAsk: asks[0]?.price ?? null,
    timestamp: new Date(),
  };
}

/** Error body of a non-2xx response, when Binance sent one. */
export function parseApiError(text: string): BinanceApiError | null {
  if (!text.trimStart().startsWith('{')) return null;
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return null;
  }
  if (
    isRecord(body) &&
    typeof body.code === 'number' &&
    typeof body.msg === 'string'
  ) {
    return { code: body.code, msg: body.msg };
  }
  return null;
}
