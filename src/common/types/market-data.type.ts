export type OrderSide = 'buy' | 'sell';

export interface PriceLevel {
  price: number;
  quantity: number;
}

export interface PriceQuote {
  symbol: string;
  price: number;
  timestamp: Date;
}

/**
 * Order book snapshot. Asks ascend by price, bids descend; index 0 is the
 * best level on each side.
 */
export interface OrderBook {
  symbol: string;
  bids: PriceLevel[];
  asks: PriceLevel[];
  bestBid: number | null;
  bestAsk: number | null;
  timestamp: Date;
}

/** One entry per symbol from a partial-failure batch fetch. */
export type FetchOutcome<T> =
  | { symbol: string; ok: true; value: T }
  | { symbol: string; ok: false; error: Error };
