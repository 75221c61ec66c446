import type {
  FetchOutcome,
  OrderBook,
  PriceQuote,
} from '../types/index.js';

/**
 * Market data provider interface: the boundary between the exchange
 * connector and the ratio engine. Failures surface as MarketDataError.
 */
export interface IMarketDataProvider {
  /** Current spot price for a symbol. */
  getPrice(symbol: string): Promise<PriceQuote>;

  /** Order book snapshot, asks ascending and bids descending. */
  getOrderBook(symbol: string, depthLimit: number): Promise<OrderBook>;

  /** Parallel fetch; rejects as soon as any symbol fails. */
  getPrices(symbols: string[]): Promise<PriceQuote[]>;

  /** Parallel fetch; rejects as soon as any symbol fails. */
  getOrderBooks(symbols: string[], depthLimit: number): Promise<OrderBook[]>;

  /** Parallel fetch collecting one outcome per symbol. */
  getPricesSettled(symbols: string[]): Promise<FetchOutcome<PriceQuote>[]>;
}
