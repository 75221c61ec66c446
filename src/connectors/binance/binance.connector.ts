import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { IMarketDataProvider } from '../../common/interfaces/index.js';
import type {
  FetchOutcome,
  OrderBook,
  PriceQuote,
} from '../../common/types/index.js';
import {
  MarketDataError,
  MARKET_DATA_ERROR_CODES,
} from '../../common/errors/index.js';
import { RateLimiter } from '../../common/utils/index.js';
import {
  BINANCE_DEFAULT_API_URL,
  BINANCE_DEFAULT_WEIGHT_PER_MINUTE,
  BINANCE_INVALID_SYMBOL_CODE,
  TICKER_PRICE_WEIGHT,
  depthRequestWeight,
} from './binance.types.js';
import {
  parseApiError,
  parseDepth,
  parseJson,
  parseTickerPrice,
} from './binance-payload.parser.js';

/**
 * Read-only Binance spot REST client. No retries: every failure surfaces to
 * the caller as a MarketDataError.
 */
@Injectable()
export class BinanceConnector implements IMarketDataProvider {
  private readonly logger = new Logger(BinanceConnector.name);
  private readonly rateLimiter: RateLimiter;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.apiUrl = this.configService
      .get<string>('BINANCE_API_URL', BINANCE_DEFAULT_API_URL)
      .replace(/\/+$/, '');
    this.timeoutMs = Number(
      this.configService.get<string | number>('MARKET_DATA_TIMEOUT_MS', 5000),
    );
    this.rateLimiter = RateLimiter.fromWeightPerMinute(
      Number(
        this.configService.get<string | number>(
          'BINANCE_WEIGHT_PER_MINUTE',
          BINANCE_DEFAULT_WEIGHT_PER_MINUTE,
        ),
      ),
      this.logger,
    );
  }

  async getPrice(symbol: string): Promise<PriceQuote> {
    const body = await this.request(
      '/ticker/price',
      { symbol },
      TICKER_PRICE_WEIGHT,
      symbol,
    );
    return parseTickerPrice(body, symbol);
  }

  async getOrderBook(symbol: string, depthLimit: number): Promise<OrderBook> {
    const body = await this.request(
      '/depth',
      { symbol, limit: String(depthLimit) },
      depthRequestWeight(depthLimit),
      symbol,
    );
    const book = parseDepth(body, symbol);

    this.logger.debug({
      message: 'Order book fetched',
      module: 'connector',
      symbol,
      bidLevels: book.bids.length,
      askLevels: book.asks.length,
      bestBid: book.bestBid,
      bestAsk: book.bestAsk,
    });
    return book;
  }

  async getPrices(symbols: string[]): Promise<PriceQuote[]> {
    return Promise.all(symbols.map((symbol) => this.getPrice(symbol)));
  }

  async getOrderBooks(
    symbols: string[],
    depthLimit: number,
  ): Promise<OrderBook[]> {
    return Promise.all(
      symbols.map((symbol) => this.getOrderBook(symbol, depthLimit)),
    );
  }

  async getPricesSettled(
    symbols: string[],
  ): Promise<FetchOutcome<PriceQuote>[]> {
    const results = await Promise.allSettled(
      symbols.map((symbol) => this.getPrice(symbol)),
    );
    return results.map((result, index): FetchOutcome<PriceQuote> => {
      const symbol = symbols[index] ?? '';
      if (result.status === 'fulfilled') {
        return { symbol, ok: true, value: result.value };
      }
      const reason: unknown = result.reason;
      return {
        symbol,
        ok: false,
        error: reason instanceof Error ? reason : new Error(String(reason)),
      };
    });
  }

  private async request(
    path: string,
    params: Record<string, string>,
    weight: number,
    symbol: string,
  ): Promise<unknown> {
    await this.rateLimiter.acquire(weight);
    const url = `${this.apiUrl}${path}?${new URLSearchParams(params).toString()}`;

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      throw new MarketDataError(
        MARKET_DATA_ERROR_CODES.NETWORK_FAILURE,
        `Request to ${path} failed for ${symbol}: ${error instanceof Error ? error.message : String(error)}`,
        symbol,
      );
    }

    if (!response.ok) {
      const apiError = parseApiError(text);
      if (apiError?.code === BINANCE_INVALID_SYMBOL_CODE) {
        throw new MarketDataError(
          MARKET_DATA_ERROR_CODES.INVALID_SYMBOL,
          `Invalid symbol: ${symbol}`,
          symbol,
          'warning',
          { status: response.status, apiCode: apiError.code },
        );
      }
      throw new MarketDataError(
        MARKET_DATA_ERROR_CODES.HTTP_ERROR,
        `HTTP ${response.status} from ${path} for ${symbol}${apiError ? `: ${apiError.msg}` : ''}`,
        symbol,
        'error',
        { status: response.status, apiCode: apiError?.code },
      );
    }

    return parseJson(text, symbol);
  }
}
