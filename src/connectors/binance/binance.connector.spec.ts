import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { BinanceConnector } from './binance.connector.js';
import { MarketDataError } from '../../common/errors/index.js';

vi.spyOn(Logger.prototype, 'debug').mockImplementation(() => {});
vi.spyOn(Logger.prototype, 'warn').mockImplementation(() => {});

function mockResponse(status: number, body: unknown) {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: vi
      .fn()
      .mockResolvedValue(typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

describe('BinanceConnector', () => {
  let connector: BinanceConnector;
  let mockFetch: ReturnType<typeof vi.fn>;
  const originalFetch = global.fetch;

  const config: Record<string, string> = {
    BINANCE_API_URL: 'https://binance.test/api/v3/',
    MARKET_DATA_TIMEOUT_MS: '5000',
    BINANCE_WEIGHT_PER_MINUTE: '6000',
  };

  beforeEach(async () => {
    mockFetch = vi.fn();
    global.fetch = mockFetch;

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BinanceConnector,
        {
          provide: ConfigService,
          useValue: {
            get: vi.fn(
              (key: string, defaultValue?: unknown) =>
                config[key] ?? defaultValue,
            ),
          },
        },
      ],
    }).compile();

    connector = module.get(BinanceConnector);
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  async function captureError(promise: Promise<unknown>): Promise<unknown> {
    try {
      await promise;
    } catch (error) {
      return error;
    }
    return undefined;
  }

  describe('getPrice', () => {
    it('should fetch and parse the ticker price', async () => {
      mockFetch.mockResolvedValue(
        mockResponse(200, { symbol: 'BTCUSDT', price: '50000.12000000' }),
      );

      const quote = await connector.getPrice('BTCUSDT');

      expect(mockFetch).toHaveBeenCalledWith(
        'https://binance.test/api/v3/ticker/price?symbol=BTCUSDT',
        expect.objectContaining({ signal: expect.any(AbortSignal) as unknown }),
      );
      expect(quote.symbol).toBe('BTCUSDT');
      expect(quote.price).toBe(50000.12);
      expect(quote.timestamp).toBeInstanceOf(Date);
    });

    it('should raise a network error when fetch rejects', async () => {
      mockFetch.mockRejectedValue(new Error('ECONNRESET'));

      const error = await captureError(connector.getPrice('BTCUSDT'));

      expect(error).toBeInstanceOf(MarketDataError);
      if (error instanceof MarketDataError) {
        expect(error.code).toBe(1001);
        expect(error.isNetworkError()).toBe(true);
        expect(error.message).toBe(
          'Request to /ticker/price failed for BTCUSDT: ECONNRESET',
        );
      }
    });

    it('should raise a parse error for a non-numeric price', async () => {
      mockFetch.mockResolvedValue(
        mockResponse(200, { symbol: 'BTCUSDT', price: 'abc' }),
      );

      const error = await captureError(connector.getPrice('BTCUSDT'));

      expect(error).toBeInstanceOf(MarketDataError);
      if (error instanceof MarketDataError) {
        expect(error.code).toBe(1002);
        expect(error.message).toBe(
          'Malformed market data for BTCUSDT: price is not a positive number (abc)',
        );
      }
    });

    it('should raise a parse error for invalid JSON', async () => {
      mockFetch.mockResolvedValue(mockResponse(200, 'not json'));

      const error = await captureError(connector.getPrice('BTCUSDT'));

      expect(error).toBeInstanceOf(MarketDataError);
      if (error instanceof MarketDataError) {
        expect(error.isParseError()).toBe(true);
      }
    });

    it('should map Binance code -1121 to an invalid symbol error', async () => {
      mockFetch.mockResolvedValue(
        mockResponse(400, { code: -1121, msg: 'Invalid symbol.' }),
      );

      const error = await captureError(connector.getPrice('NOPE'));

      expect(error).toBeInstanceOf(MarketDataError);
      if (error instanceof MarketDataError) {
        expect(error.code).toBe(1004);
        expect(error.severity).toBe('warning');
        expect(error.message).toBe('Invalid symbol: NOPE');
      }
    });

    it('should raise an HTTP error for other non-2xx responses', async () => {
      mockFetch.mockResolvedValue(mockResponse(503, '<html>down</html>'));

      const error = await captureError(connector.getPrice('BTCUSDT'));

      expect(error).toBeInstanceOf(MarketDataError);
      if (error instanceof MarketDataError) {
        expect(error.code).toBe(1003);
        expect(error.message).toBe('HTTP 503 from /ticker/price for BTCUSDT');
        expect(error.metadata).toEqual({ status: 503, apiCode: undefined });
      }
    });
  });

  describe('getOrderBook', () => {
    it('should request the depth limit and sort both sides best-first', async () => {
      mockFetch.mockResolvedValue(
        mockResponse(200, {
          lastUpdateId: 1,
          bids: [
            ['2999.00', '1.5'],
            ['3000.00', '2.0'],
          ],
          asks: [
            ['3002.00', '1.0'],
            ['3001.00', '0.5'],
          ],
        }),
      );

      const book = await connector.getOrderBook('ETHUSDT', 100);

      expect(mockFetch).toHaveBeenCalledWith(
        'https://binance.test/api/v3/depth?symbol=ETHUSDT&limit=100',
        expect.anything(),
      );
      expect(book.bids).toEqual([
        { price: 3000, quantity: 2 },
        { price: 2999, quantity: 1.5 },
      ]);
      expect(book.asks).toEqual([
        { price: 3001, quantity: 0.5 },
        { price: 3002, quantity: 1 },
      ]);
      expect(book.bestBid).toBe(3000);
      expect(book.bestAsk).toBe(3001);
    });

    it('should report null best prices for an empty book', async () => {
      mockFetch.mockResolvedValue(
        mockResponse(200, { lastUpdateId: 1, bids: [], asks: [] }),
      );

      const book = await connector.getOrderBook('ETHUSDT', 100);

      expect(book.bestBid).toBeNull();
      expect(book.bestAsk).toBeNull();
    });

    it('should reject a malformed level', async () => {
      mockFetch.mockResolvedValue(
        mockResponse(200, { lastUpdateId: 1, bids: [['3000.00']], asks: [] }),
      );

      const error = await captureError(connector.getOrderBook('ETHUSDT', 100));

      expect(error).toBeInstanceOf(MarketDataError);
      if (error instanceof MarketDataError) {
        expect(error.message).toBe(
          'Malformed market data for ETHUSDT: bids[0] is not a [price, qty] pair',
        );
      }
    });
  });

  describe('batch fetches', () => {
    function priceFor(url: string) {
      if (url.includes('BTCUSDT')) {
        return mockResponse(200, { symbol: 'BTCUSDT', price: '50000' });
      }
      if (url.includes('ETHUSDT')) {
        return mockResponse(200, { symbol: 'ETHUSDT', price: '3000' });
      }
      return mockResponse(400, { code: -1121, msg: 'Invalid symbol.' });
    }

    it('should return prices in request order', async () => {
      mockFetch.mockImplementation((url: string) =>
        Promise.resolve(priceFor(url)),
      );

      const quotes = await connector.getPrices(['ETHUSDT', 'BTCUSDT']);

      expect(quotes.map((q) => q.price)).toEqual([3000, 50000]);
    });

    it('should fail the whole batch when one symbol fails', async () => {
      mockFetch.mockImplementation((url: string) =>
        Promise.resolve(priceFor(url)),
      );

      await expect(
        connector.getPrices(['BTCUSDT', 'NOPE']),
      ).rejects.toBeInstanceOf(MarketDataError);
    });

    it('should collect per-symbol outcomes when settled', async () => {
      mockFetch.mockImplementation((url: string) =>
        Promise.resolve(priceFor(url)),
      );

      const outcomes = await connector.getPricesSettled(['BTCUSDT', 'NOPE']);

      expect(outcomes).toHaveLength(2);
      expect(outcomes[0]).toEqual({
        symbol: 'BTCUSDT',
        ok: true,
        value: expect.objectContaining({ price: 50000 }) as unknown,
      });
      expect(outcomes[1]?.ok).toBe(false);
      expect(outcomes[1]?.symbol).toBe('NOPE');
    });

    it('should fetch order books for every symbol', async () => {
      mockFetch.mockResolvedValue(
        mockResponse(200, {
          lastUpdateId: 1,
          bids: [['1.0', '1.0']],
          asks: [['1.1', '1.0']],
        }),
      );

      const books = await connector.getOrderBooks(['BTCUSDT', 'ETHUSDT'], 50);

      expect(books.map((b) => b.symbol)).toEqual(['BTCUSDT', 'ETHUSDT']);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });
  });
});
