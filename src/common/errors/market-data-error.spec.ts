import { describe, it, expect } from 'vitest';
import {
  MarketDataError,
  MARKET_DATA_ERROR_CODES,
} from './market-data-error.js';
import { SystemError } from './system-error.js';

describe('MarketDataError', () => {
  it('should create error with all properties', () => {
    const error = new MarketDataError(
      MARKET_DATA_ERROR_CODES.NETWORK_FAILURE,
      'Failed to fetch price for BTCUSDT',
      'BTCUSDT',
    );

    expect(error.code).toBe(1001);
    expect(error.message).toBe('Failed to fetch price for BTCUSDT');
    expect(error.symbol).toBe('BTCUSDT');
    expect(error.severity).toBe('error');
    expect(error.name).toBe('MarketDataError');
    expect(error).toBeInstanceOf(SystemError);
  });

  it('should classify network and parse failures', () => {
    const network = new MarketDataError(
      MARKET_DATA_ERROR_CODES.NETWORK_FAILURE,
      'timeout',
      'ETHUSDT',
    );
    const parse = new MarketDataError(
      MARKET_DATA_ERROR_CODES.PARSE_FAILURE,
      'bad price',
      'ETHUSDT',
    );

    expect(network.isNetworkError()).toBe(true);
    expect(network.isParseError()).toBe(false);
    expect(parse.isParseError()).toBe(true);
    expect(parse.isNetworkError()).toBe(false);
  });

  it('should define codes in the 1000-1999 range', () => {
    for (const [, code] of Object.entries(MARKET_DATA_ERROR_CODES)) {
      expect(code).toBeGreaterThanOrEqual(1000);
      expect(code).toBeLessThan(2000);
    }
  });
});
