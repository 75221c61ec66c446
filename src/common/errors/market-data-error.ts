import { SystemError } from './system-error.js';

/**
 * Error class for market data failures (code range 1000-1999).
 *
 * - 1001: Network failure (transport error, timeout)
 * - 1002: Parse failure (malformed payload, non-numeric price/quantity)
 * - 1003: HTTP error (non-2xx response from the exchange)
 * - 1004: Invalid symbol (exchange rejected the symbol)
 */
export class MarketDataError extends SystemError {
  constructor(
    code: number,
    message: string,
    public readonly symbol: string,
    severity: 'critical' | 'error' | 'warning' = 'error',
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, severity, metadata);
  }

  isNetworkError(): boolean {
    return this.code === MARKET_DATA_ERROR_CODES.NETWORK_FAILURE;
  }

  isParseError(): boolean {
    return this.code === MARKET_DATA_ERROR_CODES.PARSE_FAILURE;
  }
}

export const MARKET_DATA_ERROR_CODES = {
  NETWORK_FAILURE: 1001,
  PARSE_FAILURE: 1002,
  HTTP_ERROR: 1003,
  INVALID_SYMBOL: 1004,
} as const;
