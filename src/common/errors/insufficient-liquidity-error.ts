import { SystemError } from './system-error.js';

export const INSUFFICIENT_LIQUIDITY_CODE = 2001;

/**
 * Requested volume exceeds the total quantity available on the walked side
 * of an order book. Only raised after the whole side has been scanned.
 */
export class InsufficientLiquidityError extends SystemError {
  constructor(
    public readonly requestedVolume: number,
    public readonly availableVolume: number,
    public readonly side: 'buy' | 'sell',
    public readonly symbol?: string,
  ) {
    super(
      INSUFFICIENT_LIQUIDITY_CODE,
      `Insufficient liquidity${symbol ? ` for ${symbol}` : ''} on ${side === 'buy' ? 'asks' : 'bids'}. Requested: ${requestedVolume}, Available: ${availableVolume}`,
      'warning',
      { requestedVolume, availableVolume, side, symbol },
    );
  }
}
