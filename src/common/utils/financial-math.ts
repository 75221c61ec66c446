import Decimal from 'decimal.js';
import { InsufficientLiquidityError } from '../errors/insufficient-liquidity-error.js';
import type { OrderBook, OrderSide, PriceLevel } from '../types/index.js';

// Isolated Decimal constructor configured for financial precision.
// Uses Decimal.clone() to avoid mutating the global Decimal settings,
// so other modules can safely import decimal.js with their own config.
export const FinancialDecimal = Decimal.clone({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -18,
  toExpPos: 20,
});

export interface EffectivePriceResult {
  /** Volume-weighted average fill price */
  effectivePrice: Decimal;
  /** Price of the first level on the walked side */
  bestPrice: Decimal;
  /** |effectivePrice - bestPrice| / bestPrice * 100 */
  slippagePct: Decimal;
  /** Number of levels touched by the fill */
  depthConsumed: number;
  filledQuantity: Decimal;
  totalCost: Decimal;
}

/**
 * Pure financial math for ratio and slippage calculations.
 * All methods use decimal.js, never native `number` arithmetic.
 */
export class FinancialMath {
  /**
   * Walk one side of an order book from the best level, filling `volume`.
   *
   * Buy consumes asks, sell consumes bids. Levels must already be sorted
   * best-first. Insufficient depth is only reported after every level has
   * been scanned, so the error carries the full available quantity.
   *
   * A zero volume yields the best price with zero slippage and zero depth.
   */
  static calculateEffectivePrice(
    book: Pick<OrderBook, 'bids' | 'asks'>,
    volume: Decimal.Value,
    side: OrderSide,
    symbol?: string,
  ): EffectivePriceResult {
    const levels = side === 'buy' ? book.asks : book.bids;
    return FinancialMath.walkLevels(levels, volume, side, symbol);
  }

  static walkLevels(
    levels: readonly PriceLevel[],
    volume: Decimal.Value,
    side: OrderSide,
    symbol?: string,
  ): EffectivePriceResult {
    const requested = new FinancialDecimal(volume);
    FinancialMath.validateDecimalInput(requested, 'volume');
    if (requested.isNegative()) {
      throw new Error('FinancialMath: volume must not be negative');
    }

    const best = levels[0];
    if (!best) {
      throw new InsufficientLiquidityError(
        requested.toNumber(),
        0,
        side,
        symbol,
      );
    }
    const bestPrice = new FinancialDecimal(best.price);

    if (requested.isZero()) {
      return {
        effectivePrice: bestPrice,
        bestPrice,
        slippagePct: new FinancialDecimal(0),
        depthConsumed: 0,
        filledQuantity: new FinancialDecimal(0),
        totalCost: new FinancialDecimal(0),
      };
    }

    let remaining = requested;
    let filled = new FinancialDecimal(0);
    let cost = new FinancialDecimal(0);
    let depthConsumed = 0;

    for (const level of levels) {
      if (remaining.lte(0)) break;
      const take = FinancialDecimal.min(
        remaining,
        new FinancialDecimal(level.quantity),
      );
      cost = cost.plus(new FinancialDecimal(level.price).mul(take));
      filled = filled.plus(take);
      remaining = remaining.minus(take);
      depthConsumed++;
    }

    if (remaining.gt(0)) {
      // Loop only exits early once filled, so `filled` is the whole side
      throw new InsufficientLiquidityError(
        requested.toNumber(),
        filled.toNumber(),
        side,
        symbol,
      );
    }

    const effectivePrice = cost.div(filled);
    return {
      effectivePrice,
      bestPrice,
      slippagePct: FinancialMath.calculateSlippagePct(
        effectivePrice,
        bestPrice,
      ),
      depthConsumed,
      filledQuantity: filled,
      totalCost: cost,
    };
  }

  /**
   * Formula: |effectivePrice - referencePrice| / referencePrice * 100
   */
  static calculateSlippagePct(
    effectivePrice: Decimal,
    referencePrice: Decimal,
  ): Decimal {
    FinancialMath.validateDecimalInput(effectivePrice, 'effectivePrice');
    FinancialMath.validateDecimalInput(referencePrice, 'referencePrice');
    if (referencePrice.isZero()) {
      throw new Error(
        'FinancialMath: referencePrice must not be zero (division by zero)',
      );
    }
    return effectivePrice
      .minus(referencePrice)
      .abs()
      .div(referencePrice)
      .mul(100);
  }

  /** priceA / priceB */
  static calculateRatio(priceA: Decimal.Value, priceB: Decimal.Value): Decimal {
    const a = new FinancialDecimal(priceA);
    const b = new FinancialDecimal(priceB);
    FinancialMath.validateDecimalInput(a, 'priceA');
    FinancialMath.validateDecimalInput(b, 'priceB');
    if (b.isZero()) {
      throw new Error(
        'FinancialMath: priceB must not be zero (division by zero)',
      );
    }
    return a.div(b);
  }

  /**
   * Signed percentage change from baseline to current.
   * Formula: (current - baseline) / baseline * 100
   */
  static calculateChangePct(
    baseline: Decimal.Value,
    current: Decimal.Value,
  ): Decimal {
    const base = new FinancialDecimal(baseline);
    const curr = new FinancialDecimal(current);
    FinancialMath.validateDecimalInput(base, 'baseline');
    FinancialMath.validateDecimalInput(curr, 'current');
    if (base.isZero()) {
      throw new Error(
        'FinancialMath: baseline must not be zero (division by zero)',
      );
    }
    return curr.minus(base).div(base).mul(100);
  }

  /** (bestBid + bestAsk) / 2 */
  static calculateMidPrice(
    bestBid: Decimal.Value,
    bestAsk: Decimal.Value,
  ): Decimal {
    return new FinancialDecimal(bestBid).plus(bestAsk).div(2);
  }

  private static validateDecimalInput(value: Decimal, name: string): void {
    if (value.isNaN()) {
      throw new Error(`FinancialMath: ${name} must not be NaN`);
    }
    if (!value.isFinite()) {
      throw new Error(`FinancialMath: ${name} must not be Infinity`);
    }
  }
}
