import { describe, it, expect } from 'vitest';
import { FinancialMath, FinancialDecimal } from './financial-math.js';
import { InsufficientLiquidityError } from '../errors/insufficient-liquidity-error.js';

describe('FinancialMath', () => {
  describe('calculateEffectivePrice', () => {
    const book = {
      asks: [
        { price: 100, quantity: 1 },
        { price: 101, quantity: 2 },
      ],
      bids: [
        { price: 99, quantity: 1 },
        { price: 98, quantity: 3 },
      ],
    };

    it('should fill a buy across two ask levels', () => {
      const result = FinancialMath.calculateEffectivePrice(book, 2, 'buy');

      expect(result.effectivePrice.toNumber()).toBe(100.5);
      expect(result.slippagePct.toNumber()).toBe(0.5);
      expect(result.depthConsumed).toBe(2);
      expect(result.filledQuantity.toNumber()).toBe(2);
      expect(result.totalCost.toNumber()).toBe(201);
      expect(result.bestPrice.toNumber()).toBe(100);
    });

    it('should walk bids for a sell', () => {
      const result = FinancialMath.calculateEffectivePrice(book, 2, 'sell');

      // 1@99 + 1@98
      expect(result.effectivePrice.toNumber()).toBe(98.5);
      expect(result.bestPrice.toNumber()).toBe(99);
      expect(result.depthConsumed).toBe(2);
      expect(result.slippagePct.toFixed(6)).toBe('0.505051');
    });

    it('should report zero slippage when the best level covers the volume', () => {
      const result = FinancialMath.calculateEffectivePrice(book, 0.5, 'buy');

      expect(result.effectivePrice.toNumber()).toBe(100);
      expect(result.slippagePct.isZero()).toBe(true);
      expect(result.depthConsumed).toBe(1);
    });

    it('should count only levels touched by the fill', () => {
      const result = FinancialMath.calculateEffectivePrice(book, 1, 'buy');

      expect(result.depthConsumed).toBe(1);
    });

    it('should throw InsufficientLiquidityError with the full available volume', () => {
      const thin = {
        asks: [
          { price: 100, quantity: 1 },
          { price: 101, quantity: 1 },
        ],
        bids: [],
      };

      let caught: unknown;
      try {
        FinancialMath.calculateEffectivePrice(thin, 5, 'buy', 'BTCUSDT');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InsufficientLiquidityError);
      if (caught instanceof InsufficientLiquidityError) {
        expect(caught.requestedVolume).toBe(5);
        expect(caught.availableVolume).toBe(2);
        expect(caught.side).toBe('buy');
        expect(caught.symbol).toBe('BTCUSDT');
      }
    });

    it('should return the best price with zero slippage and depth for zero volume', () => {
      const result = FinancialMath.calculateEffectivePrice(book, 0, 'buy');

      expect(result.effectivePrice.toNumber()).toBe(100);
      expect(result.slippagePct.isZero()).toBe(true);
      expect(result.depthConsumed).toBe(0);
      expect(result.totalCost.isZero()).toBe(true);
    });

    it('should fail on an empty side even for zero volume', () => {
      expect(() =>
        FinancialMath.calculateEffectivePrice({ asks: [], bids: [] }, 0, 'buy'),
      ).toThrow(InsufficientLiquidityError);
    });

    it('should reject negative volume', () => {
      expect(() => FinancialMath.calculateEffectivePrice(book, -1, 'buy')).toThrow(
        'FinancialMath: volume must not be negative',
      );
    });

    it('should reject NaN and Infinity volume', () => {
      expect(() =>
        FinancialMath.calculateEffectivePrice(book, NaN, 'buy'),
      ).toThrow('FinancialMath: volume must not be NaN');
      expect(() =>
        FinancialMath.calculateEffectivePrice(book, Infinity, 'buy'),
      ).toThrow('FinancialMath: volume must not be Infinity');
    });
  });

  describe('calculateRatio', () => {
    it('should divide priceA by priceB', () => {
      const ratio = FinancialMath.calculateRatio(50000, 3000);

      expect(ratio.toFixed(10)).toBe('16.6666666667');
      expect(ratio.toNumber()).toBe(50000 / 3000);
    });

    it('should throw on a zero denominator', () => {
      expect(() => FinancialMath.calculateRatio(1, 0)).toThrow(
        'FinancialMath: priceB must not be zero (division by zero)',
      );
    });
  });

  describe('calculateChangePct', () => {
    it('should return a signed percentage', () => {
      expect(FinancialMath.calculateChangePct(1, 1.06).toNumber()).toBe(6);
      expect(FinancialMath.calculateChangePct(2, 1.5).toNumber()).toBe(-25);
    });

    it('should throw on a zero baseline', () => {
      expect(() => FinancialMath.calculateChangePct(0, 1)).toThrow(
        'FinancialMath: baseline must not be zero (division by zero)',
      );
    });
  });

  describe('calculateSlippagePct', () => {
    it('should be symmetric around the reference price', () => {
      const above = FinancialMath.calculateSlippagePct(
        new FinancialDecimal(101),
        new FinancialDecimal(100),
      );
      const below = FinancialMath.calculateSlippagePct(
        new FinancialDecimal(99),
        new FinancialDecimal(100),
      );

      expect(above.toNumber()).toBe(1);
      expect(below.toNumber()).toBe(1);
    });
  });

  describe('calculateMidPrice', () => {
    it('should average best bid and best ask', () => {
      expect(FinancialMath.calculateMidPrice(99, 101).toNumber()).toBe(100);
    });
  });
});
