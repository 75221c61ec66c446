import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { FinancialMath } from './financial-math.js';
import { InsufficientLiquidityError } from '../errors/insufficient-liquidity-error.js';
import type { PriceLevel } from '../types/index.js';

// ── Arbitraries ──

/** Ask side: strictly increasing prices, positive quantities. */
const asksArb = fc
  .array(
    fc.record({
      step: fc.integer({ min: 1, max: 500 }),
      quantity: fc.integer({ min: 1, max: 1000 }),
    }),
    { minLength: 1, maxLength: 20 },
  )
  .chain((raw) =>
    fc.integer({ min: 1, max: 100000 }).map((start) => {
      let price = start;
      return raw.map(({ step, quantity }): PriceLevel => {
        price += step;
        return { price: price / 100, quantity };
      });
    }),
  );

const fractionArb = fc.double({
  min: 0.01,
  max: 1,
  noNaN: true,
  noDefaultInfinity: true,
});

function totalQuantity(levels: PriceLevel[]): number {
  return levels.reduce((sum, level) => sum + level.quantity, 0);
}

/** Volume as a share of total depth, kept to two decimals. */
function volumeFor(levels: PriceLevel[], fraction: number): number {
  return Math.max(Math.floor(totalQuantity(levels) * fraction * 100) / 100, 0.01);
}

describe('FinancialMath.calculateEffectivePrice property tests', () => {
  it('effective price lies between the best and the worst touched ask', () => {
    fc.assert(
      fc.property(asksArb, fractionArb, (asks, frac) => {
        const volume = volumeFor(asks, frac);
        const result = FinancialMath.calculateEffectivePrice(
          { asks, bids: [] },
          volume,
          'buy',
        );
        const worstTouched = asks[result.depthConsumed - 1];

        expect(worstTouched).toBeDefined();
        if (worstTouched) {
          expect(result.effectivePrice.gte(result.bestPrice)).toBe(true);
          expect(result.effectivePrice.lte(worstTouched.price)).toBe(true);
        }
        expect(result.slippagePct.gte(0)).toBe(true);
      }),
    );
  });

  it('effective price is non-decreasing in volume', () => {
    fc.assert(
      fc.property(
        asksArb,
        fractionArb,
        fractionArb,
        (asks, f1, f2) => {
          const smaller = volumeFor(asks, Math.min(f1, f2));
          const larger = volumeFor(asks, Math.max(f1, f2));
          const book = { asks, bids: [] };

          const a = FinancialMath.calculateEffectivePrice(
            book,
            smaller,
            'buy',
          );
          const b = FinancialMath.calculateEffectivePrice(
            book,
            larger,
            'buy',
          );

          expect(b.effectivePrice.gte(a.effectivePrice)).toBe(true);
        },
      ),
    );
  });

  it('never returns a partial fill when volume exceeds depth', () => {
    fc.assert(
      fc.property(asksArb, fc.integer({ min: 1, max: 1000 }), (asks, extra) => {
        const requested = totalQuantity(asks) + extra;

        expect(() =>
          FinancialMath.calculateEffectivePrice(
            { asks, bids: [] },
            requested,
            'buy',
          ),
        ).toThrow(InsufficientLiquidityError);
      }),
    );
  });
});
