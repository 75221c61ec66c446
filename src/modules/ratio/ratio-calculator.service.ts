import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { IMarketDataProvider } from '../../common/interfaces/index.js';
import type {
  OrderSide,
  SimpleRatio,
  SlippageAnalysis,
  VolumeRatio,
} from '../../common/types/index.js';
import { FinancialMath } from '../../common/utils/index.js';
import { EVENT_NAMES } from '../../common/events/event-catalog.js';
import { RatioVolumeCalculatedEvent } from '../../common/events/ratio.events.js';
import { MARKET_DATA_PROVIDER_TOKEN } from '../../connectors/connector.constants.js';
import { ORDER_BOOK_DEPTH } from './ratio.constants.js';

/**
 * Derives pair ratios from market data. Market data and liquidity errors
 * propagate unchanged; nothing here retries.
 */
@Injectable()
export class RatioCalculatorService {
  private readonly logger = new Logger(RatioCalculatorService.name);

  constructor(
    @Inject(MARKET_DATA_PROVIDER_TOKEN)
    private readonly marketData: IMarketDataProvider,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * priceA / priceB from two independent spot quotes. The quotes are not
   * taken atomically, so a small skew between them is expected.
   */
  async calculateSimpleRatio(
    pairName: string,
    symbolA: string,
    symbolB: string,
  ): Promise<SimpleRatio> {
    const quoteA = await this.marketData.getPrice(symbolA);
    const quoteB = await this.marketData.getPrice(symbolB);

    return {
      pairName,
      symbolA,
      symbolB,
      priceA: quoteA.price,
      priceB: quoteB.price,
      ratio: FinancialMath.calculateRatio(quoteA.price, quoteB.price).toNumber(),
      timestamp: new Date(),
    };
  }

  /**
   * Ratio of effective buy prices when filling the same `volume` of each
   * leg against its order book.
   */
  async calculateVolumeRatio(
    pairName: string,
    symbolA: string,
    symbolB: string,
    volume: number,
  ): Promise<VolumeRatio> {
    const bookA = await this.marketData.getOrderBook(symbolA, ORDER_BOOK_DEPTH);
    const bookB = await this.marketData.getOrderBook(symbolB, ORDER_BOOK_DEPTH);

    const fillA = FinancialMath.calculateEffectivePrice(
      bookA,
      volume,
      'buy',
      symbolA,
    );
    const fillB = FinancialMath.calculateEffectivePrice(
      bookB,
      volume,
      'buy',
      symbolB,
    );

    const result: VolumeRatio = {
      pairName,
      symbolA,
      symbolB,
      volume,
      effectivePriceA: fillA.effectivePrice.toNumber(),
      effectivePriceB: fillB.effectivePrice.toNumber(),
      slippageA: fillA.slippagePct.toNumber(),
      slippageB: fillB.slippagePct.toNumber(),
      ratio: FinancialMath.calculateRatio(
        fillA.effectivePrice,
        fillB.effectivePrice,
      ).toNumber(),
      timestamp: new Date(),
    };

    this.logger.debug({
      message: 'Volume ratio calculated',
      module: 'ratio',
      pairName,
      volume,
      ratio: result.ratio,
      slippageA: result.slippageA,
      slippageB: result.slippageB,
    });
    this.eventEmitter.emit(
      EVENT_NAMES.RATIO_VOLUME_CALCULATED,
      new RatioVolumeCalculatedEvent(result),
    );

    return result;
  }

  async analyzeSlippage(
    symbol: string,
    volume: number,
    side: OrderSide,
  ): Promise<SlippageAnalysis> {
    const book = await this.marketData.getOrderBook(symbol, ORDER_BOOK_DEPTH);
    const fill = FinancialMath.calculateEffectivePrice(
      book,
      volume,
      side,
      symbol,
    );

    // One-sided book: fall back to the walked side's best price
    const midPrice =
      book.bestBid !== null && book.bestAsk !== null
        ? FinancialMath.calculateMidPrice(book.bestBid, book.bestAsk)
        : fill.bestPrice;

    return {
      symbol,
      side,
      volume,
      midPrice: midPrice.toNumber(),
      bestPrice: fill.bestPrice.toNumber(),
      effectivePrice: fill.effectivePrice.toNumber(),
      slippagePct: fill.slippagePct.toNumber(),
      depthConsumed: fill.depthConsumed,
      totalCost: fill.effectivePrice.mul(volume).toNumber(),
      timestamp: new Date(),
    };
  }
}
