import { Controller, Get, Inject, Query, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import type { IMarketDataProvider } from '../../common/interfaces/index.js';
import { MARKET_DATA_PROVIDER_TOKEN } from '../../connectors/connector.constants.js';
import { RatioCalculatorService } from './ratio-calculator.service.js';
import {
  PriceListResponseDto,
  PricesQueryDto,
  SlippageQueryDto,
  SlippageResponseDto,
} from './dto/index.js';

const queryPipe = new ValidationPipe({ whitelist: true, transform: true });

@ApiTags('Market')
@Controller('market')
export class MarketController {
  constructor(
    private readonly calculator: RatioCalculatorService,
    @Inject(MARKET_DATA_PROVIDER_TOKEN)
    private readonly marketData: IMarketDataProvider,
  ) {}

  @Get('slippage')
  @ApiOperation({ summary: 'Slippage of a market order of the given volume' })
  async getSlippage(
    @Query(queryPipe) query: SlippageQueryDto,
  ): Promise<SlippageResponseDto> {
    const data = await this.calculator.analyzeSlippage(
      query.symbol,
      query.volume,
      query.side,
    );
    return { data, timestamp: new Date().toISOString() };
  }

  /** Partial failures are reported per symbol rather than failing the batch. */
  @Get('prices')
  @ApiOperation({ summary: 'Spot prices for several symbols' })
  async getPrices(
    @Query(queryPipe) query: PricesQueryDto,
  ): Promise<PriceListResponseDto> {
    const outcomes = await this.marketData.getPricesSettled(query.symbols);
    const data = outcomes.map((outcome) =>
      outcome.ok
        ? { symbol: outcome.symbol, price: outcome.value.price }
        : { symbol: outcome.symbol, error: outcome.error.message },
    );
    return { data, count: data.length, timestamp: new Date().toISOString() };
  }
}
