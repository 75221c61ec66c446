import { Controller, Get, Query, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RatioCalculatorService } from './ratio-calculator.service.js';
import {
  SimpleRatioQueryDto,
  SimpleRatioResponseDto,
  VolumeRatioQueryDto,
  VolumeRatioResponseDto,
} from './dto/index.js';

const queryPipe = new ValidationPipe({ whitelist: true, transform: true });

@ApiTags('Ratios')
@Controller('ratios')
export class RatioController {
  constructor(private readonly calculator: RatioCalculatorService) {}

  @Get('simple')
  @ApiOperation({ summary: 'Spot price ratio of two symbols' })
  @ApiResponse({ status: 400, description: 'Invalid symbol' })
  async getSimpleRatio(
    @Query(queryPipe) query: SimpleRatioQueryDto,
  ): Promise<SimpleRatioResponseDto> {
    const data = await this.calculator.calculateSimpleRatio(
      query.name ?? `${query.symbolA}/${query.symbolB}`,
      query.symbolA,
      query.symbolB,
    );
    return { data, timestamp: new Date().toISOString() };
  }

  @Get('volume')
  @ApiOperation({
    summary: 'Ratio of effective buy prices for the same volume on both legs',
  })
  @ApiResponse({ status: 400, description: 'Insufficient order book depth' })
  async getVolumeRatio(
    @Query(queryPipe) query: VolumeRatioQueryDto,
  ): Promise<VolumeRatioResponseDto> {
    const data = await this.calculator.calculateVolumeRatio(
      query.name ?? `${query.symbolA}/${query.symbolB}`,
      query.symbolA,
      query.symbolB,
      query.volume,
    );
    return { data, timestamp: new Date().toISOString() };
  }
}
