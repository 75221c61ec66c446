import {
  Controller,
  Get,
  HttpException,
  HttpStatus,
  Param,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { MonitoredPair } from '../../common/types/index.js';
import { RatioPairsLoaderService } from '../ratio-pairs/ratio-pairs-loader.service.js';
import { RatioCalculatorService } from './ratio-calculator.service.js';
import { RATIO_ERROR_CODES } from './ratio-error-codes.js';
import {
  PairListResponseDto,
  SimpleRatioResponseDto,
  VolumeRatioResponseDto,
} from './dto/index.js';

@ApiTags('Pairs')
@Controller('pairs')
export class PairsController {
  constructor(
    private readonly pairsLoader: RatioPairsLoaderService,
    private readonly calculator: RatioCalculatorService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Configured monitored pairs' })
  getPairs(): PairListResponseDto {
    const data = this.pairsLoader.getPairs().map((pair) => ({ ...pair }));
    return { data, count: data.length, timestamp: new Date().toISOString() };
  }

  @Get(':name/ratio')
  @ApiOperation({ summary: 'Current spot ratio of a configured pair' })
  @ApiResponse({ status: 404, description: 'Unknown pair' })
  async getPairRatio(
    @Param('name') name: string,
  ): Promise<SimpleRatioResponseDto> {
    const pair = this.requirePair(name);
    const data = await this.calculator.calculateSimpleRatio(
      pair.name,
      pair.symbolA,
      pair.symbolB,
    );
    return { data, timestamp: new Date().toISOString() };
  }

  @Get(':name/volume-ratio')
  @ApiOperation({
    summary: 'Volume ratio of a configured pair at its analysisVolume',
  })
  @ApiResponse({ status: 400, description: 'Pair has no analysisVolume' })
  @ApiResponse({ status: 404, description: 'Unknown pair' })
  async getPairVolumeRatio(
    @Param('name') name: string,
  ): Promise<VolumeRatioResponseDto> {
    const pair = this.requirePair(name);
    if (pair.analysisVolume === undefined) {
      throw new HttpException(
        {
          error: {
            code: RATIO_ERROR_CODES.ANALYSIS_VOLUME_NOT_CONFIGURED,
            message: `Pair ${pair.name} has no analysisVolume configured`,
            severity: 'warning',
          },
          timestamp: new Date().toISOString(),
        },
        HttpStatus.BAD_REQUEST,
      );
    }

    const data = await this.calculator.calculateVolumeRatio(
      pair.name,
      pair.symbolA,
      pair.symbolB,
      pair.analysisVolume,
    );
    return { data, timestamp: new Date().toISOString() };
  }

  private requirePair(name: string): MonitoredPair {
    const pair = this.pairsLoader.findPair(name);
    if (!pair) {
      throw new HttpException(
        {
          error: {
            code: RATIO_ERROR_CODES.PAIR_NOT_FOUND,
            message: `Unknown pair: ${name}`,
            severity: 'warning',
          },
          timestamp: new Date().toISOString(),
        },
        HttpStatus.NOT_FOUND,
      );
    }
    return pair;
  }
}
