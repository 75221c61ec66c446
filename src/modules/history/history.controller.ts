import { Controller, Get, Param, Query, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { HistoryService } from './history.service.js';
import {
  AlertHistoryQueryDto,
  AlertHistoryResponseDto,
  PairStatsQueryDto,
  PairStatsResponseDto,
  RatioHistoryQueryDto,
  RatioHistoryResponseDto,
  VolumeRatioHistoryResponseDto,
} from './dto/index.js';

const queryPipe = new ValidationPipe({ whitelist: true, transform: true });

@ApiTags('History')
@Controller()
export class HistoryController {
  constructor(private readonly historyService: HistoryService) {}

  @Get('history/:pair')
  @ApiOperation({
    summary: 'Recorded ratios of a pair, newest first or within a range',
  })
  @ApiResponse({ status: 500, description: 'History database not connected' })
  async getRatioHistory(
    @Param('pair') pair: string,
    @Query(queryPipe) query: RatioHistoryQueryDto,
  ): Promise<RatioHistoryResponseDto> {
    const data =
      query.from !== undefined || query.to !== undefined
        ? await this.historyService.getRatioHistoryInRange(
            pair,
            new Date(query.from ?? 0),
            query.to !== undefined ? new Date(query.to) : new Date(),
          )
        : await this.historyService.getRatioHistory(pair, query.limit);
    return { data, count: data.length, timestamp: new Date().toISOString() };
  }

  @Get('history/:pair/volume-ratios')
  @ApiOperation({ summary: 'Recorded volume ratios of a pair, newest first' })
  async getVolumeRatioHistory(
    @Param('pair') pair: string,
    @Query(queryPipe) query: RatioHistoryQueryDto,
  ): Promise<VolumeRatioHistoryResponseDto> {
    const data = await this.historyService.getVolumeRatioHistory(pair, query.limit);
    return { data, count: data.length, timestamp: new Date().toISOString() };
  }

  @Get('alerts')
  @ApiOperation({ summary: 'Threshold alerts, newest first' })
  async getAlerts(
    @Query(queryPipe) query: AlertHistoryQueryDto,
  ): Promise<AlertHistoryResponseDto> {
    const data = await this.historyService.getAlertHistory(query.pair, query.limit);
    return { data, count: data.length, timestamp: new Date().toISOString() };
  }

  @Get('stats/:pair')
  @ApiOperation({ summary: 'Ratio statistics over the last N hours' })
  async getPairStats(
    @Param('pair') pair: string,
    @Query(queryPipe) query: PairStatsQueryDto,
  ): Promise<PairStatsResponseDto> {
    const data = await this.historyService.getPairStats(pair, query.hours);
    return { data, timestamp: new Date().toISOString() };
  }
}
