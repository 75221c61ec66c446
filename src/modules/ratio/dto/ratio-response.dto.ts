import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import type {
  OrderSide,
  SimpleRatio,
  SlippageAnalysis,
  VolumeRatio,
} from '../../../common/types/index.js';

export class SimpleRatioDto implements SimpleRatio {
  @ApiProperty()
  pairName!: string;

  @ApiProperty()
  symbolA!: string;

  @ApiProperty()
  symbolB!: string;

  @ApiProperty()
  priceA!: number;

  @ApiProperty()
  priceB!: number;

  @ApiProperty({ description: 'priceA / priceB' })
  ratio!: number;

  @ApiProperty()
  timestamp!: Date;
}

export class VolumeRatioDto implements VolumeRatio {
  @ApiProperty()
  pairName!: string;

  @ApiProperty()
  symbolA!: string;

  @ApiProperty()
  symbolB!: string;

  @ApiProperty()
  volume!: number;

  @ApiProperty()
  effectivePriceA!: number;

  @ApiProperty()
  effectivePriceB!: number;

  @ApiProperty({ description: 'Slippage of leg A (%)' })
  slippageA!: number;

  @ApiProperty({ description: 'Slippage of leg B (%)' })
  slippageB!: number;

  @ApiProperty({ description: 'effectivePriceA / effectivePriceB' })
  ratio!: number;

  @ApiProperty()
  timestamp!: Date;
}

export class SlippageAnalysisDto implements SlippageAnalysis {
  @ApiProperty()
  symbol!: string;

  @ApiProperty({ enum: ['buy', 'sell'] })
  side!: OrderSide;

  @ApiProperty()
  volume!: number;

  @ApiProperty({ description: '(bestBid + bestAsk) / 2' })
  midPrice!: number;

  @ApiProperty()
  bestPrice!: number;

  @ApiProperty()
  effectivePrice!: number;

  @ApiProperty()
  slippagePct!: number;

  @ApiProperty({ description: 'Order book levels touched by the fill' })
  depthConsumed!: number;

  @ApiProperty({ description: 'effectivePrice * volume' })
  totalCost!: number;

  @ApiProperty()
  timestamp!: Date;
}

export class PriceOutcomeDto {
  @ApiProperty()
  symbol!: string;

  @ApiPropertyOptional({ description: 'Present when the fetch succeeded' })
  price?: number;

  @ApiPropertyOptional({ description: 'Present when the fetch failed' })
  error?: string;
}

export class PairDto {
  @ApiProperty()
  name!: string;

  @ApiProperty()
  symbolA!: string;

  @ApiProperty()
  symbolB!: string;

  @ApiPropertyOptional()
  analysisVolume?: number;
}

export class SimpleRatioResponseDto {
  @ApiProperty({ type: SimpleRatioDto })
  data!: SimpleRatioDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export class VolumeRatioResponseDto {
  @ApiProperty({ type: VolumeRatioDto })
  data!: VolumeRatioDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export class SlippageResponseDto {
  @ApiProperty({ type: SlippageAnalysisDto })
  data!: SlippageAnalysisDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export class PriceListResponseDto {
  @ApiProperty({ type: [PriceOutcomeDto] })
  data!: PriceOutcomeDto[];

  @ApiProperty({ description: 'Number of items' })
  count!: number;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export class PairListResponseDto {
  @ApiProperty({ type: [PairDto] })
  data!: PairDto[];

  @ApiProperty({ description: 'Number of items' })
  count!: number;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}
