import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  ArrayNotEmpty,
} from 'class-validator';
import { Transform, Type } from 'class-transformer';
import type { OrderSide } from '../../../common/types/index.js';

const SYMBOL_PATTERN = /^[A-Z0-9]+$/;

export class SimpleRatioQueryDto {
  @ApiProperty({ description: 'Numerator symbol', example: 'BTCUSDT' })
  @IsString()
  @Matches(SYMBOL_PATTERN)
  symbolA!: string;

  @ApiProperty({ description: 'Denominator symbol', example: 'ETHUSDT' })
  @IsString()
  @Matches(SYMBOL_PATTERN)
  symbolB!: string;

  @ApiPropertyOptional({ description: 'Label for the result (default A/B)' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  name?: string;
}

export class VolumeRatioQueryDto extends SimpleRatioQueryDto {
  @ApiProperty({ description: 'Quantity filled on each leg', example: 1 })
  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  volume!: number;
}

export class SlippageQueryDto {
  @ApiProperty({ example: 'BTCUSDT' })
  @IsString()
  @Matches(SYMBOL_PATTERN)
  symbol!: string;

  @ApiProperty({ example: 0.5 })
  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  volume!: number;

  @ApiPropertyOptional({ enum: ['buy', 'sell'], default: 'buy' })
  @IsOptional()
  @IsIn(['buy', 'sell'])
  side: OrderSide = 'buy';
}

export class PricesQueryDto {
  @ApiProperty({
    description: 'Comma-separated symbols',
    example: 'BTCUSDT,ETHUSDT',
    type: String,
  })
  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((s) => s.trim())
          .filter((s) => s.length > 0)
      : value,
  )
  @ArrayNotEmpty()
  @Matches(SYMBOL_PATTERN, { each: true })
  symbols!: string[];
}
