import { ApiProperty } from '@nestjs/swagger';
import type {
  RatioAlertRecord,
  RatioSnapshotRecord,
  VolumeRatioRecord,
} from '../../../persistence/models/index.js';
import type { PairStats } from '../history.service.js';

export class RatioSnapshotDto implements RatioSnapshotRecord {
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

  @ApiProperty()
  ratio!: number;

  @ApiProperty()
  timestamp!: Date;
}

export class RatioAlertDto implements RatioAlertRecord {
  @ApiProperty()
  pairName!: string;

  @ApiProperty()
  ratio!: number;

  @ApiProperty()
  baselineRatio!: number;

  @ApiProperty({ description: 'Signed change from baseline (%)' })
  changePct!: number;

  @ApiProperty()
  threshold!: number;

  @ApiProperty()
  windowSecs!: number;

  @ApiProperty({ description: 'Whether the notification was accepted' })
  delivered!: boolean;

  @ApiProperty()
  timestamp!: Date;
}

export class VolumeRatioRecordDto implements VolumeRatioRecord {
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

  @ApiProperty()
  slippageA!: number;

  @ApiProperty()
  slippageB!: number;

  @ApiProperty()
  ratio!: number;

  @ApiProperty()
  timestamp!: Date;
}

export class PairStatsDto implements PairStats {
  @ApiProperty()
  pairName!: string;

  @ApiProperty()
  hours!: number;

  @ApiProperty()
  count!: number;

  @ApiProperty({ type: Number, nullable: true })
  min!: number | null;

  @ApiProperty({ type: Number, nullable: true })
  max!: number | null;

  @ApiProperty({ type: Number, nullable: true })
  avg!: number | null;

  @ApiProperty({ type: Number, nullable: true, description: '(max - min) / min * 100' })
  rangePct!: number | null;
}

export class RatioHistoryResponseDto {
  @ApiProperty({ type: [RatioSnapshotDto] })
  data!: RatioSnapshotDto[];

  @ApiProperty({ description: 'Number of items' })
  count!: number;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export class AlertHistoryResponseDto {
  @ApiProperty({ type: [RatioAlertDto] })
  data!: RatioAlertDto[];

  @ApiProperty({ description: 'Number of items' })
  count!: number;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export class VolumeRatioHistoryResponseDto {
  @ApiProperty({ type: [VolumeRatioRecordDto] })
  data!: VolumeRatioRecordDto[];

  @ApiProperty({ description: 'Number of items' })
  count!: number;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export class PairStatsResponseDto {
  @ApiProperty({ type: PairStatsDto })
  data!: PairStatsDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}
