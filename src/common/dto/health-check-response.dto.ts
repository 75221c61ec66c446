import { ApiProperty } from '@nestjs/swagger';

export type DatabaseStatus = 'connected' | 'disabled';

export class HealthStatusDto {
  @ApiProperty({ example: 'ok' })
  status!: string;

  @ApiProperty({ example: 'pair-ratio-monitor' })
  service!: string;

  @ApiProperty({
    enum: ['connected', 'disabled'],
    description: 'disabled when no MONGODB_URI is configured',
  })
  database!: DatabaseStatus;
}

export class HealthCheckResponseDto {
  @ApiProperty({ type: HealthStatusDto })
  data!: HealthStatusDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}
