import { ApiProperty } from '@nestjs/swagger';

export class NotificationTestResultDto {
  @ApiProperty()
  sent!: boolean;
}

export class NotificationTestResponseDto {
  @ApiProperty({ type: NotificationTestResultDto })
  data!: NotificationTestResultDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}
