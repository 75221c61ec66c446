import { Controller, HttpCode, Inject, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { INotifier } from '../../common/interfaces/index.js';
import { NOTIFIER_TOKEN } from './monitoring.constants.js';
import { NotificationTestResponseDto } from './dto/notification-test-response.dto.js';

@ApiTags('Notifications')
@Controller('notifications')
export class NotificationController {
  constructor(
    @Inject(NOTIFIER_TOKEN)
    private readonly notifier: INotifier,
  ) {}

  @Post('test')
  @HttpCode(200)
  @ApiOperation({ summary: 'Send a connection test message' })
  @ApiResponse({ status: 400, description: 'Notifier not configured or rate limited' })
  async sendTest(): Promise<NotificationTestResponseDto> {
    await this.notifier.testConnection();
    return { data: { sent: true }, timestamp: new Date().toISOString() };
  }
}
