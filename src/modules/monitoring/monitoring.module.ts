import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RatioModule } from '../ratio/ratio.module.js';
import { RatioPairsModule } from '../ratio-pairs/ratio-pairs.module.js';
import { TelegramNotifierService } from './telegram-notifier.service.js';
import { RatioMonitorService } from './ratio-monitor.service.js';
import { NotificationController } from './notification.controller.js';
import { NOTIFIER_TOKEN } from './monitoring.constants.js';

@Module({
  imports: [ConfigModule, RatioModule, RatioPairsModule],
  controllers: [NotificationController],
  providers: [
    TelegramNotifierService,
    { provide: NOTIFIER_TOKEN, useExisting: TelegramNotifierService },
    RatioMonitorService,
  ],
  exports: [NOTIFIER_TOKEN, RatioMonitorService],
})
export class MonitoringModule {}
