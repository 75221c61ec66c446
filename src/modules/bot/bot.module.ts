import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RatioModule } from '../ratio/ratio.module.js';
import { RatioPairsModule } from '../ratio-pairs/ratio-pairs.module.js';
import { TelegramBotApiService } from './telegram-bot-api.service.js';
import { BotUpdateHandlerService } from './bot-update-handler.service.js';
import { TelegramBotService } from './telegram-bot.service.js';

@Module({
  imports: [ConfigModule, RatioModule, RatioPairsModule],
  providers: [TelegramBotApiService, BotUpdateHandlerService, TelegramBotService],
  exports: [TelegramBotService],
})
export class BotModule {}
