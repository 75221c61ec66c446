import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PersistenceModule } from '../../common/persistence.module.js';
import { HistoryRecorderService } from './history-recorder.service.js';
import { HistoryService } from './history.service.js';
import { HistoryController } from './history.controller.js';

@Module({
  imports: [ConfigModule, PersistenceModule],
  controllers: [HistoryController],
  providers: [HistoryRecorderService, HistoryService],
  exports: [HistoryService],
})
export class HistoryModule {}
