import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { LoggerModule } from 'nestjs-pino';
import { AppController } from './app.controller.js';
import { AppService } from './app.service.js';
import { PersistenceModule } from './common/persistence.module.js';
import { ConnectorModule } from './connectors/connector.module.js';
import { loggerConfig } from './common/config/logger.config.js';
import { RatioPairsModule } from './modules/ratio-pairs/ratio-pairs.module.js';
import { RatioModule } from './modules/ratio/ratio.module.js';
import { MonitoringModule } from './modules/monitoring/monitoring.module.js';
import { HistoryModule } from './modules/history/history.module.js';
import { BotModule } from './modules/bot/bot.module.js';
import { SystemErrorFilter } from './common/filters/system-error.filter.js';

@Module({
  imports: [
    // LoggerModule first so it replaces the default logger early
    LoggerModule.forRoot(loggerConfig),

    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env.${process.env.NODE_ENV || 'development'}`,
    }),
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
    }),
    ScheduleModule.forRoot(),
    PersistenceModule,
    ConnectorModule,
    RatioPairsModule,
    RatioModule,
    MonitoringModule,
    HistoryModule,
    BotModule,
  ],
  controllers: [AppController],
  providers: [AppService, { provide: APP_FILTER, useClass: SystemErrorFilter }],
})
export class AppModule {}
