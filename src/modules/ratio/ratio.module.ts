import { Module } from '@nestjs/common';
import { ConnectorModule } from '../../connectors/connector.module.js';
import { RatioPairsModule } from '../ratio-pairs/ratio-pairs.module.js';
import { RatioCalculatorService } from './ratio-calculator.service.js';
import { RatioController } from './ratio.controller.js';
import { MarketController } from './market.controller.js';
import { PairsController } from './pairs.controller.js';

@Module({
  imports: [ConnectorModule, RatioPairsModule],
  controllers: [RatioController, MarketController, PairsController],
  providers: [RatioCalculatorService],
  exports: [RatioCalculatorService],
})
export class RatioModule {}
