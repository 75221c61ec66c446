import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BinanceConnector } from './binance/binance.connector.js';
import { MARKET_DATA_PROVIDER_TOKEN } from './connector.constants.js';

@Module({
  imports: [ConfigModule],
  providers: [
    BinanceConnector,
    { provide: MARKET_DATA_PROVIDER_TOKEN, useExisting: BinanceConnector },
  ],
  exports: [MARKET_DATA_PROVIDER_TOKEN],
})
export class ConnectorModule {}
