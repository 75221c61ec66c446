import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RatioPairsLoaderService } from './ratio-pairs-loader.service.js';

@Module({
  imports: [ConfigModule],
  providers: [RatioPairsLoaderService],
  exports: [RatioPairsLoaderService],
})
export class RatioPairsModule {}
