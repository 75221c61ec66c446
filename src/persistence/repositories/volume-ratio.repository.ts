import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../common/database.service.js';
import type { VolumeRatioRecord } from '../models/index.js';

@Injectable()
export class VolumeRatioRepository {
  constructor(private readonly db: DatabaseService) {}

  async create(data: VolumeRatioRecord): Promise<void> {
    await this.db.volumeRatios.create(data);
  }

  async findByPair(
    pairName: string,
    limit: number = 100,
  ): Promise<VolumeRatioRecord[]> {
    return this.db.volumeRatios
      .find({ pairName })
      .sort({ timestamp: -1 })
      .limit(limit)
      .lean<VolumeRatioRecord[]>()
      .exec();
  }
}
