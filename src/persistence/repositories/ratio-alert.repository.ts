import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../common/database.service.js';
import type { RatioAlertRecord } from '../models/index.js';

@Injectable()
export class RatioAlertRepository {
  constructor(private readonly db: DatabaseService) {}

  async create(data: RatioAlertRecord): Promise<void> {
    await this.db.ratioAlerts.create(data);
  }

  async findByPair(
    pairName: string,
    limit: number = 50,
  ): Promise<RatioAlertRecord[]> {
    return this.db.ratioAlerts
      .find({ pairName })
      .sort({ timestamp: -1 })
      .limit(limit)
      .lean<RatioAlertRecord[]>()
      .exec();
  }

  async findRecent(limit: number = 50): Promise<RatioAlertRecord[]> {
    return this.db.ratioAlerts
      .find()
      .sort({ timestamp: -1 })
      .limit(limit)
      .lean<RatioAlertRecord[]>()
      .exec();
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const result = await this.db.ratioAlerts
      .deleteMany({ timestamp: { $lt: cutoff } })
      .exec();
    return result.deletedCount;
  }
}
