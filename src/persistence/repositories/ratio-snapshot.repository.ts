import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../common/database.service.js';
import type { RatioSnapshotRecord } from '../models/index.js';

export interface RatioAggregate {
  count: number;
  min: number;
  max: number;
  avg: number;
}

@Injectable()
export class RatioSnapshotRepository {
  constructor(private readonly db: DatabaseService) {}

  async create(data: RatioSnapshotRecord): Promise<void> {
    await this.db.ratioSnapshots.create(data);
  }

  /** Newest first. */
  async findByPair(
    pairName: string,
    limit: number = 100,
  ): Promise<RatioSnapshotRecord[]> {
    return this.db.ratioSnapshots
      .find({ pairName })
      .sort({ timestamp: -1 })
      .limit(limit)
      .lean<RatioSnapshotRecord[]>()
      .exec();
  }

  /** Oldest first, both bounds inclusive. */
  async findInRange(
    pairName: string,
    from: Date,
    to: Date,
  ): Promise<RatioSnapshotRecord[]> {
    return this.db.ratioSnapshots
      .find({ pairName, timestamp: { $gte: from, $lte: to } })
      .sort({ timestamp: 1 })
      .lean<RatioSnapshotRecord[]>()
      .exec();
  }

  /** Null when no snapshot exists since `since`. */
  async aggregateSince(
    pairName: string,
    since: Date,
  ): Promise<RatioAggregate | null> {
    const [row] = await this.db.ratioSnapshots
      .aggregate<RatioAggregate>([
        { $match: { pairName, timestamp: { $gte: since } } },
        {
          $group: {
            _id: null,
            count: { $sum: 1 },
            min: { $min: '$ratio' },
            max: { $max: '$ratio' },
            avg: { $avg: '$ratio' },
          },
        },
        { $project: { _id: 0, count: 1, min: 1, max: 1, avg: 1 } },
      ])
      .exec();
    return row ?? null;
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const result = await this.db.ratioSnapshots
      .deleteMany({ timestamp: { $lt: cutoff } })
      .exec();
    return result.deletedCount;
  }
}
