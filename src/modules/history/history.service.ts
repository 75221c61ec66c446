import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import { DatabaseService } from '../../common/database.service.js';
import {
  ConfigValidationError,
  SystemHealthError,
  SYSTEM_HEALTH_ERROR_CODES,
} from '../../common/errors/index.js';
import {
  getCorrelationId,
  withCorrelationId,
} from '../../common/services/correlation-context.js';
import { FinancialMath } from '../../common/utils/index.js';
import type {
  RatioAlertRecord,
  RatioSnapshotRecord,
  VolumeRatioRecord,
} from '../../persistence/models/index.js';
import { RatioSnapshotRepository } from '../../persistence/repositories/ratio-snapshot.repository.js';
import { RatioAlertRepository } from '../../persistence/repositories/ratio-alert.repository.js';
import { VolumeRatioRepository } from '../../persistence/repositories/volume-ratio.repository.js';

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

/** Figures are null when the period holds no snapshots. */
export interface PairStats {
  pairName: string;
  hours: number;
  count: number;
  min: number | null;
  max: number | null;
  avg: number | null;
  /** (max - min) / min * 100 */
  rangePct: number | null;
}

function parseRetentionDays(raw: string | number | undefined): number | null {
  if (raw === undefined || String(raw).trim() === '') {
    return null;
  }
  const days = Number(raw);
  if (!Number.isInteger(days) || days < 1) {
    throw new ConfigValidationError('History config validation failed', [
      `HISTORY_RETENTION_DAYS must be an integer >= 1 (got "${String(raw)}")`,
    ]);
  }
  return days;
}

@Injectable()
export class HistoryService {
  private readonly logger = new Logger(HistoryService.name);
  private readonly retentionDays: number | null;

  constructor(
    configService: ConfigService,
    private readonly db: DatabaseService,
    private readonly snapshots: RatioSnapshotRepository,
    private readonly alerts: RatioAlertRepository,
    private readonly volumeRatios: VolumeRatioRepository,
  ) {
    this.retentionDays = parseRetentionDays(
      configService.get<string | number>('HISTORY_RETENTION_DAYS'),
    );
  }

  async getRatioHistory(
    pairName: string,
    limit: number = 100,
  ): Promise<RatioSnapshotRecord[]> {
    this.assertConnected();
    return this.snapshots.findByPair(pairName, limit);
  }

  async getRatioHistoryInRange(
    pairName: string,
    from: Date,
    to: Date,
  ): Promise<RatioSnapshotRecord[]> {
    this.assertConnected();
    return this.snapshots.findInRange(pairName, from, to);
  }

  /** Alerts for one pair, or for every pair when `pairName` is omitted. */
  async getAlertHistory(
    pairName?: string,
    limit: number = 50,
  ): Promise<RatioAlertRecord[]> {
    this.assertConnected();
    return pairName === undefined
      ? this.alerts.findRecent(limit)
      : this.alerts.findByPair(pairName, limit);
  }

  async getVolumeRatioHistory(
    pairName: string,
    limit: number = 100,
  ): Promise<VolumeRatioRecord[]> {
    this.assertConnected();
    return this.volumeRatios.findByPair(pairName, limit);
  }

  async getPairStats(pairName: string, hours: number = 24): Promise<PairStats> {
    this.assertConnected();
    const since = new Date(Date.now() - hours * HOUR_MS);
    const aggregate = await this.snapshots.aggregateSince(pairName, since);

    if (!aggregate || aggregate.count === 0) {
      return {
        pairName,
        hours,
        count: 0,
        min: null,
        max: null,
        avg: null,
        rangePct: null,
      };
    }

    return {
      pairName,
      hours,
      count: aggregate.count,
      min: aggregate.min,
      max: aggregate.max,
      avg: aggregate.avg,
      rangePct: FinancialMath.calculateChangePct(
        aggregate.min,
        aggregate.max,
      ).toNumber(),
    };
  }

  /**
   * Daily retention sweep. No-op unless HISTORY_RETENTION_DAYS is set and
   * the database is connected.
   */
  @Cron('0 0 * * *', { timeZone: 'UTC' })
  async pruneExpiredHistory(): Promise<void> {
    const retentionDays = this.retentionDays;
    if (retentionDays === null || !this.db.isConnected()) {
      return;
    }

    await withCorrelationId(async () => {
      const cutoff = new Date(Date.now() - retentionDays * DAY_MS);
      try {
        const snapshotsDeleted = await this.snapshots.deleteOlderThan(cutoff);
        const alertsDeleted = await this.alerts.deleteOlderThan(cutoff);
        this.logger.log({
          message: 'Expired history pruned',
          module: 'history',
          correlationId: getCorrelationId(),
          cutoff: cutoff.toISOString(),
          snapshotsDeleted,
          alertsDeleted,
        });
      } catch (error) {
        this.logger.error({
          message: 'History retention sweep failed',
          module: 'history',
          correlationId: getCorrelationId(),
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });
  }

  private assertConnected(): void {
    if (!this.db.isConnected()) {
      throw new SystemHealthError(
        SYSTEM_HEALTH_ERROR_CODES.DATABASE_FAILURE,
        'History database is not connected',
        'error',
        'database',
      );
    }
  }
}
