import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { DatabaseService } from '../../common/database.service.js';
import { EVENT_NAMES } from '../../common/events/event-catalog.js';
import type {
  RatioSnapshotRecordedEvent,
  RatioThresholdBreachedEvent,
  RatioVolumeCalculatedEvent,
} from '../../common/events/ratio.events.js';
import { RatioSnapshotRepository } from '../../persistence/repositories/ratio-snapshot.repository.js';
import { RatioAlertRepository } from '../../persistence/repositories/ratio-alert.repository.js';
import { VolumeRatioRepository } from '../../persistence/repositories/volume-ratio.repository.js';

type HistoryKind = 'snapshot' | 'alert' | 'volume_ratio';

/**
 * Writes monitor and calculator events to history. Failures are logged
 * and never reach the emitter.
 */
@Injectable()
export class HistoryRecorderService {
  private readonly logger = new Logger(HistoryRecorderService.name);

  constructor(
    private readonly db: DatabaseService,
    private readonly snapshots: RatioSnapshotRepository,
    private readonly alerts: RatioAlertRepository,
    private readonly volumeRatios: VolumeRatioRepository,
  ) {}

  @OnEvent(EVENT_NAMES.RATIO_SNAPSHOT_RECORDED, { async: true })
  async handleSnapshotRecorded(event: RatioSnapshotRecordedEvent): Promise<void> {
    await this.persist('snapshot', event.pairName, event.correlationId, () =>
      this.snapshots.create({
        pairName: event.pairName,
        symbolA: event.symbolA,
        symbolB: event.symbolB,
        priceA: event.priceA,
        priceB: event.priceB,
        ratio: event.ratio,
        timestamp: event.observedAt,
      }),
    );
  }

  @OnEvent(EVENT_NAMES.RATIO_THRESHOLD_BREACHED, { async: true })
  async handleThresholdBreached(event: RatioThresholdBreachedEvent): Promise<void> {
    await this.persist('alert', event.pairName, event.correlationId, () =>
      this.alerts.create({
        pairName: event.pairName,
        ratio: event.ratio,
        baselineRatio: event.baselineRatio,
        changePct: event.changePct,
        threshold: event.threshold,
        windowSecs: event.windowSecs,
        delivered: event.delivered,
        timestamp: event.timestamp,
      }),
    );
  }

  @OnEvent(EVENT_NAMES.RATIO_VOLUME_CALCULATED, { async: true })
  async handleVolumeCalculated(event: RatioVolumeCalculatedEvent): Promise<void> {
    await this.persist('volume_ratio', event.result.pairName, event.correlationId, () =>
      this.volumeRatios.create({ ...event.result }),
    );
  }

  private async persist(
    kind: HistoryKind,
    pairName: string,
    correlationId: string | undefined,
    write: () => Promise<void>,
  ): Promise<void> {
    if (!this.db.isConnected()) {
      return;
    }
    try {
      await write();
    } catch (error) {
      this.logger.error({
        message: 'History write failed',
        module: 'history',
        kind,
        pairName,
        correlationId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
