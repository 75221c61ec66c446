import {
  Inject,
  Injectable,
  Logger,
  type OnApplicationBootstrap,
  type OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { SchedulerRegistry } from '@nestjs/schedule';
import type { INotifier } from '../../common/interfaces/index.js';
import type { MonitoredPair, SimpleRatio } from '../../common/types/index.js';
import {
  SystemHealthError,
  SYSTEM_HEALTH_ERROR_CODES,
} from '../../common/errors/index.js';
import { EVENT_NAMES } from '../../common/events/event-catalog.js';
import {
  MonitorDigestCompletedEvent,
  RatioSnapshotRecordedEvent,
  RatioThresholdBreachedEvent,
} from '../../common/events/ratio.events.js';
import {
  getCorrelationId,
  withCorrelationId,
} from '../../common/services/correlation-context.js';
import { RatioCalculatorService } from '../ratio/ratio-calculator.service.js';
import { RatioPairsLoaderService } from '../ratio-pairs/ratio-pairs-loader.service.js';
import {
  formatPeriodicDigest,
  formatRatioAlert,
} from './formatters/telegram-message.formatter.js';
import { loadMonitorSettings, type MonitorSettings } from './monitoring-settings.js';
import { MONITOR_TICK_INTERVAL, NOTIFIER_TOKEN } from './monitoring.constants.js';
import {
  createMonitorState,
  evaluateThresholds,
  isPeriodicReportDue,
  recordSnapshot,
  resetTriggeredThresholds,
  type MonitorState,
  type ThresholdBreach,
} from './threshold-monitor.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Single scheduling authority for ratio monitoring. Each tick checks every
 * pair in turn, then runs the periodic digest check. Ticks never overlap,
 * so MonitorState has exactly one writer.
 */
@Injectable()
export class RatioMonitorService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(RatioMonitorService.name);
  private readonly settings: MonitorSettings;
  private state: MonitorState | null = null;
  private tickInProgress = false;

  constructor(
    configService: ConfigService,
    private readonly pairsLoader: RatioPairsLoaderService,
    private readonly calculator: RatioCalculatorService,
    @Inject(NOTIFIER_TOKEN)
    private readonly notifier: INotifier,
    private readonly eventEmitter: EventEmitter2,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {
    this.settings = loadMonitorSettings(configService);
  }

  async onApplicationBootstrap(): Promise<void> {
    if (!this.settings.enabled) {
      this.logger.log({
        message: 'Ratio monitor disabled (MONITOR_ENABLED=false)',
        module: 'monitoring',
      });
      return;
    }
    await this.start();
  }

  onApplicationShutdown(): void {
    if (this.schedulerRegistry.doesExist('interval', MONITOR_TICK_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(MONITOR_TICK_INTERVAL);
      this.logger.log({ message: 'Ratio monitor stopped', module: 'monitoring' });
    }
  }

  isRunning(): boolean {
    return this.state !== null;
  }

  /**
   * Probes the notification channel, registers the tick interval and runs
   * the first check right away. A failed probe is fatal.
   */
  async start(): Promise<void> {
    try {
      await this.notifier.testConnection();
    } catch (error) {
      throw new SystemHealthError(
        SYSTEM_HEALTH_ERROR_CODES.STARTUP_PROBE_FAILED,
        `Notification channel probe failed: ${errorMessage(error)}`,
        'critical',
        'monitoring',
      );
    }

    this.state = createMonitorState(new Date());
    const interval = setInterval(() => {
      void this.runTick();
    }, this.settings.checkIntervalSecs * 1000);
    this.schedulerRegistry.addInterval(MONITOR_TICK_INTERVAL, interval);

    this.logger.log({
      message: 'Ratio monitor started',
      module: 'monitoring',
      pairCount: this.pairsLoader.getPairs().length,
      checkIntervalSecs: this.settings.checkIntervalSecs,
      periodicNotificationSecs: this.settings.periodicNotificationSecs,
      changeThresholds: this.settings.changeThresholds,
      changeWindowSecs: this.settings.changeWindowSecs,
    });

    await this.runTick();
  }

  private async runTick(): Promise<void> {
    try {
      await this.tick();
    } catch (error) {
      this.logger.error({
        message: 'Monitor tick failed',
        module: 'monitoring',
        error: errorMessage(error),
      });
    }
  }

  async tick(): Promise<void> {
    const state = this.state;
    if (!state) {
      return;
    }
    if (this.tickInProgress) {
      this.logger.debug({
        message: 'Skipping monitor tick - previous tick still in progress',
        module: 'monitoring',
        reason: 'tick_in_progress',
      });
      return;
    }

    this.tickInProgress = true;
    try {
      await withCorrelationId(async () => {
        for (const pair of this.pairsLoader.getPairs()) {
          try {
            await this.checkPair(state, pair);
          } catch (error) {
            this.logger.error({
              message: 'Pair check failed',
              module: 'monitoring',
              correlationId: getCorrelationId(),
              pairName: pair.name,
              error: errorMessage(error),
            });
          }
        }
        await this.runPeriodicReport(state);
      });
    } finally {
      this.tickInProgress = false;
    }
  }

  private async checkPair(state: MonitorState, pair: MonitoredPair): Promise<void> {
    const ratio = await this.calculator.calculateSimpleRatio(
      pair.name,
      pair.symbolA,
      pair.symbolB,
    );
    const now = new Date();
    const snapshot = { ratio: ratio.ratio, timestamp: ratio.timestamp };

    recordSnapshot(state, pair.name, snapshot, this.settings.changeWindowSecs, now);
    this.logger.debug({
      message: 'Pair checked',
      module: 'monitoring',
      correlationId: getCorrelationId(),
      pairName: pair.name,
      ratio: ratio.ratio,
    });
    this.eventEmitter.emit(
      EVENT_NAMES.RATIO_SNAPSHOT_RECORDED,
      new RatioSnapshotRecordedEvent(
        pair.name,
        pair.symbolA,
        pair.symbolB,
        ratio.priceA,
        ratio.priceB,
        ratio.ratio,
        ratio.timestamp,
      ),
    );

    const breaches = evaluateThresholds(
      state,
      pair.name,
      snapshot,
      this.settings.changeThresholds,
      this.settings.changeWindowSecs,
      now,
    );
    for (const breach of breaches) {
      await this.sendAlert(breach, now);
    }
  }

  /** At most once: the threshold stays triggered even if delivery fails. */
  private async sendAlert(breach: ThresholdBreach, now: Date): Promise<void> {
    this.logger.log({
      message: 'Ratio threshold breached',
      module: 'monitoring',
      correlationId: getCorrelationId(),
      pairName: breach.pairName,
      changePct: breach.changePct,
      threshold: breach.threshold,
    });

    let delivered = true;
    try {
      await this.notifier.send(formatRatioAlert({ ...breach, timestamp: now }));
    } catch (error) {
      delivered = false;
      this.logger.error({
        message: 'Ratio alert delivery failed',
        module: 'monitoring',
        correlationId: getCorrelationId(),
        pairName: breach.pairName,
        threshold: breach.threshold,
        error: errorMessage(error),
      });
    }

    this.eventEmitter.emit(
      EVENT_NAMES.RATIO_THRESHOLD_BREACHED,
      new RatioThresholdBreachedEvent(
        breach.pairName,
        breach.ratio,
        breach.baselineRatio,
        breach.changePct,
        breach.threshold,
        breach.windowSecs,
        delivered,
      ),
    );
  }

  /**
   * Recomputes every pair, sends one digest and clears all debounce state.
   * Failed pairs are left out; nothing is sent when every pair fails.
   */
  private async runPeriodicReport(state: MonitorState): Promise<void> {
    const now = new Date();
    if (!isPeriodicReportDue(state, this.settings.periodicNotificationSecs, now)) {
      return;
    }

    const ratios: SimpleRatio[] = [];
    let failed = 0;
    for (const pair of this.pairsLoader.getPairs()) {
      try {
        ratios.push(
          await this.calculator.calculateSimpleRatio(
            pair.name,
            pair.symbolA,
            pair.symbolB,
          ),
        );
      } catch (error) {
        failed++;
        this.logger.error({
          message: 'Digest ratio calculation failed',
          module: 'monitoring',
          correlationId: getCorrelationId(),
          pairName: pair.name,
          error: errorMessage(error),
        });
      }
    }

    let sent = false;
    if (ratios.length > 0) {
      try {
        await this.notifier.send(formatPeriodicDigest(ratios, now));
        sent = true;
      } catch (error) {
        this.logger.error({
          message: 'Periodic digest delivery failed',
          module: 'monitoring',
          correlationId: getCorrelationId(),
          error: errorMessage(error),
        });
      }
    } else {
      this.logger.warn({
        message: 'Periodic digest suppressed - no pair could be computed',
        module: 'monitoring',
        correlationId: getCorrelationId(),
        pairsFailed: failed,
      });
    }

    state.lastPeriodicFireAt = now;
    resetTriggeredThresholds(state);

    this.logger.log({
      message: 'Periodic report completed',
      module: 'monitoring',
      correlationId: getCorrelationId(),
      pairsReported: ratios.length,
      pairsFailed: failed,
      sent,
    });
    this.eventEmitter.emit(
      EVENT_NAMES.MONITOR_DIGEST_COMPLETED,
      new MonitorDigestCompletedEvent(ratios.length, failed, sent),
    );
  }
}
