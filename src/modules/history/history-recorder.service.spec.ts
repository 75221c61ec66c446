import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Logger } from '@nestjs/common';
import { HistoryRecorderService } from './history-recorder.service.js';
import { DatabaseService } from '../../common/database.service.js';
import { RatioSnapshotRepository } from '../../persistence/repositories/ratio-snapshot.repository.js';
import { RatioAlertRepository } from '../../persistence/repositories/ratio-alert.repository.js';
import { VolumeRatioRepository } from '../../persistence/repositories/volume-ratio.repository.js';
import {
  RatioSnapshotRecordedEvent,
  RatioThresholdBreachedEvent,
  RatioVolumeCalculatedEvent,
} from '../../common/events/ratio.events.js';

describe('HistoryRecorderService', () => {
  let recorder: HistoryRecorderService;
  let connected: boolean;
  let snapshots: { create: ReturnType<typeof vi.fn> };
  let alerts: { create: ReturnType<typeof vi.fn> };
  let volumeRatios: { create: ReturnType<typeof vi.fn> };

  const observedAt = new Date('2026-03-01T12:00:00.000Z');
  const snapshotEvent = new RatioSnapshotRecordedEvent(
    'BTC-ETH',
    'BTCUSDT',
    'ETHUSDT',
    50000,
    2500,
    20,
    observedAt,
    'corr-1',
  );

  beforeEach(() => {
    connected = true;
    snapshots = { create: vi.fn().mockResolvedValue(undefined) };
    alerts = { create: vi.fn().mockResolvedValue(undefined) };
    volumeRatios = { create: vi.fn().mockResolvedValue(undefined) };
    vi.spyOn(Logger.prototype, 'error').mockImplementation(() => {});
    recorder = new HistoryRecorderService(
      { isConnected: () => connected } as unknown as DatabaseService,
      snapshots as unknown as RatioSnapshotRepository,
      alerts as unknown as RatioAlertRepository,
      volumeRatios as unknown as VolumeRatioRepository,
    );
  });

  it('should store a snapshot with its observation time', async () => {
    await recorder.handleSnapshotRecorded(snapshotEvent);

    expect(snapshots.create).toHaveBeenCalledWith({
      pairName: 'BTC-ETH',
      symbolA: 'BTCUSDT',
      symbolB: 'ETHUSDT',
      priceA: 50000,
      priceB: 2500,
      ratio: 20,
      timestamp: observedAt,
    });
  });

  it('should store an alert with its delivery outcome', async () => {
    const event = new RatioThresholdBreachedEvent(
      'BTC-ETH',
      21.2,
      20,
      6,
      5,
      300,
      false,
      'corr-2',
    );

    await recorder.handleThresholdBreached(event);

    expect(alerts.create).toHaveBeenCalledWith({
      pairName: 'BTC-ETH',
      ratio: 21.2,
      baselineRatio: 20,
      changePct: 6,
      threshold: 5,
      windowSecs: 300,
      delivered: false,
      timestamp: event.timestamp,
    });
  });

  it('should store a volume ratio result', async () => {
    const result = {
      pairName: 'BTC-ETH',
      symbolA: 'BTCUSDT',
      symbolB: 'ETHUSDT',
      volume: 1,
      effectivePriceA: 50010,
      effectivePriceB: 2501,
      slippageA: 0.02,
      slippageB: 0.04,
      ratio: 19.996,
      timestamp: observedAt,
    };

    await recorder.handleVolumeCalculated(new RatioVolumeCalculatedEvent(result));

    expect(volumeRatios.create).toHaveBeenCalledWith(result);
  });

  it('should skip writes while the database is disconnected', async () => {
    connected = false;

    await recorder.handleSnapshotRecorded(snapshotEvent);

    expect(snapshots.create).not.toHaveBeenCalled();
  });

  it('should log and swallow write failures', async () => {
    snapshots.create.mockRejectedValue(new Error('write conflict'));

    await expect(recorder.handleSnapshotRecorded(snapshotEvent)).resolves.toBeUndefined();
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      expect.objectContaining({
        message: 'History write failed',
        kind: 'snapshot',
        pairName: 'BTC-ETH',
        correlationId: 'corr-1',
        error: 'write conflict',
      }),
    );
  });
});
