import { BaseEvent } from './base.event.js';
import type { VolumeRatio } from '../types/index.js';

export class RatioSnapshotRecordedEvent extends BaseEvent {
  constructor(
    public readonly pairName: string,
    public readonly symbolA: string,
    public readonly symbolB: string,
    public readonly priceA: number,
    public readonly priceB: number,
    public readonly ratio: number,
    public readonly observedAt: Date,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export class RatioThresholdBreachedEvent extends BaseEvent {
  constructor(
    public readonly pairName: string,
    public readonly ratio: number,
    public readonly baselineRatio: number,
    public readonly changePct: number,
    public readonly threshold: number,
    public readonly windowSecs: number,
    /** False when the notification channel rejected the alert */
    public readonly delivered: boolean,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export class RatioVolumeCalculatedEvent extends BaseEvent {
  constructor(
    public readonly result: VolumeRatio,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export class MonitorDigestCompletedEvent extends BaseEvent {
  constructor(
    public readonly pairsReported: number,
    public readonly pairsFailed: number,
    public readonly sent: boolean,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
