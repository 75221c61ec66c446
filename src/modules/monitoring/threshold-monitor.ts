import { FinancialMath } from '../../common/utils/index.js';
import type { RatioSnapshot } from '../../common/types/index.js';

/**
 * Rolling ratio history and alert debounce for every monitored pair.
 * Owned by exactly one RatioMonitorService and only mutated between ticks.
 */
export interface MonitorState {
  history: Map<string, RatioSnapshot[]>;
  /** Thresholds already alerted per pair since the last periodic reset */
  triggered: Map<string, Set<number>>;
  lastPeriodicFireAt: Date;
}

export interface ThresholdBreach {
  pairName: string;
  ratio: number;
  baselineRatio: number;
  changePct: number;
  threshold: number;
  windowSecs: number;
}

export function createMonitorState(startedAt: Date): MonitorState {
  return {
    history: new Map(),
    triggered: new Map(),
    lastPeriodicFireAt: startedAt,
  };
}

/**
 * Appends a snapshot and drops everything at or before now - 2 * window.
 * The double window keeps a baseline available despite tick jitter.
 */
export function recordSnapshot(
  state: MonitorState,
  pairName: string,
  snapshot: RatioSnapshot,
  windowSecs: number,
  now: Date,
): void {
  const cutoff = now.getTime() - windowSecs * 2 * 1000;
  const history = state.history.get(pairName) ?? [];
  history.push(snapshot);
  state.history.set(
    pairName,
    history.filter((s) => s.timestamp.getTime() > cutoff),
  );
}

/**
 * Oldest snapshot inside the window, else the oldest retained one.
 */
export function selectBaseline(
  history: readonly RatioSnapshot[],
  windowSecs: number,
  now: Date,
): RatioSnapshot | undefined {
  const windowStart = now.getTime() - windowSecs * 1000;
  return (
    history.find((s) => s.timestamp.getTime() >= windowStart) ?? history[0]
  );
}

/**
 * Compares `current` with the pair's baseline and returns one breach per
 * threshold newly crossed. Returned thresholds are marked triggered
 * immediately, whatever happens to the alert afterwards.
 */
export function evaluateThresholds(
  state: MonitorState,
  pairName: string,
  current: RatioSnapshot,
  thresholds: readonly number[],
  windowSecs: number,
  now: Date,
): ThresholdBreach[] {
  const baseline = selectBaseline(
    state.history.get(pairName) ?? [],
    windowSecs,
    now,
  );
  if (!baseline) {
    return [];
  }

  const changePct = FinancialMath.calculateChangePct(
    baseline.ratio,
    current.ratio,
  );
  const magnitude = changePct.abs();

  let triggered = state.triggered.get(pairName);
  const breaches: ThresholdBreach[] = [];
  for (const threshold of thresholds) {
    if (magnitude.lt(threshold) || triggered?.has(threshold)) {
      continue;
    }
    if (!triggered) {
      triggered = new Set();
      state.triggered.set(pairName, triggered);
    }
    triggered.add(threshold);
    breaches.push({
      pairName,
      ratio: current.ratio,
      baselineRatio: baseline.ratio,
      changePct: changePct.toNumber(),
      threshold,
      windowSecs,
    });
  }
  return breaches;
}

export function resetTriggeredThresholds(state: MonitorState): void {
  state.triggered.clear();
}

export function isPeriodicReportDue(
  state: MonitorState,
  periodSecs: number,
  now: Date,
): boolean {
  return now.getTime() - state.lastPeriodicFireAt.getTime() >= periodSecs * 1000;
}
