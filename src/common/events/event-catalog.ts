/**
 * Centralized catalog of domain event names.
 *
 * Naming Convention:
 * - Event names: dot.notation.lowercase
 * - Constants: UPPER_SNAKE_CASE
 * - Event classes: PascalCase matching the action (e.g., RatioThresholdBreachedEvent)
 */
export const EVENT_NAMES = {
  /** Emitted after every successful pair check in the monitor loop */
  RATIO_SNAPSHOT_RECORDED: 'ratio.snapshot.recorded',

  /** Emitted once per (pair, threshold) until the next periodic reset */
  RATIO_THRESHOLD_BREACHED: 'ratio.threshold.breached',

  /** Emitted whenever a volume-based ratio is computed */
  RATIO_VOLUME_CALCULATED: 'ratio.volume.calculated',

  /** Emitted when the periodic digest fires (sent or suppressed) */
  MONITOR_DIGEST_COMPLETED: 'monitor.digest.completed',
} as const;

/**
 * Type-safe event name type derived from EVENT_NAMES object.
 */
export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
