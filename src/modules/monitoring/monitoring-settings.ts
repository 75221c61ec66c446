import type { ConfigService } from '@nestjs/config';
import { ConfigValidationError } from '../../common/errors/index.js';

export interface MonitorSettings {
  enabled: boolean;
  checkIntervalSecs: number;
  periodicNotificationSecs: number;
  /** Percent magnitudes, ascending */
  changeThresholds: number[];
  changeWindowSecs: number;
}

export const DEFAULT_MONITOR_SETTINGS: Readonly<MonitorSettings> = {
  enabled: true,
  checkIntervalSecs: 60,
  periodicNotificationSecs: 3600,
  changeThresholds: [5, 10, 15, 20],
  changeWindowSecs: 300,
};

function readRaw(config: ConfigService, key: string): string | undefined {
  const value = config.get<string | number | boolean>(key);
  if (value === undefined || value === null) {
    return undefined;
  }
  const text = String(value).trim();
  return text === '' ? undefined : text;
}

/**
 * Reads MONITOR_* settings. Every invalid value is reported in a single
 * ConfigValidationError.
 */
export function loadMonitorSettings(config: ConfigService): MonitorSettings {
  const errors: string[] = [];

  const readSecs = (key: string, fallback: number): number => {
    const raw = readRaw(config, key);
    if (raw === undefined) {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 1) {
      errors.push(`${key} must be an integer >= 1 (got "${raw}")`);
      return fallback;
    }
    return value;
  };

  let enabled = DEFAULT_MONITOR_SETTINGS.enabled;
  const enabledRaw = readRaw(config, 'MONITOR_ENABLED');
  if (enabledRaw !== undefined) {
    if (enabledRaw === 'true' || enabledRaw === 'false') {
      enabled = enabledRaw === 'true';
    } else {
      errors.push(`MONITOR_ENABLED must be true or false (got "${enabledRaw}")`);
    }
  }

  let changeThresholds = [...DEFAULT_MONITOR_SETTINGS.changeThresholds];
  const thresholdsRaw = readRaw(config, 'MONITOR_CHANGE_THRESHOLDS');
  if (thresholdsRaw !== undefined) {
    const parts = thresholdsRaw.split(',').map((p) => p.trim());
    const invalid = parts.filter((p) => {
      const n = Number(p);
      return p === '' || !Number.isFinite(n) || n <= 0;
    });
    if (invalid.length > 0) {
      errors.push(
        `MONITOR_CHANGE_THRESHOLDS must be positive numbers (invalid: ${invalid.map((p) => `"${p}"`).join(', ')})`,
      );
    } else {
      changeThresholds = [...new Set(parts.map(Number))].sort((a, b) => a - b);
    }
  }

  const settings: MonitorSettings = {
    enabled,
    checkIntervalSecs: readSecs(
      'MONITOR_CHECK_INTERVAL_SECS',
      DEFAULT_MONITOR_SETTINGS.checkIntervalSecs,
    ),
    periodicNotificationSecs: readSecs(
      'MONITOR_PERIODIC_NOTIFICATION_SECS',
      DEFAULT_MONITOR_SETTINGS.periodicNotificationSecs,
    ),
    changeThresholds,
    changeWindowSecs: readSecs(
      'MONITOR_CHANGE_WINDOW_SECS',
      DEFAULT_MONITOR_SETTINGS.changeWindowSecs,
    ),
  };

  if (errors.length > 0) {
    throw new ConfigValidationError(
      `Monitoring config validation failed with ${errors.length} error(s)`,
      errors,
    );
  }
  return settings;
}
