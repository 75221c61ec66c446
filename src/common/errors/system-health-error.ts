import { SystemError } from './system-error.js';

/**
 * System health errors (codes 4000-4999)
 * Used for infrastructure issues: database connectivity, failed startup probes.
 */
export class SystemHealthError extends SystemError {
  constructor(
    code: number,
    message: string,
    severity: 'critical' | 'error' | 'warning',
    public readonly component?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, severity, metadata);
  }
}

export const SYSTEM_HEALTH_ERROR_CODES = {
  /** Database connectivity failure (critical) */
  DATABASE_FAILURE: 4002,
  /** Notification channel probe failed at startup (critical) */
  STARTUP_PROBE_FAILED: 4003,
} as const;
