import { SystemError } from './system-error.js';

/** Notification error codes (range 4006-4008 within 4000-4999). */
export const NOTIFICATION_ERROR_CODES = {
  /** Delivery failed (transport error, non-2xx, ok=false) */
  SEND_FAILED: 4006,
  /** Channel asked us to back off (HTTP 429) */
  RATE_LIMITED: 4007,
  /** Channel credentials missing */
  NOT_CONFIGURED: 4008,
} as const;

/**
 * Delivery failure on a notification channel. Never retried internally;
 * `retryAfterSecs` is informational for rate-limited sends.
 */
export class NotificationError extends SystemError {
  constructor(
    code: number,
    message: string,
    public readonly channel: string,
    public readonly retryAfterSecs?: number,
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, 'warning', { channel, retryAfterSecs, ...metadata });
  }
}
