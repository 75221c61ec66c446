import { SystemError } from './system-error.js';

/**
 * Thrown when ratio pair or monitoring config validation fails at startup.
 * Code 4010, SystemHealth range (4000-4999).
 * Severity: critical; the monitor cannot operate without valid configuration.
 */
export class ConfigValidationError extends SystemError {
  constructor(
    message: string,
    public readonly validationErrors: string[],
  ) {
    super(4010, message, 'critical', { validationErrors });
  }
}
