/**
 * HTTP-level error codes for the ratio endpoints (3000-3999).
 * Domain failures from the calculator surface through SystemErrorFilter.
 */
export const RATIO_ERROR_CODES = {
  PAIR_NOT_FOUND: 3001,
  ANALYSIS_VOLUME_NOT_CONFIGURED: 3002,
} as const;
