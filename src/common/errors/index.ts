export { SystemError } from './system-error.js';
export {
  SystemHealthError,
  SYSTEM_HEALTH_ERROR_CODES,
} from './system-health-error.js';
export { ConfigValidationError } from './config-validation-error.js';
export { MarketDataError, MARKET_DATA_ERROR_CODES } from './market-data-error.js';
export {
  InsufficientLiquidityError,
  INSUFFICIENT_LIQUIDITY_CODE,
} from './insufficient-liquidity-error.js';
export {
  NotificationError,
  NOTIFICATION_ERROR_CODES,
} from './notification-error.js';
