export { RateLimiter } from './rate-limiter.js';
export { FinancialMath, FinancialDecimal } from './financial-math.js';
export type { EffectivePriceResult } from './financial-math.js';
