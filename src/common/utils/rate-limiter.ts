import { Logger } from '@nestjs/common';

const SAFETY_BUFFER = 0.8; // Use only 80% of published limit
const ALERT_THRESHOLD = 0.7; // Alert at 70% utilization

/**
 * Weighted token bucket rate limiter.
 * Exchanges such as Binance budget requests by weight per minute rather than
 * by request count; each call acquires its endpoint's weight.
 */
export class RateLimiter {
  private readonly logger: Logger;
  private tokens: number;
  private lastRefill: number;

  constructor(
    private readonly maxTokens: number,
    private readonly refillRatePerSec: number,
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger(RateLimiter.name);
    this.tokens = maxTokens;
    this.lastRefill = Date.now();
  }

  /**
   * Create a limiter from a published per-minute weight budget,
   * with safety buffer applied.
   */
  static fromWeightPerMinute(
    weightPerMinute: number,
    logger?: Logger,
  ): RateLimiter {
    if (!Number.isFinite(weightPerMinute) || weightPerMinute <= 0) {
      throw new Error(
        `Invalid weight budget: ${weightPerMinute} (must be a positive number)`,
      );
    }
    const capacity = Math.floor(weightPerMinute * SAFETY_BUFFER);
    return new RateLimiter(capacity, capacity / 60, logger);
  }

  async acquire(weight = 1): Promise<void> {
    if (weight > this.maxTokens) {
      throw new Error(
        `Request weight ${weight} exceeds limiter capacity ${this.maxTokens}`,
      );
    }
    this.refill();
    await this.waitIfNeeded(weight);
    this.tokens -= weight;
    this.checkUtilization();
  }

  getUtilization(): number {
    this.refill();
    return (1 - this.tokens / this.maxTokens) * 100;
  }

  private checkUtilization(): void {
    const utilization = 1 - this.tokens / this.maxTokens;
    if (utilization >= ALERT_THRESHOLD) {
      this.logger.warn({
        message: 'Rate limit utilization high',
        module: 'connector',
        utilization: `${(utilization * 100).toFixed(1)}%`,
        tokensRemaining: this.tokens,
      });
    }
  }

  private async waitIfNeeded(weight: number): Promise<void> {
    while (this.tokens < weight) {
      const waitMs = ((weight - this.tokens) / this.refillRatePerSec) * 1000;
      await new Promise((resolve) => setTimeout(resolve, waitMs));
      this.refill();
    }
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = (now - this.lastRefill) / 1000;
    const tokensToAdd = elapsed * this.refillRatePerSec;

    if (tokensToAdd >= 0.01) {
      this.tokens = Math.min(this.maxTokens, this.tokens + tokensToAdd);
      this.lastRefill = now;
    }
  }
}
