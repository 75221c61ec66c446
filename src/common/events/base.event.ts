import { getCorrelationId } from '../services/correlation-context.js';

/**
 * Base class for domain events. Stamps emission time and picks up the
 * correlation ID of the surrounding tick or request unless one is given.
 */
export abstract class BaseEvent {
  public readonly timestamp: Date;
  public readonly correlationId: string | undefined;

  protected constructor(correlationId?: string) {
    this.timestamp = new Date();
    this.correlationId = correlationId ?? getCorrelationId();
  }
}
