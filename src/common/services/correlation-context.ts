import { AsyncLocalStorage } from 'node:async_hooks';
import { v4 as uuidv4 } from 'uuid';

/**
 * Module-level storage for the correlation ID of the current unit of work
 * (one monitor tick, one HTTP request). Not a Nest provider: anything can
 * read it without injection.
 */
const correlationStorage = new AsyncLocalStorage<string>();

/**
 * Runs `fn` inside a correlation context. A fresh UUID is generated unless
 * one is supplied.
 *
 * @example
 * await withCorrelationId(async () => {
 *   this.logger.log({ message: 'Tick started', correlationId: getCorrelationId() });
 *   await this.checkPairs();
 * });
 */
export function withCorrelationId<T>(
  fn: () => Promise<T>,
  correlationId: string = uuidv4(),
): Promise<T> {
  return correlationStorage.run(correlationId, fn);
}

/** Current correlation ID, or undefined outside any context. */
export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore();
}
