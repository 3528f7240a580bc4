/**
 * Request-scoped log context carried through async calls.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export type { Logger } from 'winston';

export interface LogContext {
  correlationId?: string;
  service?: string;
  method?: string;
  url?: string;
  [key: string]: unknown;
}

const contextStorage = new AsyncLocalStorage<LogContext>();

export function getCorrelationContext(): LogContext | undefined {
  return contextStorage.getStore();
}

export function currentCorrelationId(): string | undefined {
  return contextStorage.getStore()?.correlationId;
}

export function runWithContext<T>(context: LogContext, fn: () => T): T {
  return contextStorage.run(context, fn);
}

export function generateCorrelationId(): string {
  return randomUUID();
}
