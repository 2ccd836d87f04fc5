import { AsyncLocalStorage } from 'node:async_hooks';

export interface LogContext {
  runId: string;
}

export const logContext = new AsyncLocalStorage<LogContext>();
