import { AsyncLocalStorage } from 'node:async_hooks';

export interface LogContext {
  chunkId: string;
}

export const logContext = new AsyncLocalStorage<LogContext>();
