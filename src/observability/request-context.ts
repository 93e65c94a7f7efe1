import { randomUUID } from 'node:crypto';
import { AsyncLocalStorage } from 'node:async_hooks';

type ContextStore = {
  requestId: string;
};

const storage = new AsyncLocalStorage<ContextStore>();

export function withRequestContext<T>(fn: () => T, requestId?: string): T {
  return storage.run({ requestId: requestId ?? randomUUID() }, fn);
}

export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}
