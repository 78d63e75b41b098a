/**
 * Request-scoped context carried through async calls, so log lines written
 * deep inside a service still carry the id of the request that caused them.
 *
 * Opened by `requestIdMiddleware`; read by the logger's mixin.
 */

import { AsyncLocalStorage } from 'async_hooks';

const storage = new AsyncLocalStorage<{ readonly requestId: string }>();

export function runWithRequestId<T>(requestId: string, fn: () => T): T {
  return storage.run({ requestId }, fn);
}

/** `undefined` outside a request (startup, shutdown, signal handlers). */
export function currentRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}
