/**
 * Simple async-local context for scoped log metadata (requestId for API
 * calls, cycleId for poll cycles).
 */
import { AsyncLocalStorage } from 'async_hooks';

type RequestContext = {
  requestId?: string;
  cycleId?: string;
};

const storage = new AsyncLocalStorage<RequestContext>();

export function runWithContext<T>(ctx: RequestContext, fn: () => T) {
  return storage.run(ctx, fn);
}

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}
