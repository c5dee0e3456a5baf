import { AsyncLocalStorage } from 'async_hooks';

export interface RequestContext {
  correlationId: string;
  /** Username of the acting user, as asserted by the authenticating proxy */
  username?: string;
  method?: string;
  path?: string;
  ip?: string;
}

export const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context (if available)
 */
export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current request context
 */
export function getCorrelationId(): string | undefined {
  return asyncLocalStorage.getStore()?.correlationId;
}

/**
 * Username of the user making the current request, if any.
 */
export function getActingUsername(): string | undefined {
  return asyncLocalStorage.getStore()?.username;
}

/**
 * Run `fn` with `context` as the request context. Used outside HTTP handling
 * (scripts, tests) to act on behalf of a user.
 */
export function runWithRequestContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}
