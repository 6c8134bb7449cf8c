import { AsyncLocalStorage } from 'node:async_hooks';

import type { Role } from '../auth/roles.js';

export interface RequestContext {
  readonly requestId: string;
  readonly sessionId?: string;
  readonly role?: Role;
}

const requestContext = new AsyncLocalStorage<RequestContext>();

export function runWithRequestContext<T>(
  context: RequestContext,
  fn: () => T
): T {
  return requestContext.run(Object.freeze({ ...context }), fn);
}

/**
 * Runs `fn` in a copy of the current context with `role` bound. Outside a
 * request a fresh context is created under `requestId`.
 */
export function runWithRole<T>(role: Role, requestId: string, fn: () => T): T {
  const current = requestContext.getStore();
  return runWithRequestContext(
    current ? { ...current, role } : { requestId, role },
    fn
  );
}

export function getRequestContext(): RequestContext | undefined {
  return requestContext.getStore();
}

export function getRequestId(): string | undefined {
  return requestContext.getStore()?.requestId;
}

export function getSessionId(): string | undefined {
  return requestContext.getStore()?.sessionId;
}

export function getContextRole(): Role | undefined {
  return requestContext.getStore()?.role;
}
