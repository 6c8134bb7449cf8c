import { setInterval as setIntervalPromise } from 'node:timers/promises';

import { logInfo, logWarn } from '../services/logger.js';

import { getErrorMessage, isAbortError } from '../utils/error-details.js';

import type {
  SessionEntry,
  SessionStore,
  SessionTransport,
} from './sessions.js';

export function closeSessionTransport(
  session: SessionEntry,
  reason: string
): Promise<void> {
  return session.transport.close().catch((error: unknown) => {
    logWarn(`Failed to close ${reason} session`, {
      error: getErrorMessage(error),
    });
  });
}

export function evictExpiredSessions<T extends SessionTransport>(
  store: SessionStore<T>
): number {
  const evicted = store.evictExpired();
  for (const session of evicted) {
    void closeSessionTransport(session, 'expired');
  }
  return evicted.length;
}

export function evictOldestSession<T extends SessionTransport>(
  store: SessionStore<T>
): boolean {
  const session = store.evictOldest();
  if (!session) return false;
  void closeSessionTransport(session, 'evicted');
  return true;
}

export function startSessionCleanupLoop<T extends SessionTransport>(
  store: SessionStore<T>,
  sessionTtlMs: number
): AbortController {
  const controller = new AbortController();
  void runSessionCleanupLoop(store, sessionTtlMs, controller.signal).catch(
    handleSessionCleanupError
  );
  return controller;
}

async function runSessionCleanupLoop<T extends SessionTransport>(
  store: SessionStore<T>,
  sessionTtlMs: number,
  signal: AbortSignal
): Promise<void> {
  const intervalMs = getCleanupIntervalMs(sessionTtlMs);
  for await (const _ of setIntervalPromise(intervalMs, undefined, {
    signal,
    ref: false,
  })) {
    const evicted = evictExpiredSessions(store);
    if (evicted > 0) {
      logInfo('Expired sessions evicted', { evicted });
    }
  }
}

export function getCleanupIntervalMs(sessionTtlMs: number): number {
  return Math.min(Math.max(Math.floor(sessionTtlMs / 2), 10000), 60000);
}

function handleSessionCleanupError(error: unknown): void {
  if (isAbortError(error)) {
    return;
  }
  logWarn('Session cleanup loop failed', {
    error: getErrorMessage(error),
  });
}
