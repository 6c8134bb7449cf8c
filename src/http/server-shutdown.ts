import type { Server } from 'node:http';

import { logInfo, logWarn } from '../services/logger.js';

import { getErrorMessage } from '../utils/error-details.js';

export const FORCED_SHUTDOWN_MS = 10000;

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/** Resolves with the first of SIGINT or SIGTERM. */
export function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      for (const name of SHUTDOWN_SIGNALS) {
        process.off(name, onSignal);
      }
      resolve(signal);
    };
    for (const name of SHUTDOWN_SIGNALS) {
      process.once(name, onSignal);
    }
  });
}

/**
 * Stops accepting connections and resolves once the server has closed.
 * Connections still open after `timeoutMs` are destroyed.
 */
export function closeHttpServer(
  server: Server,
  timeoutMs: number = FORCED_SHUTDOWN_MS
): Promise<void> {
  return new Promise((resolve) => {
    const forceTimer = setTimeout(() => {
      logWarn('Forcing open connections closed after timeout', { timeoutMs });
      server.closeAllConnections();
    }, timeoutMs);
    forceTimer.unref();

    server.close((error) => {
      clearTimeout(forceTimer);
      if (error) {
        logWarn('HTTP server close reported an error', {
          error: getErrorMessage(error),
        });
      }
      logInfo('HTTP server closed');
      resolve();
    });
    server.closeIdleConnections();
  });
}
