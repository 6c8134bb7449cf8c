import { logError, logInfo } from '../services/logger.js';

import {
  closeSessionTransport,
  startSessionCleanupLoop,
} from './session-cleanup.js';
import {
  createSessionStore,
  type SessionStore,
  type SessionTransport,
} from './sessions.js';

export type SessionLifecycleState = 'idle' | 'running' | 'failed' | 'stopped';

export interface SessionLifecycleOptions<T extends SessionTransport> {
  readonly sessionTtlMs: number;
  readonly maxSessions: number;
  readonly createStore?: (sessionTtlMs: number) => SessionStore<T>;
  readonly startCleanup?: (
    store: SessionStore<T>,
    sessionTtlMs: number
  ) => AbortController;
}

/**
 * Owns the session store and its eviction loop for the lifetime of the
 * process. Entered once at startup and exited once at shutdown; requests
 * only ever read `store`.
 */
export class SessionLifecycle<T extends SessionTransport = SessionTransport> {
  private state: SessionLifecycleState = 'idle';
  private activeStore: SessionStore<T> | undefined;
  private cleanup: AbortController | undefined;

  constructor(private readonly options: SessionLifecycleOptions<T>) {}

  get status(): SessionLifecycleState {
    return this.state;
  }

  get maxSessions(): number {
    return this.options.maxSessions;
  }

  get sessionTtlMs(): number {
    return this.options.sessionTtlMs;
  }

  /** The running store, or undefined when the subsystem is not running. */
  get store(): SessionStore<T> | undefined {
    return this.state === 'running' ? this.activeStore : undefined;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  /** Never throws: a failed start leaves the subsystem in `failed`. */
  start(): boolean {
    if (this.state === 'running') return true;

    const createStore =
      this.options.createStore ??
      ((ttl: number) => createSessionStore<T>(ttl));
    const startCleanup = this.options.startCleanup ?? startSessionCleanupLoop;

    try {
      const store = createStore(this.options.sessionTtlMs);
      this.cleanup = startCleanup(store, this.options.sessionTtlMs);
      this.activeStore = store;
      this.state = 'running';
      logInfo('Session subsystem started', {
        sessionTtlMs: this.options.sessionTtlMs,
        maxSessions: this.options.maxSessions,
      });
      return true;
    } catch (error) {
      this.state = 'failed';
      this.activeStore = undefined;
      logError(
        'Session subsystem failed to start; MCP routes disabled',
        error instanceof Error ? error : undefined
      );
      return false;
    }
  }

  async stop(): Promise<void> {
    if (this.state !== 'running') {
      this.state = 'stopped';
      return;
    }

    this.state = 'stopped';
    this.cleanup?.abort();
    this.cleanup = undefined;

    const store = this.activeStore;
    this.activeStore = undefined;
    if (!store) return;

    const sessions = store.clear();
    await Promise.allSettled(
      sessions.map((session) => closeSessionTransport(session, 'shutdown'))
    );
    logInfo('Session subsystem stopped', { closedSessions: sessions.length });
  }

  /** Scoped acquisition: `stop()` runs whether `body` resolves or throws. */
  async run<R>(body: (lifecycle: this) => Promise<R>): Promise<R> {
    this.start();
    try {
      return await body(this);
    } finally {
      await this.stop();
    }
  }
}
