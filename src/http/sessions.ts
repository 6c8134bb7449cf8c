import type { Request } from 'express';

export interface SessionTransport {
  close: () => Promise<void>;
}

export interface SessionEntry<T extends SessionTransport = SessionTransport> {
  readonly transport: T;
  createdAt: number;
  lastSeen: number;
}

export interface SessionStore<T extends SessionTransport = SessionTransport> {
  get: (sessionId: string) => SessionEntry<T> | undefined;
  touch: (sessionId: string) => void;
  set: (sessionId: string, entry: SessionEntry<T>) => void;
  remove: (sessionId: string) => SessionEntry<T> | undefined;
  size: () => number;
  clear: () => SessionEntry<T>[];
  evictExpired: () => SessionEntry<T>[];
  evictOldest: () => SessionEntry<T> | undefined;
}

export function getSessionId(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return Array.isArray(header) ? header[0] : header;
}

export function createSessionStore<T extends SessionTransport>(
  sessionTtlMs: number,
  now: () => number = Date.now
): SessionStore<T> {
  const sessions = new Map<string, SessionEntry<T>>();

  return {
    get: (sessionId) => sessions.get(sessionId),
    touch: (sessionId) => {
      const session = sessions.get(sessionId);
      if (session) session.lastSeen = now();
    },
    set: (sessionId, entry) => {
      sessions.set(sessionId, entry);
    },
    remove: (sessionId) => {
      const session = sessions.get(sessionId);
      sessions.delete(sessionId);
      return session;
    },
    size: () => sessions.size,
    clear: () => {
      const entries = Array.from(sessions.values());
      sessions.clear();
      return entries;
    },
    evictExpired: () => evictExpiredSessions(sessions, sessionTtlMs, now()),
    evictOldest: () => evictOldestSession(sessions),
  };
}

function evictExpiredSessions<T extends SessionTransport>(
  sessions: Map<string, SessionEntry<T>>,
  sessionTtlMs: number,
  now: number
): SessionEntry<T>[] {
  const evicted: SessionEntry<T>[] = [];

  for (const [id, session] of sessions.entries()) {
    if (now - session.lastSeen > sessionTtlMs) {
      sessions.delete(id);
      evicted.push(session);
    }
  }

  return evicted;
}

function evictOldestSession<T extends SessionTransport>(
  sessions: Map<string, SessionEntry<T>>
): SessionEntry<T> | undefined {
  let oldestId: string | undefined;
  let oldestSeen = Number.POSITIVE_INFINITY;

  for (const [id, session] of sessions.entries()) {
    if (session.lastSeen < oldestSeen) {
      oldestSeen = session.lastSeen;
      oldestId = id;
    }
  }

  if (!oldestId) return undefined;
  const session = sessions.get(oldestId);
  sessions.delete(oldestId);
  return session;
}
