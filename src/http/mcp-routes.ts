import { randomUUID } from 'node:crypto';

import type { Express, NextFunction, Request, Response } from 'express';

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';

import type { McpRequestBody } from '../config/types.js';

import { logDebug, logError, logInfo, logWarn } from '../services/logger.js';

import { getErrorMessage } from '../utils/error-details.js';

import type { SessionLifecycle } from './session-lifecycle.js';
import {
  createSessionSlots,
  createSlotTracker,
  hasCapacity,
  type SessionSlots,
  type SlotTracker,
} from './session-slots.js';
import { getSessionId, type SessionStore } from './sessions.js';

export type McpSessionLifecycle =
  SessionLifecycle<StreamableHTTPServerTransport>;
type McpSessionStore = SessionStore<StreamableHTTPServerTransport>;

export const SESSION_INIT_TIMEOUT_MS = 10000;

export interface McpRouteOptions {
  readonly lifecycle: McpSessionLifecycle;
  readonly createServer: () => McpServer;
  /** Pending sessions without an id after this long are torn down. */
  readonly initTimeoutMs?: number;
}

interface PendingSession {
  readonly transport: StreamableHTTPServerTransport;
  /** Releases the slot and closes the transport unless initialized. */
  readonly abandon: (reason: string) => void;
}

function isMcpRequestBody(body: unknown): body is McpRequestBody {
  if (!body || typeof body !== 'object' || Array.isArray(body)) return false;
  const method = 'method' in body ? body.method : undefined;
  const id = 'id' in body ? body.id : undefined;
  const jsonrpc = 'jsonrpc' in body ? body.jsonrpc : undefined;
  const params = 'params' in body ? body.params : undefined;
  return (
    (method === undefined || typeof method === 'string') &&
    (id === undefined || typeof id === 'string' || typeof id === 'number') &&
    (jsonrpc === undefined || jsonrpc === '2.0') &&
    (params === undefined || typeof params === 'object')
  );
}

function sendJsonRpcError(
  res: Response,
  status: number,
  code: number,
  message: string
): void {
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code, message },
    id: null,
  });
}

function closeAbandonedTransport(
  transport: StreamableHTTPServerTransport
): void {
  transport.close().catch((error: unknown) => {
    logWarn('Failed to close abandoned session', {
      error: getErrorMessage(error),
    });
  });
}

function startInitTimeout(
  tracker: SlotTracker,
  abandon: (reason: string) => void,
  timeoutMs: number
): NodeJS.Timeout | undefined {
  if (timeoutMs <= 0) return undefined;
  const timeout = setTimeout(() => {
    if (!tracker.isInitialized()) abandon('initialization timed out');
  }, timeoutMs);
  timeout.unref();
  return timeout;
}

async function createSessionTransport(
  store: McpSessionStore,
  options: McpRouteOptions,
  slots: SessionSlots
): Promise<PendingSession> {
  const tracker = createSlotTracker(slots);
  let initTimeout: NodeJS.Timeout | undefined;

  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (id) => {
      clearTimeout(initTimeout);
      tracker.markInitialized();
      tracker.releaseSlot();
      const now = Date.now();
      store.set(id, { transport, createdAt: now, lastSeen: now });
      logInfo('Session initialized', { sessionId: id });
    },
    onsessionclosed: (id) => {
      store.remove(id);
      logInfo('Session closed', { sessionId: id });
    },
  });

  transport.onclose = () => {
    clearTimeout(initTimeout);
    if (!tracker.isInitialized()) tracker.releaseSlot();
    if (transport.sessionId) store.remove(transport.sessionId);
  };

  const abandon = (reason: string): void => {
    if (tracker.isInitialized()) return;
    clearTimeout(initTimeout);
    tracker.releaseSlot();
    logWarn('Abandoning uninitialized session', { reason });
    closeAbandonedTransport(transport);
  };

  initTimeout = startInitTimeout(
    tracker,
    abandon,
    options.initTimeoutMs ?? SESSION_INIT_TIMEOUT_MS
  );

  try {
    await options.createServer().connect(transport);
  } catch (error) {
    clearTimeout(initTimeout);
    tracker.releaseSlot();
    closeAbandonedTransport(transport);
    logError(
      'Failed to initialize MCP session',
      error instanceof Error ? error : undefined
    );
    throw error;
  }
  return { transport, abandon };
}

async function forwardToTransport(
  transport: StreamableHTTPServerTransport,
  req: Request,
  res: Response,
  body?: unknown
): Promise<void> {
  try {
    await transport.handleRequest(req, res, body);
  } catch (error) {
    logError(
      'MCP request handling failed',
      error instanceof Error ? error : undefined
    );
    if (!res.headersSent) {
      sendJsonRpcError(res, 500, -32603, 'Internal server error');
    }
  }
}

async function handlePost(
  req: Request,
  res: Response,
  store: McpSessionStore,
  options: McpRouteOptions,
  slots: SessionSlots
): Promise<void> {
  const sessionId = getSessionId(req);
  const body: unknown = req.body;

  if (!isMcpRequestBody(body)) {
    sendJsonRpcError(
      res,
      400,
      -32600,
      'Invalid Request: Malformed request body'
    );
    return;
  }

  logDebug('[MCP POST]', {
    method: body.method,
    id: body.id,
    sessionId: sessionId ?? 'none',
    isInitialize: isInitializeRequest(body),
    sessionCount: store.size(),
  });

  const existingSession = sessionId ? store.get(sessionId) : undefined;
  if (sessionId && existingSession) {
    store.touch(sessionId);
    await forwardToTransport(existingSession.transport, req, res, body);
    return;
  }

  if (sessionId || !isInitializeRequest(body)) {
    sendJsonRpcError(
      res,
      400,
      -32000,
      'Bad Request: Missing session ID or not an initialize request'
    );
    return;
  }

  const { maxSessions } = options.lifecycle;
  if (
    !hasCapacity(store, maxSessions, slots) ||
    !slots.reserve(store, maxSessions)
  ) {
    sendJsonRpcError(res, 503, -32000, 'Server busy: maximum sessions reached');
    return;
  }

  const pending = await createSessionTransport(store, options, slots);
  await forwardToTransport(pending.transport, req, res, body);

  // The SDK answered without creating a session (bad Accept, version...).
  if (!pending.transport.sessionId) {
    pending.abandon('initialize rejected');
  }
}

/** An open stream keeps its session alive while it lasts. */
function keepSessionAlive(
  res: Response,
  store: McpSessionStore,
  sessionId: string,
  sessionTtlMs: number
): void {
  const interval = setInterval(
    () => {
      store.touch(sessionId);
    },
    Math.max(Math.floor(sessionTtlMs / 2), 1)
  );
  interval.unref();
  res.once('close', () => {
    clearInterval(interval);
    store.touch(sessionId);
  });
}

async function handleGet(
  req: Request,
  res: Response,
  store: McpSessionStore,
  sessionTtlMs: number
): Promise<void> {
  const sessionId = getSessionId(req);

  if (!sessionId) {
    sendJsonRpcError(res, 400, -32000, 'Missing mcp-session-id header');
    return;
  }

  const session = store.get(sessionId);
  if (!session) {
    sendJsonRpcError(res, 404, -32001, 'Session not found');
    return;
  }

  store.touch(sessionId);
  keepSessionAlive(res, store, sessionId, sessionTtlMs);
  await forwardToTransport(session.transport, req, res);
}

async function handleDelete(
  req: Request,
  res: Response,
  store: McpSessionStore
): Promise<void> {
  const sessionId = getSessionId(req);
  const session = sessionId ? store.get(sessionId) : undefined;

  if (!sessionId || !session) {
    res.status(204).end();
    return;
  }

  store.touch(sessionId);
  await forwardToTransport(session.transport, req, res);
}

type SessionRouteHandler = (
  req: Request,
  res: Response,
  store: McpSessionStore
) => Promise<void>;

/**
 * Routes stand aside while the session subsystem is not running so the
 * request falls through to the not-found handler.
 */
export function registerMcpRoutes(
  app: Express,
  options: McpRouteOptions
): void {
  const slots = createSessionSlots();

  const withStore =
    (fn: SessionRouteHandler) =>
    (req: Request, res: Response, next: NextFunction): void => {
      const { store } = options.lifecycle;
      if (!store) {
        next();
        return;
      }
      fn(req, res, store).catch(next);
    };

  app.post(
    '/mcp',
    withStore((req, res, store) => handlePost(req, res, store, options, slots))
  );
  app.get(
    '/mcp',
    withStore((req, res, store) =>
      handleGet(req, res, store, options.lifecycle.sessionTtlMs)
    )
  );
  app.delete('/mcp', withStore(handleDelete));
}
