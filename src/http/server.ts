import type { Server } from 'node:http';

import express, { type Express } from 'express';

import type { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

import type { CredentialStore } from '../auth/credential-store.js';

import { config } from '../config/index.js';
import type { StreamHeaderPolicy } from '../config/types.js';

import { logInfo } from '../services/logger.js';

import { errorHandler, notFoundHandler } from '../middleware/error-handler.js';

import { createMcpServer } from '../server.js';
import type { GatewayTool } from '../tools/index.js';
import { createAuthMiddleware } from './auth.js';
import { createCorsMiddleware } from './cors.js';
import { type McpSessionLifecycle, registerMcpRoutes } from './mcp-routes.js';
import {
  attachBaseMiddleware,
  type ServerIdentity,
} from './server-middleware.js';
import {
  closeHttpServer,
  FORCED_SHUTDOWN_MS,
  waitForShutdownSignal,
} from './server-shutdown.js';
import { SessionLifecycle } from './session-lifecycle.js';
import { createStreamIntegrityMiddleware } from './stream-integrity.js';

export interface GatewayAppOptions {
  readonly credentials: CredentialStore;
  readonly tools: readonly GatewayTool[];
  readonly lifecycle: McpSessionLifecycle;
  readonly streamHeaderPolicy: StreamHeaderPolicy;
  readonly trustProxy?: boolean;
  readonly identity?: ServerIdentity;
  readonly sessionInitTimeoutMs?: number;
}

export interface HttpServerOptions {
  readonly credentials: CredentialStore;
  readonly tools: readonly GatewayTool[];
  /** Runs after the server and every session have closed. */
  readonly onShutdown?: () => Promise<void>;
}

export function createSessionLifecycle(): McpSessionLifecycle {
  return new SessionLifecycle<StreamableHTTPServerTransport>({
    sessionTtlMs: config.server.sessionTtlMs,
    maxSessions: config.server.maxSessions,
  });
}

export function createGatewayApp(options: GatewayAppOptions): Express {
  const app = express();
  app.disable('x-powered-by');
  if (options.trustProxy) {
    app.set('trust proxy', true);
  }

  attachBaseMiddleware(
    app,
    {
      jsonParser: express.json({ limit: '1mb' }),
      corsMiddleware: createCorsMiddleware(),
      authMiddleware: createAuthMiddleware({
        credentials: options.credentials,
      }),
      streamIntegrityMiddleware: createStreamIntegrityMiddleware(
        options.streamHeaderPolicy
      ),
    },
    options.identity ?? {
      name: config.server.name,
      version: config.server.version,
    }
  );

  registerMcpRoutes(app, {
    lifecycle: options.lifecycle,
    createServer: () => createMcpServer(options.tools),
    initTimeoutMs: options.sessionInitTimeoutMs,
  });

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

export function listen(
  app: Express,
  port: number,
  host: string
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => {
      server.off('error', reject);
      resolve(server);
    });
    server.once('error', reject);
  });
}

function logStartup(server: Server, credentials: CredentialStore): void {
  const address = server.address();
  const port =
    address && typeof address === 'object' ? address.port : config.server.port;
  const { host } = config.server;

  logInfo('Trello MCP gateway started', {
    host,
    port,
    streamHeaderPolicy: config.server.streamHeaderPolicy,
    credentials: credentials.describe(),
  });

  if (credentials.isOpenAccess()) {
    logInfo(
      'No MCP API keys configured; every request is granted read-write access'
    );
  }

  process.stdout.write(
    `✓ Trello MCP gateway running at http://${host}:${port}\n`
  );
  process.stdout.write(`  Health check: http://${host}:${port}/health\n`);
  process.stdout.write(`  MCP endpoint: http://${host}:${port}/mcp\n`);
  process.stdout.write(
    `\nRun with --stdio flag for direct stdio integration\n`
  );
}

/**
 * Serves until SIGINT or SIGTERM. The session subsystem is entered before
 * the first request and exited after the listener stops accepting.
 */
export async function startHttpServer(
  options: HttpServerOptions
): Promise<void> {
  const lifecycle = createSessionLifecycle();

  const { closed } = await lifecycle.run(async () => {
    const app = createGatewayApp({
      credentials: options.credentials,
      tools: options.tools,
      lifecycle,
      streamHeaderPolicy: config.server.streamHeaderPolicy,
      trustProxy: config.server.trustProxy,
    });
    const server = await listen(app, config.server.port, config.server.host);
    logStartup(server, options.credentials);

    const signal = await waitForShutdownSignal();
    logInfo(`${signal} received, shutting down gracefully...`);
    return { closed: closeHttpServer(server, FORCED_SHUTDOWN_MS) };
  });

  await closed;
  await options.onShutdown?.();
}
