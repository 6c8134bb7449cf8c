#!/usr/bin/env node
import { CredentialStore } from './auth/credential-store.js';

import { config } from './config/index.js';

import { ConfigError } from './errors/app-error.js';

import { logError, logInfo } from './services/logger.js';
import { TrelloClient } from './services/trello-client.js';
import { createTrelloServices } from './services/trello-services.js';

import { startHttpServer } from './http/server.js';
import { startStdioServer } from './server.js';
import { createTrelloTools } from './tools/index.js';

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.stderr.write(`Uncaught exception: ${error.message}\n`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logError('Unhandled rejection', error);
  process.stderr.write(`Unhandled rejection: ${error.message}\n`);
});

function createTrelloClient(): TrelloClient {
  const { apiKey, token, baseUrl, timeoutMs } = config.trello;
  if (!apiKey || !token) {
    throw new ConfigError(
      'TRELLO_API_KEY and TRELLO_TOKEN must be set to reach the Trello API'
    );
  }
  return new TrelloClient({ apiKey, token, baseUrl, timeoutMs });
}

async function main(): Promise<void> {
  const client = createTrelloClient();
  const tools = createTrelloTools(createTrelloServices(client));

  if (config.server.useStdio) {
    await startStdioServer(tools, config.server.stdioRole, () =>
      client.close()
    );
    return;
  }

  const credentials = CredentialStore.fromSources({
    readOnly: config.auth.readOnlyKeys,
    readWrite: config.auth.readWriteKeys,
    legacy: config.auth.legacyKeys,
  });

  await startHttpServer({
    credentials,
    tools,
    onShutdown: () => client.close(),
  });
  logInfo('Trello MCP gateway stopped');
  process.exit(0);
}

try {
  await main();
} catch (error) {
  logError(
    'Failed to start Trello MCP gateway',
    error instanceof Error ? error : undefined
  );
  process.stderr.write(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}\n`
  );
  process.exit(1);
}
