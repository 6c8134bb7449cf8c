import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import type { Role } from './auth/roles.js';

import { config } from './config/index.js';

import { logError, logInfo } from './services/logger.js';

import { type GatewayTool, registerTools } from './tools/index.js';

export interface McpServerOptions {
  readonly defaultRole?: Role;
}

/** One server per session; the tool list is shared. */
export function createMcpServer(
  tools: readonly GatewayTool[],
  options: McpServerOptions = {}
): McpServer {
  const server = new McpServer(
    {
      name: config.server.name,
      version: config.server.version,
    },
    {
      capabilities: {
        tools: { listChanged: false },
        logging: {},
      },
      instructions: `Trello MCP gateway v${config.server.version}. Read boards, lists, cards, checklists, attachments and custom fields, and search Trello. Tools that change Trello require a read-write credential.`,
    }
  );

  registerTools(server, tools, options);

  return server;
}

export async function startStdioServer(
  tools: readonly GatewayTool[],
  role: Role,
  onShutdown: () => Promise<void>
): Promise<void> {
  const server = createMcpServer(tools, { defaultRole: role });
  const transport = new StdioServerTransport();

  server.server.onerror = (error) => {
    logError('[MCP Error]', error);
  };

  process.on('SIGINT', () => {
    process.stderr.write('\nShutting down Trello MCP gateway...\n');
    server
      .close()
      .then(onShutdown)
      .catch((err: unknown) => {
        logError(
          'Error during shutdown',
          err instanceof Error ? err : undefined
        );
      })
      .finally(() => {
        process.exit(0);
      });
  });

  await server.connect(transport);
  logInfo('Trello MCP gateway running on stdio', { role });
}
