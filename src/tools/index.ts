import { randomUUID } from 'node:crypto';

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import { isRole, type Role } from '../auth/roles.js';

import type { ToolSuccessResponse } from '../config/types.js';

import { getRequestId, runWithRole } from '../services/context.js';
import { logDebug } from '../services/logger.js';
import type { TrelloServices } from '../services/trello-services.js';

import { handleToolError } from '../utils/tool-error-handler.js';

import { createAttachmentTools } from './handlers/attachment.tools.js';
import { createBoardTools } from './handlers/board.tools.js';
import { createCardTools } from './handlers/card.tools.js';
import { createChecklistTools } from './handlers/checklist.tools.js';
import { createCustomFieldTools } from './handlers/custom-field.tools.js';
import { createListTools } from './handlers/list.tools.js';
import { createSearchTools } from './handlers/search.tools.js';
import type {
  GatewayTool,
  ToolCallExtra,
  ToolContext,
} from './tool-definition.js';

export type { GatewayTool, ToolCallExtra, ToolContext };

export interface ToolRegistrationOptions {
  /**
   * Role for calls that carry no auth record. Only the stdio entry point
   * sets this; over HTTP an unauthenticated call has no role.
   */
  readonly defaultRole?: Role;
}

export function createTrelloTools(services: TrelloServices): GatewayTool[] {
  return [
    ...createBoardTools(services),
    ...createListTools(services),
    ...createCardTools(services),
    ...createAttachmentTools(services),
    ...createCustomFieldTools(services),
    ...createChecklistTools(services),
    ...createSearchTools(services),
  ];
}

export function roleFromAuthInfo(
  authInfo: AuthInfo | undefined
): Role | undefined {
  const role = authInfo?.extra?.role;
  return isRole(role) ? role : undefined;
}

export function buildToolContext(
  extra: ToolCallExtra,
  defaultRole?: Role
): ToolContext {
  return Object.freeze({
    role: roleFromAuthInfo(extra.authInfo) ?? defaultRole,
    requestId: getRequestId() ?? randomUUID(),
    sessionId: extra.sessionId,
    signal: extra.signal,
  });
}

export function createToolSuccessResponse<T>(
  result: T
): ToolSuccessResponse<T> {
  return {
    content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    structuredContent: { result },
  };
}

/** Runs one tool call; failures come back as `isError` results. */
export async function dispatchTool(
  tool: GatewayTool,
  args: unknown,
  context: ToolContext
): Promise<CallToolResult> {
  const execute = async (): Promise<CallToolResult> => {
    try {
      const result = await tool.invoke(args, context);
      logDebug('Tool call completed', { tool: tool.name });
      return createToolSuccessResponse(result);
    } catch (error) {
      return handleToolError(error, tool.name);
    }
  };

  return context.role
    ? runWithRole(context.role, context.requestId, execute)
    : execute();
}

export function registerTools(
  server: McpServer,
  tools: readonly GatewayTool[],
  options: ToolRegistrationOptions = {}
): void {
  for (const tool of tools) {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: tool.inputSchema,
        annotations: {
          readOnlyHint: !tool.mutating,
          destructiveHint: tool.mutating,
          openWorldHint: true,
        },
      },
      async (args: unknown, extra: ToolCallExtra) =>
        dispatchTool(tool, args, buildToolContext(extra, options.defaultRole))
    );
  }
}
