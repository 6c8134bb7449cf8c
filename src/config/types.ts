import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

// Logger types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMetadata = Record<string, unknown>;

export type StreamHeaderPolicy = 'strict' | 'permissive';

// MCP request types
export interface McpRequestBody {
  method?: string;
  id?: string | number;
  jsonrpc?: '2.0';
  params?: unknown;
}

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    statusCode: number;
    details?: Record<string, unknown>;
    stack?: string;
  };
}

export type ToolErrorPayload = {
  error: string;
  code: string;
  details?: Record<string, unknown>;
};

export type ToolErrorResponse = CallToolResult & {
  structuredContent: ToolErrorPayload;
  isError: true;
};

export type ToolSuccessResponse<T> = CallToolResult & {
  structuredContent: { result: T };
};
