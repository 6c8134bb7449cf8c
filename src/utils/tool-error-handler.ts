import type { ToolErrorPayload, ToolErrorResponse } from '../config/types.js';

import {
  AppError,
  PermissionDeniedError,
  UpstreamError,
} from '../errors/app-error.js';

import { logError, logWarn } from '../services/logger.js';

const IS_DEVELOPMENT_WITH_STACK_TRACES =
  process.env.NODE_ENV === 'development' &&
  process.env.EXPOSE_STACK_TRACES === 'true';

export function createToolErrorResponse(
  message: string,
  code: string,
  details?: Record<string, unknown>
): ToolErrorResponse {
  const structuredContent: ToolErrorPayload = {
    error: message,
    code,
    ...(details && Object.keys(details).length > 0 ? { details } : {}),
  };

  return {
    content: [{ type: 'text', text: JSON.stringify(structuredContent) }],
    structuredContent,
    isError: true,
  };
}

function formatErrorMessage(error: Error, fallback?: string): string {
  const message = fallback ? `${fallback}: ${error.message}` : error.message;

  if (IS_DEVELOPMENT_WITH_STACK_TRACES && error.stack) {
    return `${message}\n${error.stack}`;
  }

  return message;
}

/**
 * Turns a failed tool call into an MCP error result. Every failure is
 * logged; permission denials and invalid input at warn, the rest at error.
 */
export function handleToolError(
  error: unknown,
  toolName: string,
  fallbackMessage = 'Operation failed'
): ToolErrorResponse {
  if (error instanceof PermissionDeniedError) {
    return createToolErrorResponse(error.message, error.code, error.details);
  }

  if (error instanceof UpstreamError) {
    logError(`Tool '${toolName}' failed upstream`, {
      error: error.message,
      code: error.code,
      path: error.path,
    });
    return createToolErrorResponse(
      formatErrorMessage(error),
      error.code,
      error.details
    );
  }

  if (error instanceof AppError) {
    logWarn(`Tool '${toolName}' failed`, {
      error: error.message,
      code: error.code,
    });
    return createToolErrorResponse(
      formatErrorMessage(error),
      error.code,
      error.details
    );
  }

  if (error instanceof Error) {
    logError(`Tool '${toolName}' failed`, error);
    return createToolErrorResponse(
      formatErrorMessage(error, fallbackMessage),
      'UNKNOWN_ERROR'
    );
  }

  logError(`Tool '${toolName}' failed`, { error: String(error) });
  return createToolErrorResponse(
    `${fallbackMessage}: Unknown error`,
    'UNKNOWN_ERROR'
  );
}
