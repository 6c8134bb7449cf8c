import { z, type ZodError, type ZodRawShape } from 'zod';

import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';

import type { Role } from '../auth/roles.js';
import {
  type GuardedOperation,
  requireWriteAccess,
} from '../auth/write-guard.js';

import { ValidationError } from '../errors/app-error.js';

/** Immutable per-call view of who is calling. */
export interface ToolContext {
  readonly role: Role | undefined;
  readonly requestId: string;
  readonly sessionId?: string | undefined;
  readonly signal?: AbortSignal | undefined;
}

/** The parts of the SDK's request extra that tool dispatch reads. */
export interface ToolCallExtra {
  readonly authInfo?: AuthInfo | undefined;
  readonly sessionId?: string | undefined;
  readonly signal?: AbortSignal | undefined;
}

export type ToolArgs<Shape extends ZodRawShape> = z.output<
  z.ZodObject<Shape, 'strip'>
>;

export interface ToolSpec<Shape extends ZodRawShape, Result> {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly inputSchema: Shape;
  /** Mutating tools run only for a read-write binding. */
  readonly mutating?: boolean;
  readonly handler: (
    args: ToolArgs<Shape>,
    context: ToolContext
  ) => Promise<Result>;
}

export interface GatewayTool {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly inputSchema: ZodRawShape;
  readonly mutating: boolean;
  readonly invoke: GuardedOperation<unknown, unknown, ToolContext>;
}

function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}

export function defineTool<Shape extends ZodRawShape, Result>(
  spec: ToolSpec<Shape, Result>
): GatewayTool {
  const schema: z.ZodObject<Shape, 'strip'> = z.object(spec.inputSchema);
  const run: GuardedOperation<unknown, Result, ToolContext> = async (
    rawArgs,
    context
  ) => {
    const parsed = schema.safeParse(rawArgs ?? {});
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid arguments: ${formatZodIssues(parsed.error)}`
      );
    }
    return spec.handler(parsed.data, context);
  };
  const mutating = spec.mutating ?? false;

  return {
    name: spec.name,
    title: spec.title,
    description: spec.description,
    inputSchema: spec.inputSchema,
    mutating,
    invoke: mutating ? requireWriteAccess(spec.name, run) : run,
  };
}
