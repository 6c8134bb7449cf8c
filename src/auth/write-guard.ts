import { PermissionDeniedError } from '../errors/app-error.js';

import { logWarn } from '../services/logger.js';

import { canWrite, type Role } from './roles.js';

export interface RoleScoped {
  readonly role?: Role | undefined;
}

export type GuardedOperation<Args, Result, Context extends RoleScoped> = (
  args: Args,
  context: Context
) => Promise<Result>;

export function assertWriteAccess(
  operation: string,
  context: RoleScoped
): void {
  if (canWrite(context.role)) return;

  logWarn('Write attempt rejected', {
    operation,
    role: context.role ?? 'none',
  });
  throw new PermissionDeniedError(operation, context.role);
}

/**
 * Wraps a mutating operation so it only runs for a read-write binding.
 * A rejected call never reaches `fn`.
 */
export function requireWriteAccess<Args, Result, Context extends RoleScoped>(
  operation: string,
  fn: GuardedOperation<Args, Result, Context>
): GuardedOperation<Args, Result, Context> {
  return async (args, context) => {
    assertWriteAccess(operation, context);
    return fn(args, context);
  };
}
