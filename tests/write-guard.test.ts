import assert from 'node:assert/strict';
import { describe, it, mock } from 'node:test';

import {
  assertWriteAccess,
  requireWriteAccess,
} from '../src/auth/write-guard.js';
import { PermissionDeniedError } from '../src/errors/app-error.js';

describe('assertWriteAccess', () => {
  it('passes for read-write', () => {
    assert.doesNotThrow(() =>
      assertWriteAccess('create_card', { role: 'read-write' })
    );
  });

  it('throws a permission error for read-only and missing roles', () => {
    assert.throws(
      () => assertWriteAccess('create_card', { role: 'read-only' }),
      (error: unknown) =>
        error instanceof PermissionDeniedError &&
        error.statusCode === 403 &&
        error.code === 'PERMISSION_DENIED'
    );
    assert.throws(
      () => assertWriteAccess('create_card', {}),
      PermissionDeniedError
    );
  });
});

describe('requireWriteAccess', () => {
  it('never calls the operation for a read-only binding', async () => {
    const operation = mock.fn(async (args: { name: string }) => args.name);
    const guarded = requireWriteAccess('create_list', operation);

    await assert.rejects(
      guarded({ name: 'Backlog' }, { role: 'read-only' }),
      PermissionDeniedError
    );
    assert.equal(operation.mock.callCount(), 0);
  });

  it('forwards args and context for a read-write binding', async () => {
    const operation = mock.fn(async (args: { name: string }) => args.name);
    const guarded = requireWriteAccess('create_list', operation);
    const context = { role: 'read-write' as const };

    assert.equal(await guarded({ name: 'Backlog' }, context), 'Backlog');
    assert.equal(operation.mock.callCount(), 1);
    assert.deepEqual(operation.mock.calls[0]?.arguments, [
      { name: 'Backlog' },
      context,
    ]);
  });

  it('keeps concurrent bindings isolated', async () => {
    const calls: string[] = [];
    const guarded = requireWriteAccess(
      'update_card',
      async (args: { id: string }) => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        calls.push(args.id);
        return args.id;
      }
    );

    const results = await Promise.allSettled([
      guarded({ id: 'rw-1' }, { role: 'read-write' }),
      guarded({ id: 'ro-1' }, { role: 'read-only' }),
      guarded({ id: 'rw-2' }, { role: 'read-write' }),
      guarded({ id: 'ro-2' }, { role: 'read-only' }),
    ]);

    assert.deepEqual(
      results.map((result) => result.status),
      ['fulfilled', 'rejected', 'fulfilled', 'rejected']
    );
    assert.deepEqual([...calls].sort(), ['rw-1', 'rw-2']);
  });
});
