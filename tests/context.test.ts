import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  getContextRole,
  getRequestContext,
  getRequestId,
  getSessionId,
  runWithRequestContext,
  runWithRole,
} from '../src/services/context.js';

describe('request context', () => {
  it('is empty outside a request', () => {
    assert.equal(getRequestContext(), undefined);
    assert.equal(getContextRole(), undefined);
  });

  it('exposes the bound request and session ids', () => {
    runWithRequestContext({ requestId: 'r1', sessionId: 's1' }, () => {
      assert.equal(getRequestId(), 'r1');
      assert.equal(getSessionId(), 's1');
      assert.equal(Object.isFrozen(getRequestContext()), true);
    });
  });

  it('adds a role to the current context without replacing it', () => {
    runWithRequestContext({ requestId: 'r1', sessionId: 's1' }, () => {
      runWithRole('read-only', 'ignored', () => {
        assert.deepEqual(getRequestContext(), {
          requestId: 'r1',
          sessionId: 's1',
          role: 'read-only',
        });
      });
      assert.equal(getContextRole(), undefined);
    });
  });

  it('creates a context when none exists', () => {
    const role = runWithRole('read-write', 'r2', () => {
      assert.equal(getRequestId(), 'r2');
      return getContextRole();
    });
    assert.equal(role, 'read-write');
  });

  it('keeps roles apart across concurrent async work', async () => {
    const observe = (role: 'read-only' | 'read-write', delayMs: number) =>
      runWithRole(role, role, async () => {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
        return getContextRole();
      });

    assert.deepEqual(
      await Promise.all([observe('read-only', 10), observe('read-write', 1)]),
      ['read-only', 'read-write']
    );
  });
});
