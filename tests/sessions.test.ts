import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  evictExpiredSessions,
  evictOldestSession,
  getCleanupIntervalMs,
} from '../src/http/session-cleanup.js';
import { createSessionStore, getSessionId } from '../src/http/sessions.js';

function createTransport() {
  let closed = 0;
  return {
    close: async () => {
      closed += 1;
    },
    closedCount: () => closed,
  };
}

type TestTransport = ReturnType<typeof createTransport>;

describe('createSessionStore', () => {
  it('touches lastSeen from the injected clock', () => {
    let now = 1000;
    const store = createSessionStore<TestTransport>(5000, () => now);
    store.set('a', { transport: createTransport(), createdAt: 0, lastSeen: 0 });

    now = 2500;
    store.touch('a');

    assert.equal(store.get('a')?.lastSeen, 2500);
    assert.equal(store.get('a')?.createdAt, 0);
  });

  it('evicts only sessions idle longer than the TTL', () => {
    const store = createSessionStore<TestTransport>(1000, () => 5000);
    store.set('stale', {
      transport: createTransport(),
      createdAt: 0,
      lastSeen: 3999,
    });
    store.set('edge', {
      transport: createTransport(),
      createdAt: 0,
      lastSeen: 4000,
    });

    const evicted = store.evictExpired();

    assert.equal(evicted.length, 1);
    assert.equal(store.get('stale'), undefined);
    assert.notEqual(store.get('edge'), undefined);
  });

  it('evicts the least recently seen session', () => {
    const store = createSessionStore<TestTransport>(1000);
    const oldest = createTransport();
    store.set('new', { transport: createTransport(), createdAt: 0, lastSeen: 20 });
    store.set('old', { transport: oldest, createdAt: 0, lastSeen: 10 });

    assert.equal(store.evictOldest()?.transport, oldest);
    assert.equal(store.size(), 1);
    assert.equal(store.get('old'), undefined);
  });

  it('clear returns every entry and empties the store', () => {
    const store = createSessionStore<TestTransport>(1000);
    store.set('a', { transport: createTransport(), createdAt: 0, lastSeen: 0 });
    store.set('b', { transport: createTransport(), createdAt: 0, lastSeen: 0 });

    assert.equal(store.clear().length, 2);
    assert.equal(store.size(), 0);
  });
});

describe('session cleanup', () => {
  it('closes the transports of expired sessions', async () => {
    const store = createSessionStore<TestTransport>(10, () => 100);
    const transport = createTransport();
    store.set('a', { transport, createdAt: 0, lastSeen: 0 });

    assert.equal(evictExpiredSessions(store), 1);
    await Promise.resolve();
    assert.equal(transport.closedCount(), 1);
  });

  it('reports whether an oldest session was evicted', () => {
    const store = createSessionStore<TestTransport>(1000);
    assert.equal(evictOldestSession(store), false);

    store.set('a', { transport: createTransport(), createdAt: 0, lastSeen: 0 });
    assert.equal(evictOldestSession(store), true);
    assert.equal(store.size(), 0);
  });

  it('clamps the cleanup interval between 10s and 60s', () => {
    assert.equal(getCleanupIntervalMs(1000), 10000);
    assert.equal(getCleanupIntervalMs(60000), 30000);
    assert.equal(getCleanupIntervalMs(30 * 60 * 1000), 60000);
  });
});

describe('getSessionId', () => {
  it('reads the first mcp-session-id header value', () => {
    assert.equal(
      getSessionId({ headers: { 'mcp-session-id': 'abc' } } as never),
      'abc'
    );
    assert.equal(
      getSessionId({ headers: { 'mcp-session-id': ['x', 'y'] } } as never),
      'x'
    );
    assert.equal(getSessionId({ headers: {} } as never), undefined);
  });
});
