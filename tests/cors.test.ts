import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { createCorsMiddleware } from '../src/http/cors.js';

function createCorsRequest(method: string, headers: Record<string, string>) {
  return { method, headers };
}

function createCorsResponseCapture() {
  const headers: Record<string, string> = {};
  const varied: string[] = [];
  let statusSent: number | undefined;
  const res = {
    header: (key: string, value: string) => {
      headers[key] = value;
      return res;
    },
    vary: (field: string) => {
      varied.push(field);
      return res;
    },
    sendStatus: (code: number) => {
      statusSent = code;
      return res;
    },
  };

  return { res, headers, varied, getStatusSent: () => statusSent };
}

describe('createCorsMiddleware', () => {
  it('answers pre-flight with 204 without calling next', () => {
    const middleware = createCorsMiddleware();
    const { res, headers, getStatusSent } = createCorsResponseCapture();
    let nextCalls = 0;

    middleware(
      createCorsRequest('OPTIONS', {
        origin: 'https://client.test',
        'access-control-request-headers': 'authorization, x-custom',
      }) as never,
      res as never,
      () => {
        nextCalls += 1;
      }
    );

    assert.equal(getStatusSent(), 204);
    assert.equal(nextCalls, 0);
    assert.equal(
      headers['Access-Control-Allow-Headers'],
      'authorization, x-custom'
    );
    assert.equal(
      headers['Access-Control-Allow-Methods'],
      'GET, POST, DELETE, OPTIONS'
    );
  });

  it('reflects the origin and varies on it', () => {
    const middleware = createCorsMiddleware();
    const { res, headers, varied } = createCorsResponseCapture();
    let nextCalls = 0;

    middleware(
      createCorsRequest('POST', { origin: 'https://client.test' }) as never,
      res as never,
      () => {
        nextCalls += 1;
      }
    );

    assert.equal(nextCalls, 1);
    assert.deepEqual(varied, ['Origin']);
    assert.equal(headers['Access-Control-Allow-Origin'], 'https://client.test');
    assert.equal(headers['Access-Control-Allow-Credentials'], 'true');
    assert.equal(headers['Access-Control-Expose-Headers'], 'mcp-session-id');
    assert.equal(headers['Access-Control-Max-Age'], '86400');
  });

  it('falls back to a wildcard origin and the default header list', () => {
    const middleware = createCorsMiddleware();
    const { res, headers, varied } = createCorsResponseCapture();

    middleware(createCorsRequest('GET', {}) as never, res as never, () => {});

    assert.deepEqual(varied, []);
    assert.equal(headers['Access-Control-Allow-Origin'], '*');
    assert.equal(
      headers['Access-Control-Allow-Headers'],
      'Content-Type, Authorization, mcp-session-id, mcp-protocol-version, Last-Event-ID'
    );
  });
});
