import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { MockAgent } from 'undici';

import { UpstreamError } from '../src/errors/app-error.js';
import { TrelloClient } from '../src/services/trello-client.js';
import {
  TrelloAnySchema,
  TrelloBoardSchema,
  TrelloCardSchema,
} from '../src/types/trello.types.js';

const ORIGIN = 'https://api.trello.test';

function createClient(agent: MockAgent, timeoutMs = 1000): TrelloClient {
  return new TrelloClient({
    apiKey: 'test-key',
    token: 'test-token',
    baseUrl: new URL(`${ORIGIN}/1`),
    timeoutMs,
    dispatcher: agent,
  });
}

async function rejectsWithUpstream(
  promise: Promise<unknown>
): Promise<UpstreamError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof UpstreamError) return error;
    throw error;
  }
  assert.fail('expected an UpstreamError');
}

describe('TrelloClient', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('builds URLs under the API version with credentials first', () => {
    const client = createClient(agent);
    const url = client.buildUrl('/boards/b1', {
      fields: 'name',
      limit: 5,
      skipped: undefined,
    });

    assert.equal(
      url.href,
      `${ORIGIN}/1/boards/b1?key=test-key&token=test-token&fields=name&limit=5`
    );
  });

  it('parses a successful response with the given schema', async () => {
    let seenPath = '';
    agent
      .get(ORIGIN)
      .intercept({
        method: 'GET',
        path: (path) => {
          seenPath = path;
          return path.startsWith('/1/boards/b1?');
        },
      })
      .reply(200, { id: 'b1', name: 'Roadmap', extra: 'kept' });

    const board = await createClient(agent).request(
      { method: 'GET', path: '/boards/b1' },
      TrelloBoardSchema
    );

    assert.equal(seenPath, '/1/boards/b1?key=test-key&token=test-token');
    assert.equal(board.id, 'b1');
    assert.equal(board.name, 'Roadmap');
    assert.equal(board.extra, 'kept');
  });

  it('sends JSON bodies on writes', async () => {
    let sentBody = '';
    agent
      .get(ORIGIN)
      .intercept({
        method: 'POST',
        path: (path) => path.startsWith('/1/cards?'),
        body: (body) => {
          sentBody = body;
          return true;
        },
      })
      .reply(200, { id: 'c1', name: 'Write tests' });

    const card = await createClient(agent).request(
      {
        method: 'POST',
        path: '/cards',
        body: { idList: 'l1', name: 'Write tests' },
      },
      TrelloCardSchema
    );

    assert.equal(card.id, 'c1');
    assert.deepEqual(JSON.parse(sentBody), {
      idList: 'l1',
      name: 'Write tests',
    });
  });

  it('treats an empty success body as an empty object', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        method: 'DELETE',
        path: (path) => path.startsWith('/1/cards/c1?'),
      })
      .reply(200, '');

    const result = await createClient(agent).request(
      { method: 'DELETE', path: '/cards/c1' },
      TrelloAnySchema
    );

    assert.deepEqual(result, {});
  });

  it('maps non-2xx responses to upstream errors', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        method: 'GET',
        path: (path) => path.startsWith('/1/cards/missing?'),
      })
      .reply(404, 'The requested resource was not found.');

    const error = await rejectsWithUpstream(
      createClient(agent).request(
        { method: 'GET', path: '/cards/missing' },
        TrelloCardSchema
      )
    );

    assert.equal(error.statusCode, 404);
    assert.equal(error.code, 'HTTP_404');
    assert.equal(
      error.message,
      'Trello API 404: The requested resource was not found.'
    );
    assert.deepEqual(error.details, {
      path: '/cards/missing',
      httpStatus: 404,
      method: 'GET',
    });
  });

  it('carries Retry-After on rate limiting', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        method: 'GET',
        path: (path) => path.startsWith('/1/search?'),
      })
      .reply(429, 'slow down', { headers: { 'retry-after': '12' } });

    const error = await rejectsWithUpstream(
      createClient(agent).request(
        { method: 'GET', path: '/search', query: { query: 'x' } },
        TrelloAnySchema
      )
    );

    assert.equal(error.statusCode, 429);
    assert.equal(error.details.retryAfter, 12);
  });

  it('rejects responses that do not match the schema', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        method: 'GET',
        path: (path) => path.startsWith('/1/boards/b2?'),
      })
      .reply(200, { name: 'No id' });

    const error = await rejectsWithUpstream(
      createClient(agent).request(
        { method: 'GET', path: '/boards/b2' },
        TrelloBoardSchema
      )
    );

    assert.equal(error.message, 'Unexpected Trello response shape');
    assert.equal(error.code, 'UPSTREAM_ERROR');
    assert.equal(error.statusCode, 502);
  });

  it('reports network failures without a status code', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        method: 'GET',
        path: (path) => path.startsWith('/1/members/me?'),
      })
      .replyWithError(new Error('socket hang up'));

    const error = await rejectsWithUpstream(
      createClient(agent).request(
        { method: 'GET', path: '/members/me' },
        TrelloAnySchema
      )
    );

    assert.equal(error.message, 'Network error: could not reach Trello');
    assert.equal(error.statusCode, 502);
  });

  it('times out slow responses', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        method: 'GET',
        path: (path) => path.startsWith('/1/boards/slow?'),
      })
      .reply(200, { id: 'slow', name: 'Slow' })
      .delay(500);

    const error = await rejectsWithUpstream(
      createClient(agent, 20).request(
        { method: 'GET', path: '/boards/slow' },
        TrelloBoardSchema
      )
    );

    assert.equal(error.statusCode, 504);
    assert.equal(error.message, 'Trello request timed out after 20ms');
  });
});
