import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  PermissionDeniedError,
  UpstreamError,
  ValidationError,
} from '../src/errors/app-error.js';
import {
  createToolErrorResponse,
  handleToolError,
} from '../src/utils/tool-error-handler.js';

describe('createToolErrorResponse', () => {
  it('mirrors the structured payload in the text content', () => {
    const response = createToolErrorResponse('Nope', 'TEST_CODE');

    assert.equal(response.isError, true);
    assert.deepEqual(response.structuredContent, {
      error: 'Nope',
      code: 'TEST_CODE',
    });
    assert.deepEqual(response.content, [
      { type: 'text', text: '{"error":"Nope","code":"TEST_CODE"}' },
    ]);
  });

  it('omits empty details', () => {
    const response = createToolErrorResponse('Nope', 'TEST_CODE', {});
    assert.equal('details' in response.structuredContent, false);
  });
});

describe('handleToolError', () => {
  it('reports invalid arguments with their paths', () => {
    const response = handleToolError(
      new ValidationError('Invalid arguments: card_id: Required'),
      'get_card'
    );

    assert.deepEqual(response.structuredContent, {
      error: 'Invalid arguments: card_id: Required',
      code: 'VALIDATION_ERROR',
    });
  });

  it('returns permission denials with their details', () => {
    const response = handleToolError(
      new PermissionDeniedError('delete_card', 'read-only'),
      'delete_card'
    );

    assert.equal(response.structuredContent.code, 'PERMISSION_DENIED');
    assert.equal(
      response.structuredContent.error,
      "Tool 'delete_card' requires read-write access. Your current API key only has read-only access."
    );
    assert.deepEqual(response.structuredContent.details, {
      operation: 'delete_card',
      requiredRole: 'read-write',
      actualRole: 'read-only',
    });
  });

  it('passes upstream status codes through', () => {
    const response = handleToolError(
      new UpstreamError('Trello API 404: board not found', '/boards/b1', 404, {
        method: 'GET',
      }),
      'get_board'
    );

    assert.deepEqual(response.structuredContent, {
      error: 'Trello API 404: board not found',
      code: 'HTTP_404',
      details: { path: '/boards/b1', httpStatus: 404, method: 'GET' },
    });
  });

  it('keeps application error messages as they are', () => {
    const response = handleToolError(new ValidationError('bad'), 'x');
    assert.deepEqual(response.structuredContent, {
      error: 'bad',
      code: 'VALIDATION_ERROR',
    });
  });

  it('prefixes unexpected errors with the fallback message', () => {
    assert.equal(
      handleToolError(new Error('boom'), 'x').structuredContent.error,
      'Operation failed: boom'
    );
    const response = handleToolError('weird', 'x', 'Lookup failed');
    assert.deepEqual(response.structuredContent, {
      error: 'Lookup failed: Unknown error',
      code: 'UNKNOWN_ERROR',
    });
  });
});
