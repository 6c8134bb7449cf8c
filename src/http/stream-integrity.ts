import type {
  OutgoingHttpHeader,
  OutgoingHttpHeaders,
  ServerResponse,
} from 'node:http';

import type { NextFunction, Request, RequestHandler, Response } from 'express';

import type { StreamHeaderPolicy } from '../config/types.js';

/** Headers that keep proxies and load balancers from buffering a stream. */
export const ANTI_BUFFERING_HEADERS: Readonly<Record<string, string>> =
  Object.freeze({
    'X-Accel-Buffering': 'no',
    'Cache-Control': 'no-cache, no-transform',
    Connection: 'keep-alive',
    'Content-Encoding': 'identity',
    'X-Content-Type-Options': 'nosniff',
  });

const STREAMING_MEDIA_TYPES: ReadonlySet<string> = new Set([
  'text/event-stream',
  'application/x-ndjson',
  'application/stream+json',
]);

type HeaderList = OutgoingHttpHeaders | OutgoingHttpHeader[];

/** Minimal structured view of an outgoing header collection. */
export interface OutgoingHeaderTarget {
  getHeader: (name: string) => number | string | string[] | undefined;
  setHeader: (name: string, value: number | string | readonly string[]) => unknown;
}

const patchedResponses = new WeakSet<ServerResponse>();

export function isStreamingContentType(value: unknown): boolean {
  const raw = Array.isArray(value) ? value[0] : value;
  if (typeof raw !== 'string') return false;
  const mediaType = raw.split(';')[0]?.trim().toLowerCase() ?? '';
  return STREAMING_MEDIA_TYPES.has(mediaType);
}

export function shouldApplyStreamHeaders(
  policy: StreamHeaderPolicy,
  contentType: unknown
): boolean {
  return policy === 'permissive' || isStreamingContentType(contentType);
}

/**
 * Sets each anti-buffering header exactly once. Other headers already on
 * the target are left untouched. Returns whether the policy applied.
 */
export function applyStreamIntegrityHeaders(
  target: OutgoingHeaderTarget,
  policy: StreamHeaderPolicy
): boolean {
  if (!shouldApplyStreamHeaders(policy, target.getHeader('content-type'))) {
    return false;
  }
  for (const [name, value] of Object.entries(ANTI_BUFFERING_HEADERS)) {
    target.setHeader(name, value);
  }
  return true;
}

function mergeHeaderList(res: ServerResponse, headers: HeaderList): void {
  if (!Array.isArray(headers)) {
    for (const [name, value] of Object.entries(headers)) {
      if (value !== undefined) res.setHeader(name, value);
    }
    return;
  }

  // Flat [name, value, name, value] form.
  for (let i = 0; i + 1 < headers.length; i += 2) {
    const name = headers[i];
    const value = headers[i + 1];
    if (typeof name === 'string' && value !== undefined) {
      res.setHeader(name, value);
    }
  }
}

/**
 * Intercepts `writeHead` so the policy sees the final header collection,
 * including headers handed straight to `writeHead`, before the head is
 * written. Installing twice on one response is a no-op.
 */
export function installStreamIntegrity(
  res: ServerResponse,
  policy: StreamHeaderPolicy
): void {
  if (patchedResponses.has(res)) return;
  patchedResponses.add(res);

  const originalWriteHead = res.writeHead.bind(res);

  res.writeHead = (
    statusCode: number,
    reasonOrHeaders?: string | HeaderList,
    maybeHeaders?: HeaderList
  ): ServerResponse => {
    const statusMessage =
      typeof reasonOrHeaders === 'string' ? reasonOrHeaders : undefined;
    const headers =
      typeof reasonOrHeaders === 'string' ? maybeHeaders : reasonOrHeaders;

    if (!res.headersSent) {
      if (headers) mergeHeaderList(res, headers);
      applyStreamIntegrityHeaders(res, policy);
    }

    return statusMessage === undefined
      ? originalWriteHead(statusCode)
      : originalWriteHead(statusCode, statusMessage);
  };
}

export function createStreamIntegrityMiddleware(
  policy: StreamHeaderPolicy
): RequestHandler {
  return (_req: Request, res: Response, next: NextFunction): void => {
    installStreamIntegrity(res, policy);
    next();
  };
}
