import type { NextFunction, Request, RequestHandler, Response } from 'express';

const DEFAULT_ALLOWED_HEADERS =
  'Content-Type, Authorization, mcp-session-id, mcp-protocol-version, Last-Event-ID';

function normalizeHeaderValue(
  header: string | string[] | undefined
): string | undefined {
  return Array.isArray(header) ? header.join(', ') : header;
}

function resolveAllowedHeaders(req: Request): string {
  const requested = normalizeHeaderValue(
    req.headers['access-control-request-headers']
  )?.trim();
  return requested ? requested : DEFAULT_ALLOWED_HEADERS;
}

function applyCorsHeaders(req: Request, res: Response): void {
  const { origin } = req.headers;
  if (origin) {
    res.vary('Origin');
  }
  res.header('Access-Control-Allow-Origin', origin ?? '*');
  res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
  res.header('Access-Control-Allow-Headers', resolveAllowedHeaders(req));
  res.header('Access-Control-Allow-Credentials', 'true');
  res.header('Access-Control-Expose-Headers', 'mcp-session-id');
  res.header('Access-Control-Max-Age', '86400');
}

/** Open CORS policy. Pre-flight is answered here, ahead of authentication. */
export function createCorsMiddleware(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    applyCorsHeaders(req, res);

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }

    next();
  };
}
