import { randomUUID } from 'node:crypto';

import type {
  ErrorRequestHandler,
  Express,
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from 'express';

import { runWithRequestContext } from '../services/context.js';

import { HEALTH_PATHS } from './auth.js';
import { getSessionId } from './sessions.js';

export interface ServerIdentity {
  readonly name: string;
  readonly version: string;
}

export interface BaseMiddleware {
  readonly jsonParser: RequestHandler;
  readonly corsMiddleware: RequestHandler;
  readonly authMiddleware: RequestHandler;
  readonly streamIntegrityMiddleware: RequestHandler;
}

export function createJsonParseErrorHandler(): ErrorRequestHandler {
  return (
    err: unknown,
    _req: Request,
    res: Response,
    next: NextFunction
  ): void => {
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({
        jsonrpc: '2.0',
        error: {
          code: -32700,
          message: 'Parse error: Invalid JSON',
        },
        id: null,
      });
      return;
    }
    next(err);
  };
}

export function createContextMiddleware(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const requestId = randomUUID();
    const sessionId = getSessionId(req);

    runWithRequestContext(
      sessionId ? { requestId, sessionId } : { requestId },
      () => {
        next();
      }
    );
  };
}

/** Health answers every method and echoes the requested path. */
export function registerHealthRoute(
  app: Express,
  identity: ServerIdentity
): void {
  for (const path of HEALTH_PATHS) {
    app.all(path, (req: Request, res: Response) => {
      res.json({
        status: 'healthy',
        name: identity.name,
        version: identity.version,
        uptime: process.uptime(),
        path: req.path,
      });
    });
  }
}

export function attachBaseMiddleware(
  app: Express,
  middleware: BaseMiddleware,
  identity: ServerIdentity
): void {
  app.use(middleware.jsonParser);
  app.use(createContextMiddleware());
  app.use(createJsonParseErrorHandler());
  app.use(middleware.corsMiddleware);
  registerHealthRoute(app, identity);
  app.use(middleware.authMiddleware);
  app.use(middleware.streamIntegrityMiddleware);
}
