import { randomUUID } from 'node:crypto';

import type { NextFunction, Request, RequestHandler, Response } from 'express';

import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';

import type { CredentialStore } from '../auth/credential-store.js';
import { ROLE_SCOPES, type Role } from '../auth/roles.js';

import type { ErrorResponse } from '../config/types.js';

import { describeToken } from '../crypto.js';

import { UnauthorizedError } from '../errors/app-error.js';

import { getRequestId, runWithRole } from '../services/context.js';
import { logDebug, logWarn } from '../services/logger.js';

export const HEALTH_PATHS: readonly string[] = ['/health'];

const BEARER_PREFIX = /^bearer\s+/i;

export interface AuthMiddlewareOptions {
  readonly credentials: CredentialStore;
  readonly exemptPaths?: readonly string[];
}

function normalizeHeaderValue(
  header: string | string[] | undefined
): string | undefined {
  return Array.isArray(header) ? header[0] : header;
}

/** Missing, non-bearer and malformed headers all yield the empty token. */
export function getBearerToken(req: Pick<Request, 'headers'>): string {
  const authHeader = normalizeHeaderValue(req.headers.authorization);
  if (!authHeader || !BEARER_PREFIX.test(authHeader)) return '';
  return authHeader.replace(BEARER_PREFIX, '').trim();
}

function isExempt(req: Request, exemptPaths: ReadonlySet<string>): boolean {
  return req.method === 'OPTIONS' || exemptPaths.has(req.path);
}

function buildAuthInfo(
  token: string,
  role: Role,
  openAccess: boolean
): AuthInfo {
  return {
    token,
    clientId: openAccess ? 'open-access' : role,
    scopes: [...ROLE_SCOPES[role]],
    extra: { role },
  };
}

function respondUnauthorized(res: Response): void {
  const error = new UnauthorizedError();
  const body: ErrorResponse = {
    error: {
      message: error.message,
      code: error.code,
      statusCode: error.statusCode,
    },
  };
  res.set(
    'WWW-Authenticate',
    `Bearer realm="mcp", error="invalid_token", error_description="${error.message}"`
  );
  res.status(error.statusCode).json(body);
}

export function createAuthMiddleware(
  options: AuthMiddlewareOptions
): RequestHandler {
  const { credentials } = options;
  const exemptPaths = new Set(options.exemptPaths ?? HEALTH_PATHS);
  const openAccess = credentials.isOpenAccess();

  return (req: Request, res: Response, next: NextFunction): void => {
    if (isExempt(req, exemptPaths)) {
      next();
      return;
    }

    const token = getBearerToken(req);
    const role = credentials.resolveRole(token);

    if (!role) {
      logWarn('Rejected unauthenticated request', {
        method: req.method,
        path: req.path,
        token: describeToken(token),
      });
      respondUnauthorized(res);
      return;
    }

    if (openAccess) {
      logDebug('No credentials configured; granting read-write', {
        path: req.path,
      });
    }

    Object.assign(req, { auth: buildAuthInfo(token, role, openAccess) });
    runWithRole(role, getRequestId() ?? randomUUID(), () => {
      next();
    });
  };
}
