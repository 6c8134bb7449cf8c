export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details: Record<string, unknown>;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Missing or invalid credentials') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class PermissionDeniedError extends AppError {
  readonly operation: string;
  readonly actualRole: string;

  constructor(operation: string, actualRole: string | undefined) {
    const role = actualRole ?? 'none';
    super(
      `Tool '${operation}' requires read-write access. Your current API key only has ${role} access.`,
      403,
      'PERMISSION_DENIED',
      { operation, requiredRole: 'read-write', actualRole: role }
    );
    this.operation = operation;
    this.actualRole = role;
  }
}

export class UpstreamError extends AppError {
  readonly path: string;

  constructor(
    message: string,
    path: string,
    httpStatus?: number,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      httpStatus ?? 502,
      httpStatus ? `HTTP_${httpStatus}` : 'UPSTREAM_ERROR',
      { path, httpStatus, ...details }
    );
    this.path = path;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 500, 'CONFIG_ERROR');
  }
}
