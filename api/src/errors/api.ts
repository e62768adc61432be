/**
 * API Errors
 *
 * Typed failures raised by services and middleware.
 * Converted to `{ message, code }` JSON by the onError handler in app.ts.
 */

export type ApiErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHENTICATED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'DELIVERY_FAILED';

export interface ApiErrorOptions {
  details?: unknown;
  cause?: unknown;
}

export class ApiError extends Error {
  readonly status: 400 | 401 | 404 | 409 | 502;
  readonly code: ApiErrorCode;
  readonly details?: unknown;

  constructor(
    message: string,
    status: ApiError['status'],
    code: ApiErrorCode,
    options: ApiErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
    this.details = options.details;
  }
}

/** Malformed or missing request input */
export class ValidationError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(message, 400, 'VALIDATION_ERROR', options);
    this.name = 'ValidationError';
  }
}

/** Bad credentials, or a missing/invalid bearer token */
export class AuthenticationError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(message, 401, 'UNAUTHENTICATED', options);
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(message, 404, 'NOT_FOUND', options);
    this.name = 'NotFoundError';
  }
}

/** Duplicate email or planet name */
export class ConflictError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(message, 409, 'CONFLICT', options);
    this.name = 'ConflictError';
  }
}

/** The mail transport rejected a send */
export class DeliveryError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(message, 502, 'DELIVERY_FAILED', options);
    this.name = 'DeliveryError';
  }
}

/**
 * True when a driver error is a PostgreSQL unique_violation (SQLSTATE 23505)
 *
 * postgres.js and pglite both expose `code`; some drizzle releases wrap the
 * driver error, so the cause chain is walked as well.
 */
export function isUniqueViolation(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current instanceof Object; depth++) {
    if ('code' in current && current.code === '23505') return true;
    current = 'cause' in current ? current.cause : undefined;
  }
  return false;
}
