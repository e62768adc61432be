/**
 * Error Handler
 *
 * Global error handling for the API, registered with app.onError.
 * Converts every thrown error into a `{ message, code }` JSON body.
 */

import type { Context, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ZodError } from 'zod';
import type { HonoEnv } from '@/types/hono';
import { ApiError } from '@/errors/api';
import { logger } from '@/utils/logger';

/**
 * Error response format
 */
export interface ErrorResponse {
  message: string;
  code: string;
  details?: unknown;
}

// Only show internal error messages in development and test
function isVerboseErrors(): boolean {
  const env = process.env.NODE_ENV;
  return env === 'development' || env === 'test';
}

function respond(c: Context, status: ContentfulStatusCode, body: ErrorResponse) {
  return c.json<ErrorResponse>(body, status);
}

export const errorHandler: ErrorHandler<HonoEnv> = (error, c) => {
  if (error instanceof ApiError) {
    const log = error.status >= 500 ? logger.error : logger.debug;
    log('Request rejected', {
      code: error.code,
      message: error.message,
      cause: error.cause ? String(error.cause) : undefined,
      path: c.req.path,
      method: c.req.method,
      requestId: c.get('requestId'),
    });

    return respond(c, error.status, {
      message: error.message,
      code: error.code,
      ...(error.details !== undefined && { details: error.details }),
    });
  }

  // Schemas parsed by hand inside handlers
  if (error instanceof ZodError) {
    return respond(c, 400, {
      message: 'Invalid request data',
      code: 'VALIDATION_ERROR',
      details: error.issues,
    });
  }

  // Raised by Hono itself, e.g. malformed JSON bodies
  if (error instanceof HTTPException) {
    const status = error.status;
    return respond(c, status, {
      message: error.message || 'Request could not be processed',
      code: status < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR',
    });
  }

  logger.error('Unhandled error', {
    error: String(error),
    stack: error.stack,
    cause: error.cause ? String(error.cause) : undefined,
    path: c.req.path,
    method: c.req.method,
    requestId: c.get('requestId'),
  });

  return respond(c, 500, {
    message: isVerboseErrors() ? error.message : 'An internal error occurred',
    code: 'INTERNAL_ERROR',
  });
};
