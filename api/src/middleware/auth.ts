/**
 * Authentication Middleware
 *
 * Resolves the caller's identity from `Authorization: Bearer <jwt>`.
 *
 * Sets context variables:
 * - c.get('identity') - email and token window of the authenticated user
 */

import type { MiddlewareHandler } from 'hono';
import type { HonoEnv } from '@/types/hono';
import type { AuthService } from '@/services/auth.service';
import { AuthenticationError } from '@/errors/api';
import { logger } from '@/utils/logger';

const BEARER_PREFIX = /^Bearer\s+/i;

/**
 * Authentication resolver middleware
 *
 * Never rejects: a missing or invalid token just leaves the request
 * anonymous. Protected routes add requireAuth.
 */
export function authResolver(auth: AuthService): MiddlewareHandler<HonoEnv> {
  return async (c, next) => {
    const header = c.req.header('Authorization');

    if (header && BEARER_PREFIX.test(header)) {
      const token = header.replace(BEARER_PREFIX, '').trim();

      try {
        c.set('identity', await auth.verify(token));
      } catch (error) {
        if (!(error instanceof AuthenticationError)) throw error;
        logger.debug('Bearer token rejected', { path: c.req.path, reason: String(error.cause ?? error.message) });
      }
    }

    return next();
  };
}

/**
 * Require authentication guard
 *
 * Answers 401 if authResolver did not resolve an identity.
 * Mount before body validators so bad payloads without a token still get 401.
 */
export const requireAuth: MiddlewareHandler<HonoEnv> = async (c, next) => {
  if (!c.get('identity')) {
    c.header('WWW-Authenticate', 'Bearer');
    return c.json(
      {
        message: 'Authentication required',
        code: 'UNAUTHENTICATED',
      },
      401
    );
  }

  return next();
};
