/**
 * Request Logging Middleware
 *
 * One structured line per request with status and duration.
 * Also assigns the request id echoed back in X-Request-ID.
 */

import crypto from 'crypto';
import type { MiddlewareHandler } from 'hono';
import type { HonoEnv } from '@/types/hono';
import { logger } from '@/utils/logger';

export const requestLogger: MiddlewareHandler<HonoEnv> = async (c, next) => {
  const requestId = c.req.header('X-Request-ID') || crypto.randomUUID();
  const started = performance.now();

  c.set('requestId', requestId);
  c.header('X-Request-ID', requestId);

  await next();

  const log = logger.child({ requestId });
  const status = c.res.status;
  const entry = {
    method: c.req.method,
    path: c.req.path,
    status,
    durationMs: Math.round((performance.now() - started) * 100) / 100,
  };

  if (status >= 500) {
    log.error('Request failed', entry);
  } else {
    log.info('Request completed', entry);
  }
};
