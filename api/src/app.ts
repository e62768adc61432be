/**
 * Planetary API Application
 *
 * Builds the Hono app around injected services:
 * - Greetings (/, /super_simple, /parameters, /url_variables)
 * - Planet catalogue (/planets, /planet_detail, /add_planet, ...)
 * - Accounts (/register, /login, /retrieve_password)
 */

import { Hono } from 'hono';
import type { HonoEnv } from '@/types/hono';
import type { AppServices } from '@/services';
import { securityHeaders } from '@/middleware/securityHeaders';
import { requestLogger } from '@/middleware/requestLogger';
import { errorHandler } from '@/middleware/errorHandler';
import { authResolver } from '@/middleware/auth';
import { createGreetingRoutes } from '@/routes/greetings';
import { createAuthRoutes } from '@/routes/auth';
import { createPlanetRoutes } from '@/routes/planets';

export const API_VERSION = '1.0.0';

export function createApp(services: AppServices): Hono<HonoEnv> {
  // strict: false lets /planets/ and /planets resolve to the same route
  const app = new Hono<HonoEnv>({ strict: false });

  // Global middleware chain
  app.use('*', requestLogger);
  app.use('*', securityHeaders);
  app.use('*', authResolver(services.auth));

  // Health check endpoint
  app.get('/health', async (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
      planets: await services.planets.countPlanets(),
    });
  });

  app.route('/', createGreetingRoutes());
  app.route('/', createAuthRoutes(services));
  app.route('/', createPlanetRoutes(services));

  app.onError(errorHandler);

  app.notFound((c) => {
    return c.json(
      {
        message: 'Endpoint not found',
        code: 'NOT_FOUND',
      },
      404
    );
  });

  return app;
}
