/**
 * Greeting Routes
 *
 * Static and parameter-echo endpoints.
 *
 * Routes:
 * - GET /
 * - GET /super_simple
 * - GET /parameters?name=...&age=...
 * - GET /url_variables/:name/:age
 */

import { Hono, type Context } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { ageParamSchema, ageQuerySchema } from '@/validators/greetings';
import { rejectInvalid } from '@/validators/common';
import { AuthenticationError } from '@/errors/api';
import { titleCase } from '@/utils/text';

export const MINIMUM_AGE = 18;

/**
 * Shared age gate for the query and path variants
 */
function ageGate(c: Context<HonoEnv>, name: string, age: number) {
  const displayName = titleCase(name);

  if (age < MINIMUM_AGE) {
    throw new AuthenticationError(`Sorry ${displayName}, you aren't old enough, get lost.`);
  }

  return c.json({ message: `Welcome back ${displayName}.` }, 200);
}

export function createGreetingRoutes(): Hono<HonoEnv> {
  const greetings = new Hono<HonoEnv>({ strict: false });

  greetings.get('/', (c) => c.json({ message: 'Hello World!' }));

  greetings.get('/super_simple', (c) => c.json({ message: 'hello Earth!' }));

  greetings.get('/parameters', zValidator('query', ageQuerySchema, rejectInvalid), (c) => {
    const { name, age } = c.req.valid('query');
    return ageGate(c, name, age);
  });

  greetings.get(
    '/url_variables/:name/:age',
    zValidator('param', ageParamSchema, rejectInvalid),
    (c) => {
      const { name, age } = c.req.valid('param');
      return ageGate(c, name, age);
    }
  );

  return greetings;
}
