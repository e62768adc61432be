/**
 * Authentication Routes
 *
 * Registration, token issuance and password recovery
 *
 * Routes:
 * - POST /register               (form body)
 * - POST /login                  (JSON or form body)
 * - GET  /retrieve_password/:email
 */

import { Hono, type Context } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import type { AppServices } from '@/services';
import { emailParamSchema, loginBodySchema, registerFormSchema } from '@/validators/auth';
import { rejectInvalid } from '@/validators/common';
import { AuthenticationError, ConflictError, ValidationError } from '@/errors/api';
import { serializeUser } from '@/utils/serialize';
import { logger } from '@/utils/logger';

/**
 * Read a body sent either as JSON or as a form
 */
async function readJsonOrForm(c: Context<HonoEnv>): Promise<unknown> {
  const contentType = c.req.header('Content-Type') ?? '';

  if (contentType.includes('application/json')) {
    try {
      return await c.req.json();
    } catch (error) {
      throw new ValidationError('Malformed JSON in request body', { cause: error });
    }
  }

  return c.req.parseBody();
}

export function createAuthRoutes(services: AppServices): Hono<HonoEnv> {
  const { users, auth, mail } = services;
  const routes = new Hono<HonoEnv>({ strict: false });

  /**
   * POST /register
   *
   * 409 if the email is taken, otherwise stores the user verbatim
   */
  routes.post('/register', zValidator('form', registerFormSchema, rejectInvalid), async (c) => {
    const form = c.req.valid('form');

    const existing = await users.findUserByEmail(form.email);
    if (existing) {
      throw new ConflictError('That email already exists.');
    }

    const user = await users.insertUser({
      firstname: form.firstname,
      lastname: form.lastname,
      email: form.email,
      password: form.password,
    });

    logger.info('User registered', { userId: user.id });

    return c.json({ message: 'User created successfully.', user: serializeUser(user) }, 201);
  });

  /**
   * POST /login
   *
   * Accepts application/json or form bodies with email and password
   */
  routes.post('/login', async (c) => {
    const { email, password } = loginBodySchema.parse(await readJsonOrForm(c));

    const issued = await auth.login(email, password);

    return c.json({
      message: 'Login succeeded!',
      access_token: issued.token,
      expires_at: issued.expiresAt.toISOString(),
    });
  });

  /**
   * GET /retrieve_password/:email
   *
   * Mails the stored password to a registered address
   */
  routes.get(
    '/retrieve_password/:email',
    zValidator('param', emailParamSchema, rejectInvalid),
    async (c) => {
      const { email } = c.req.valid('param');

      const user = await users.findUserByEmail(email);
      if (!user) {
        throw new AuthenticationError("That email doesn't exist");
      }

      await mail.sendPasswordRecovery(user.email, user.password);

      return c.json({ message: `Password sent to ${user.email}` });
    }
  );

  return routes;
}
