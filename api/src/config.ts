/**
 * Runtime Configuration
 *
 * Parses process.env once at start-up. Secrets (JWT_SECRET, MAIL_PASSWORD)
 * are only ever read from the environment.
 */

import { z } from 'zod';

const portSchema = z.coerce.number().int().min(1).max(65535);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: portSchema.default(3000),

  DATABASE_URL: z.string().min(1),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
  DB_SSL: z.enum(['true', 'false']).optional(),

  JWT_SECRET: z.string().min(1),
  JWT_TTL_SECONDS: z.coerce.number().int().positive().default(15 * 60),

  MAIL_HOST: z.string().min(1),
  MAIL_PORT: portSchema.default(587),
  MAIL_USER: z.string().optional(),
  MAIL_PASSWORD: z.string().optional(),
  MAIL_FROM: z.string().email().default('admin@planetary-api.com'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * The subset the database admin CLI needs
 */
export const databaseEnvSchema = envSchema.pick({
  NODE_ENV: true,
  DATABASE_URL: true,
  DB_SSL: true,
});

/**
 * SSL defaults on in production unless DB_SSL says otherwise
 */
export function resolveDatabaseSsl(vars: Pick<Env, 'NODE_ENV' | 'DB_SSL'>): boolean {
  return vars.DB_SSL ? vars.DB_SSL === 'true' : vars.NODE_ENV === 'production';
}

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  database: {
    url: string;
    poolSize: number;
    ssl: boolean;
  };
  auth: {
    secret: string;
    ttlSeconds: number;
  };
  mail: {
    host: string;
    port: number;
    user?: string;
    password?: string;
    from: string;
  };
}

/**
 * Validate the environment and shape it into AppConfig
 *
 * @throws Error naming every missing or invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;

  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    database: {
      url: vars.DATABASE_URL,
      poolSize: vars.DB_POOL_SIZE,
      ssl: resolveDatabaseSsl(vars),
    },
    auth: {
      secret: vars.JWT_SECRET,
      ttlSeconds: vars.JWT_TTL_SECONDS,
    },
    mail: {
      host: vars.MAIL_HOST,
      port: vars.MAIL_PORT,
      user: vars.MAIL_USER,
      password: vars.MAIL_PASSWORD,
      from: vars.MAIL_FROM,
    },
  };
}
