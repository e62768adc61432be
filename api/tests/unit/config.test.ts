import { describe, it, expect } from 'vitest';
import { databaseEnvSchema, loadConfig, resolveDatabaseSsl } from '@/config';

const baseEnv = {
  DATABASE_URL: 'postgresql://localhost:5432/planets',
  JWT_SECRET: 'test-secret',
  MAIL_HOST: 'smtp.example.com',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ ...baseEnv });

    expect(config.env).toBe('development');
    expect(config.port).toBe(3000);
    expect(config.database).toEqual({
      url: 'postgresql://localhost:5432/planets',
      poolSize: 10,
      ssl: false,
    });
    expect(config.auth).toEqual({ secret: 'test-secret', ttlSeconds: 900 });
    expect(config.mail.port).toBe(587);
    expect(config.mail.from).toBe('admin@planetary-api.com');
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ ...baseEnv, PORT: '8080', JWT_TTL_SECONDS: '60', DB_POOL_SIZE: '3' });

    expect(config.port).toBe(8080);
    expect(config.auth.ttlSeconds).toBe(60);
    expect(config.database.poolSize).toBe(3);
  });

  it('turns on database SSL in production unless disabled', () => {
    expect(loadConfig({ ...baseEnv, NODE_ENV: 'production' }).database.ssl).toBe(true);
    expect(loadConfig({ ...baseEnv, NODE_ENV: 'production', DB_SSL: 'false' }).database.ssl).toBe(false);
  });

  it('names every missing variable', () => {
    expect(() => loadConfig({})).toThrow(
      'Invalid configuration: DATABASE_URL: Required; JWT_SECRET: Required; MAIL_HOST: Required'
    );
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ ...baseEnv, PORT: 'abc' })).toThrow(/^Invalid configuration: PORT: /);
  });
});

describe('databaseEnvSchema', () => {
  it('needs only the database variables', () => {
    const env = databaseEnvSchema.parse({ DATABASE_URL: 'postgresql://localhost:5432/planets' });

    expect(env).toEqual({ NODE_ENV: 'development', DATABASE_URL: 'postgresql://localhost:5432/planets' });
    expect(resolveDatabaseSsl(env)).toBe(false);
  });

  it('shares the production SSL default with loadConfig', () => {
    const env = databaseEnvSchema.parse({ DATABASE_URL: 'postgresql://db/planets', NODE_ENV: 'production' });

    expect(resolveDatabaseSsl(env)).toBe(true);
    expect(resolveDatabaseSsl({ ...env, DB_SSL: 'false' })).toBe(false);
  });
});
