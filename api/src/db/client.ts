/**
 * Database Connection Pool
 *
 * Manages PostgreSQL connections using the `postgres` driver
 * with Drizzle ORM for type-safe queries.
 *
 * Nothing connects at import time: the server bootstrap and the admin
 * script each open their own handle and close it on shutdown.
 */

import postgres from 'postgres';
import { drizzle } from 'drizzle-orm/postgres-js';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import * as schema from './schema';

/**
 * Driver-agnostic Drizzle handle
 *
 * Services only depend on this so they run unchanged against postgres.js
 * in production and an in-process database in tests.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface DatabaseOptions {
  url: string;
  poolSize: number;
  ssl: boolean;
}

export interface DatabaseHandle {
  db: Database;
  close: () => Promise<void>;
}

/**
 * Open a connection pool and wrap it with Drizzle
 */
export function createDatabase(options: DatabaseOptions): DatabaseHandle {
  const sql = postgres(options.url, {
    max: options.poolSize,
    idle_timeout: 20, // Close idle connections after 20 seconds
    connect_timeout: 10,
    ssl: options.ssl ? 'require' : false,
  });

  const db = drizzle(sql, { schema });

  return {
    db,
    close: async () => {
      await sql.end();
    },
  };
}
