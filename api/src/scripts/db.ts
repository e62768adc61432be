/**
 * Database admin commands
 *
 * Usage: npm run db -- create | drop | seed
 */

import 'dotenv/config';
import { z } from 'zod';
import { databaseEnvSchema, resolveDatabaseSsl } from '@/config';
import { createDatabase } from '@/db/client';
import { createTables, dropTables, seedDatabase } from '@/db/admin';
import { logger } from '@/utils/logger';

const commandSchema = z.enum(['create', 'drop', 'seed']);

async function main() {
  const command = commandSchema.parse(process.argv[2]);
  const env = databaseEnvSchema.parse(process.env);
  const { db, close } = createDatabase({
    url: env.DATABASE_URL,
    poolSize: 1,
    ssl: resolveDatabaseSsl(env),
  });

  try {
    switch (command) {
      case 'create':
        await createTables(db);
        logger.info('Database created!');
        break;
      case 'drop':
        await dropTables(db);
        logger.info('Database dropped');
        break;
      case 'seed': {
        const inserted = await seedDatabase(db);
        logger.info('Database seeded', inserted);
        break;
      }
    }
  } finally {
    await close();
  }
}

main().catch((e) => {
  logger.error('Database command failed', { error: String(e) });
  process.exit(1);
});
