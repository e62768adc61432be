/**
 * Planetary API Server
 *
 * Loads configuration, opens the database pool and SMTP transport,
 * and serves the app until SIGTERM/SIGINT.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadConfig } from '@/config';
import { createDatabase } from '@/db/client';
import { createServices } from '@/services';
import { createApp } from '@/app';
import { logger } from '@/utils/logger';

const config = loadConfig();
const database = createDatabase(config.database);
const services = createServices({ db: database.db, auth: config.auth, mail: config.mail });
const app = createApp(services);

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

logger.info('Planetary API listening', { url: `http://localhost:${config.port}`, env: config.env });

// Graceful shutdown with request drain
function gracefulShutdown(signal: string) {
  logger.info(`${signal} received: shutting down gracefully...`);
  server.close(() => {
    logger.info('HTTP server closed');
    Promise.all([database.close(), services.mail.close()])
      .then(() => {
        logger.info('Database and mail connections closed');
        process.exit(0);
      })
      .catch((err) => {
        logger.error('Error during shutdown', { error: String(err) });
        process.exit(1);
      });
  });
  // Force exit if the drain takes too long
  setTimeout(() => {
    logger.error('Forced shutdown after 10s timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
