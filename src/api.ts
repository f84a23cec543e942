/**
 * API server entry point
 * Opens the food store and starts the Fastify HTTP server
 */

import 'dotenv/config';

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { ensureFoodSchema } from './infra/database/food/schema.js';
import { makeFoodStore } from './infra/database/store.js';
import { createLogger } from './infra/logger/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server, database: config.database } }, 'Starting API server');

  // Open the store once; every repository shares it
  const db = initDatabase(config);
  if (config.database.createSchema) {
    await ensureFoodSchema(db);
    logger.info('Food store schema ensured');
  }
  const store = makeFoodStore({ db, logger });

  const app = await buildApp({
    fastifyOptions: {
      loggerInstance: logger,
      disableRequestLogging: false,
    },
    deps: {
      store,
      config,
      logger,
    },
    version: process.env['APP_VERSION'] ?? '0.1.0',
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await store.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    await store.close();
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
