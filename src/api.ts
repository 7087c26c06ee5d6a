/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { buildLoggerOptions, createLogger } from './infra/logger/index.js';
import { makeDbHealthChecker, makeElectionDataChecker } from './modules/health/index.js';

const main = async (): Promise<void> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const loggerConfig = {
    level: config.logger.level,
    name: 'village-similarity-api',
    pretty: config.logger.pretty,
  };
  const logger = createLogger(loggerConfig);

  logger.info({ config: { server: config.server } }, 'Starting API server');

  const db = initDatabase(config);

  // Fastify builds its request logger from the same options
  const app = await buildApp({
    fastifyOptions: {
      logger: buildLoggerOptions(loggerConfig),
      disableRequestLogging: false,
    },
    deps: {
      config,
      logger,
      db,
      healthCheckers: [
        makeDbHealthChecker(db, { name: 'database' }),
        makeElectionDataChecker(db),
      ],
    },
    version: process.env['APP_VERSION'],
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await db.destroy();
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

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    await db.destroy();
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
