/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors } from '../infra/plugins/index.js';
import { makeElectionRepo } from '../modules/election-schema/index.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import {
  makeSimilarityRoutes,
  type VillageVotesSource,
} from '../modules/village-similarity/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { ElectionDbClient } from '../infra/database/client.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  /** Logger handed to use cases and repositories */
  logger: Logger;
  healthCheckers?: HealthChecker[];
  /** Used to build the election repository when `votesSource` is not given */
  db?: ElectionDbClient;
  /** Read side of the election repository; tests inject an in-memory one */
  votesSource?: VillageVotesSource;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version?: string | undefined;
}

const resolveVotesSource = (deps: AppDeps): VillageVotesSource => {
  if (deps.votesSource !== undefined) {
    return deps.votesSource;
  }
  if (deps.db !== undefined) {
    return makeElectionRepo({ db: deps.db, logger: deps.logger });
  }
  throw new Error('Missing required dependencies: db or votesSource');
};

/**
 * Creates and configures the Fastify application.
 * This is the composition root where all modules are wired together.
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { config, logger } = deps;

  const votesSource = resolveVotesSource(deps);

  const app = fastifyLib({
    ...fastifyOptions,
  });

  // Handlers must be set before the route plugins register so they inherit them
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  await registerCors(app, config);

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: deps.healthCheckers ?? [],
    })
  );

  await app.register(makeSimilarityRoutes({ repo: votesSource, logger }));

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
