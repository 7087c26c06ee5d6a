/**
 * Health check routes
 *
 * - GET /health/live: the process is up
 * - GET /health/ready: the database answers and election data is published
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { FastifyPluginAsync } from 'fastify';

export const makeHealthRoutes = (deps: Partial<GetReadinessDeps> = {}): FastifyPluginAsync => {
  const { version, checkers = [] } = deps;
  const startTime = Date.now();

  return async (fastify) => {
    // Does not touch dependencies; that is the readiness probe's job
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      {
        schema: {
          response: {
            200: LivenessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        return reply.status(200).send({ status: 'ok' });
      }
    );

    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);

        const response = await getReadiness(
          { version, checkers },
          { uptime: uptimeSeconds, timestamp: new Date().toISOString() }
        );

        return reply.status(response.status === 'unhealthy' ? 503 : 200).send(response);
      }
    );
  };
};
