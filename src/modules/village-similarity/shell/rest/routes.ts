/**
 * Village Similarity REST Routes
 *
 * - GET /api/v1/similarity: national shares and the paged village ranking
 * - GET /api/v1/similarity/villages: exact lookup of one village's row
 *
 * Both recompute the ranking from the persisted relations on every request.
 */

import {
  ErrorResponseSchema,
  RankingQuerySchema,
  RankingResponseSchema,
  VillageQuerySchema,
  VillageResponseSchema,
  type RankingQuery,
  type VillageQuery,
} from './schemas.js';
import { getHttpStatusForError, type ComputeRankingError } from '../../core/errors.js';
import { filterRanking, paginateRanking } from '../../core/filter.js';
import { computeRanking } from '../../core/usecases/compute-ranking.js';

import type { VillageVotesSource } from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import type { Logger } from 'pino';

export interface MakeSimilarityRoutesDeps {
  repo: VillageVotesSource;
  logger: Logger;
}

const sendError = (reply: FastifyReply, error: ComputeRankingError) =>
  reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });

export const makeSimilarityRoutes = (deps: MakeSimilarityRoutesDeps): FastifyPluginAsync => {
  const { repo, logger } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/similarity - Ranked villages
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: RankingQuery }>(
      '/api/v1/similarity',
      {
        schema: {
          querystring: RankingQuerySchema,
          response: {
            200: RankingResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { limit, offset } = request.query;

        const result = await computeRanking({ repo, logger });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        const report = result.value;
        return reply.status(200).send({
          ok: true,
          data: {
            candidates: report.candidates,
            national: report.national,
            totalVotes: report.totalVotes,
            total: report.rows.length,
            limit,
            offset,
            rows: paginateRanking(report.rows, { limit, offset }),
            excludedVillages: report.excludedVillages,
          },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/similarity/villages - Exact village lookup
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: VillageQuery }>(
      '/api/v1/similarity/villages',
      {
        schema: {
          querystring: VillageQuerySchema,
          response: {
            200: VillageResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await computeRanking({ repo, logger });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({
          ok: true,
          data: {
            candidates: result.value.candidates,
            rows: filterRanking(result.value.rows, request.query),
          },
        });
      }
    );
  };
};
