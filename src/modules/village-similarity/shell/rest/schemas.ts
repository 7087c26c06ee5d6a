/**
 * Village Similarity REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const RankingQuerySchema = Type.Object(
  {
    limit: Type.Integer({ minimum: 1, maximum: MAX_PAGE_LIMIT, default: DEFAULT_PAGE_LIMIT }),
    offset: Type.Integer({ minimum: 0, default: 0 }),
  },
  { additionalProperties: false }
);

export type RankingQuery = Static<typeof RankingQuerySchema>;

/**
 * Exact-match village lookup. All three fields are required.
 */
export const VillageQuerySchema = Type.Object(
  {
    county: Type.String({ minLength: 1 }),
    town: Type.String({ minLength: 1 }),
    village: Type.String({ minLength: 1 }),
  },
  { additionalProperties: false }
);

export type VillageQuery = Static<typeof VillageQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const CandidateShareSchema = Type.Object({
  id: Type.Integer(),
  name: Type.String(),
  votes: Type.Integer({ minimum: 0 }),
  share: Type.Number({ minimum: 0, maximum: 1 }),
});

const VillageKeySchema = Type.Object({
  county: Type.String(),
  town: Type.String(),
  village: Type.String(),
});

const RankingRowSchema = Type.Object({
  county: Type.String(),
  town: Type.String(),
  village: Type.String(),
  shares: Type.Array(Type.Number(), { description: 'Vote shares in candidate order' }),
  totalVotes: Type.Integer({ minimum: 1 }),
  cosineSimilarity: Type.Number(),
  similarityRank: Type.Integer({ minimum: 1 }),
});

export const RankingResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    candidates: Type.Array(CandidateShareSchema),
    national: Type.Array(Type.Number()),
    totalVotes: Type.Integer({ minimum: 0 }),
    total: Type.Integer({ minimum: 0, description: 'Number of ranked villages' }),
    limit: Type.Integer(),
    offset: Type.Integer(),
    rows: Type.Array(RankingRowSchema),
    excludedVillages: Type.Array(VillageKeySchema),
  }),
});

export const VillageResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    candidates: Type.Array(CandidateShareSchema),
    rows: Type.Array(RankingRowSchema),
  }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
