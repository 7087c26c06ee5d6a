/**
 * Village Similarity Module Public API
 *
 * Aggregates the persisted vote tallies per village and ranks villages by
 * how closely their vote shares follow the national result.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  VillageKey,
  CandidateRef,
  VillageTotals,
  VoteAggregation,
  CandidateShare,
  SimilarityRankingRow,
  SimilarityReport,
  VillageFilter,
  PageOptions,
} from './core/types.js';

export { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT, SHARE_SUM_TOLERANCE } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  NoVotesError,
  ZeroNormError,
  VectorShapeError,
  SimilarityError,
  ComputeRankingError,
} from './core/errors.js';

export {
  createNoVotesError,
  createZeroNormError,
  createVectorShapeError,
  getHttpStatusForError,
  SIMILARITY_ERROR_HTTP_STATUS,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { VillageVotesSource } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Functions
// ─────────────────────────────────────────────────────────────────────────────

export { aggregateVotes } from './core/aggregate.js';
export {
  toShareVector,
  cosineSimilarity,
  rankVillages,
  type ShareVector,
} from './core/similarity.js';
export { filterRanking, paginateRanking } from './core/filter.js';
export { compareVillageKeys } from '../../common/utils/compare.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { computeRanking, type ComputeRankingDeps } from './core/usecases/compute-ranking.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST
// ─────────────────────────────────────────────────────────────────────────────

export { makeSimilarityRoutes, type MakeSimilarityRoutesDeps } from './shell/rest/routes.js';
