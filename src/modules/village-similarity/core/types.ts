/**
 * Village Similarity Module - Core Types
 *
 * Aggregated vote totals and the similarity ranking derived from them.
 * Nothing here is persisted; every value is recomputed from the base
 * relations on request.
 */

import type { VillageKey } from '../../../common/utils/compare.js';

export type { VillageKey } from '../../../common/utils/compare.js';

/**
 * Candidate in the fixed ordering shared by every share vector.
 */
export interface CandidateRef {
  id: number;
  name: string;
}

/**
 * Per-candidate totals of one village. Holds an entry for every candidate
 * present nationally, zero when the village recorded no votes for it.
 */
export interface VillageTotals extends VillageKey {
  totals: ReadonlyMap<number, number>;
}

/**
 * Output of the village aggregator.
 */
export interface VoteAggregation {
  /** Candidates by ascending ballot number */
  candidates: CandidateRef[];
  nationalTotals: ReadonlyMap<number, number>;
  /** Villages in location order */
  villages: VillageTotals[];
}

/**
 * A candidate's national result.
 */
export interface CandidateShare extends CandidateRef {
  votes: number;
  /** Votes divided by the national total, in [0, 1] */
  share: number;
}

/**
 * One ranked village.
 */
export interface SimilarityRankingRow extends VillageKey {
  /** Vote shares in the order of `SimilarityReport.candidates` */
  shares: number[];
  totalVotes: number;
  cosineSimilarity: number;
  /** 1-based; distinct for every row */
  similarityRank: number;
}

/**
 * National share vector plus the ranked village table.
 */
export interface SimilarityReport {
  candidates: CandidateShare[];
  /** National share vector, same order as `candidates` */
  national: number[];
  totalVotes: number;
  rows: SimilarityRankingRow[];
  /** Villages left out because their total vote count is zero */
  excludedVillages: VillageKey[];
}

/**
 * Exact-match lookup on a village's location.
 */
export interface VillageFilter {
  county: string;
  town: string;
  village: string;
}

export interface PageOptions {
  limit: number;
  offset: number;
}

export const DEFAULT_PAGE_LIMIT = 100;
export const MAX_PAGE_LIMIT = 1_000;

/** Tolerance used when checking that a share vector sums to one */
export const SHARE_SUM_TOLERANCE = 1e-9;
