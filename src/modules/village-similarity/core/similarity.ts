/**
 * Share vectors and cosine similarity ranking.
 */

import { err, ok, type Result } from 'neverthrow';

import { compareVillageKeys } from '../../../common/utils/compare.js';
import {
  createNoVotesError,
  createVectorShapeError,
  createZeroNormError,
  type SimilarityError,
  type VectorShapeError,
  type ZeroNormError,
} from './errors.js';

import type {
  CandidateShare,
  SimilarityRankingRow,
  SimilarityReport,
  VillageKey,
  VoteAggregation,
} from './types.js';

export interface ShareVector {
  total: number;
  shares: number[];
}

/**
 * Divides each candidate's total by the sum over `order`.
 * Returns null when that sum is zero.
 */
export const toShareVector = (
  totals: ReadonlyMap<number, number>,
  order: readonly number[]
): ShareVector | null => {
  const counts = order.map((id) => totals.get(id) ?? 0);
  const total = counts.reduce((sum, votes) => sum + votes, 0);
  if (total === 0) {
    return null;
  }
  return { total, shares: counts.map((votes) => votes / total) };
};

/**
 * Cosine of the angle between two vectors of equal length.
 *
 * The denominator is `sqrt(|a|² · |b|²)`, so a vector compared with itself
 * gives exactly 1.
 */
export const cosineSimilarity = (
  a: readonly number[],
  b: readonly number[]
): Result<number, ZeroNormError | VectorShapeError> => {
  if (a.length !== b.length || a.length === 0) {
    return err(createVectorShapeError(a.length, b.length));
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return err(createZeroNormError());
  }

  return ok(dot / Math.sqrt(normA * normB));
};

type UnrankedRow = Omit<SimilarityRankingRow, 'similarityRank'>;

const compareRows = (a: UnrankedRow, b: UnrankedRow): number =>
  b.cosineSimilarity - a.cosineSimilarity || compareVillageKeys(a, b);

/**
 * Scores every village against the national share vector and ranks them.
 *
 * Rows are ordered by similarity descending, ties broken by county, town and
 * village. Ranks run 1..n with no gaps or repeats. Villages with no votes are
 * reported in `excludedVillages` instead of being ranked.
 */
export const rankVillages = (
  aggregation: VoteAggregation
): Result<SimilarityReport, SimilarityError> => {
  const order = aggregation.candidates.map((candidate) => candidate.id);

  const national = toShareVector(aggregation.nationalTotals, order);
  if (national === null) {
    return err(createNoVotesError());
  }

  const candidates: CandidateShare[] = aggregation.candidates.map((candidate, index) => ({
    id: candidate.id,
    name: candidate.name,
    votes: aggregation.nationalTotals.get(candidate.id) ?? 0,
    share: national.shares[index] ?? 0,
  }));

  const unranked: UnrankedRow[] = [];
  const excludedVillages: VillageKey[] = [];

  for (const village of aggregation.villages) {
    const key: VillageKey = { county: village.county, town: village.town, village: village.village };
    const vector = toShareVector(village.totals, order);
    if (vector === null) {
      excludedVillages.push(key);
      continue;
    }

    const similarity = cosineSimilarity(national.shares, vector.shares);
    if (similarity.isErr()) {
      const cause = similarity.error;
      return err(
        cause.type === 'VectorShapeError'
          ? createVectorShapeError(cause.expected, cause.actual, key)
          : createZeroNormError(key)
      );
    }

    unranked.push({
      ...key,
      shares: vector.shares,
      totalVotes: vector.total,
      cosineSimilarity: similarity.value,
    });
  }

  const rows = unranked
    .sort(compareRows)
    .map((row, index) => ({ ...row, similarityRank: index + 1 }));

  return ok({
    candidates,
    national: national.shares,
    totalVotes: national.total,
    rows,
    excludedVillages,
  });
};
