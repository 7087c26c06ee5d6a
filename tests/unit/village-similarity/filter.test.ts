import { describe, expect, it } from 'vitest';

import {
  filterRanking,
  paginateRanking,
  type SimilarityRankingRow,
} from '@/modules/village-similarity/index.js';

const row = (
  county: string,
  town: string,
  village: string,
  similarityRank: number
): SimilarityRankingRow => ({
  county,
  town,
  village,
  shares: [0.5, 0.5],
  totalVotes: 10,
  cosineSimilarity: 1 - similarityRank / 10,
  similarityRank,
});

const rows = [
  row('A', 'B', 'C', 1),
  row('A', 'X', 'C', 2),
  row('A', 'B', 'Y', 3),
  row('Z', 'B', 'C', 4),
];

describe('filterRanking', () => {
  it('returns the single row matching all three fields', () => {
    expect(filterRanking(rows, { county: 'A', town: 'B', village: 'C' })).toEqual([rows[0]]);
  });

  it('excludes partial matches', () => {
    expect(filterRanking(rows.slice(1), { county: 'A', town: 'B', village: 'C' })).toEqual([]);
  });

  it('returns an empty list when nothing matches', () => {
    expect(filterRanking(rows, { county: 'Q', town: 'Q', village: 'Q' })).toEqual([]);
  });

  it('is case-sensitive', () => {
    expect(filterRanking(rows, { county: 'a', town: 'b', village: 'c' })).toEqual([]);
  });
});

describe('paginateRanking', () => {
  it('returns limit rows starting at offset', () => {
    expect(paginateRanking(rows, { limit: 2, offset: 1 }).map((r) => r.similarityRank)).toEqual([
      2, 3,
    ]);
  });

  it('returns an empty page past the end', () => {
    expect(paginateRanking(rows, { limit: 10, offset: 4 })).toEqual([]);
  });
});
