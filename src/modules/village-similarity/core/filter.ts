import type { PageOptions, SimilarityRankingRow, VillageFilter } from './types.js';

/**
 * Rows whose county, town and village all equal the filter exactly.
 * Keeps rank order; an unknown location gives an empty list.
 */
export const filterRanking = (
  rows: readonly SimilarityRankingRow[],
  filter: VillageFilter
): SimilarityRankingRow[] =>
  rows.filter(
    (row) =>
      row.county === filter.county && row.town === filter.town && row.village === filter.village
  );

export const paginateRanking = (
  rows: readonly SimilarityRankingRow[],
  page: PageOptions
): SimilarityRankingRow[] => rows.slice(page.offset, page.offset + page.limit);
