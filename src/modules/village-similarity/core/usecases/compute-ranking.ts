/**
 * Compute Ranking Use Case
 *
 * Reads the grouped village votes from the repository, aggregates them and
 * ranks every village by similarity to the national vote.
 */

import { err, ok, type Result } from 'neverthrow';

import { aggregateVotes } from '../aggregate.js';
import { rankVillages } from '../similarity.js';

import type { ComputeRankingError } from '../errors.js';
import type { VillageVotesSource } from '../ports.js';
import type { SimilarityReport } from '../types.js';
import type { Logger } from 'pino';

export interface ComputeRankingDeps {
  repo: VillageVotesSource;
  logger: Logger;
}

export const computeRanking = async (
  deps: ComputeRankingDeps
): Promise<Result<SimilarityReport, ComputeRankingError>> => {
  const log = deps.logger.child({ usecase: 'computeRanking' });

  const rowsResult = await deps.repo.getVotesByVillage();
  if (rowsResult.isErr()) {
    log.error({ error: rowsResult.error }, 'Failed to load votes by village');
    return err(rowsResult.error);
  }

  const aggregation = aggregateVotes(rowsResult.value);
  const report = rankVillages(aggregation);

  if (report.isErr()) {
    log.warn({ error: report.error }, 'Could not rank villages');
    return err(report.error);
  }

  log.debug(
    {
      candidates: report.value.candidates.length,
      villages: report.value.rows.length,
      excluded: report.value.excludedVillages.length,
    },
    'Ranked villages'
  );

  return ok(report.value);
};
