/**
 * Rebuild Election Database Use Case
 *
 * Full rebuild: ingest every region, build the base relations, and publish
 * them as one atomic replace. Any failure before publish leaves the
 * previously published relations untouched.
 */

import { err, ok, type Result } from 'neverthrow';

import { buildElectionSchema } from './build-schema.js';
import { ingestRegions, type IngestionError, type RegionSourceReader } from '../../../ingestion/index.js';

import type { ElectionSchemaError } from '../errors.js';
import type { ElectionRepository } from '../ports.js';
import type { RebuildSummary } from '../types.js';
import type { Logger } from 'pino';

export interface RebuildElectionDatabaseDeps {
  reader: RegionSourceReader;
  repo: ElectionRepository;
  logger: Logger;
}

export interface RebuildElectionDatabaseInput {
  /** Validate and build the relations without publishing them */
  dryRun?: boolean;
}

export type RebuildElectionDatabaseError = IngestionError | ElectionSchemaError;

export const rebuildElectionDatabase = async (
  deps: RebuildElectionDatabaseDeps,
  input: RebuildElectionDatabaseInput = {}
): Promise<Result<RebuildSummary, RebuildElectionDatabaseError>> => {
  const { reader, repo, logger } = deps;
  const log = logger.child({ usecase: 'rebuildElectionDatabase' });

  const ingested = await ingestRegions({ reader, logger });
  if (ingested.isErr()) {
    return err(ingested.error);
  }

  const snapshotResult = buildElectionSchema(ingested.value.records);
  if (snapshotResult.isErr()) {
    log.error({ error: snapshotResult.error }, 'Election data is inconsistent');
    return err(snapshotResult.error);
  }

  const snapshot = snapshotResult.value;
  const summary: RebuildSummary = {
    regions: ingested.value.regions,
    pollingStations: snapshot.pollingStations.length,
    candidates: snapshot.candidates.length,
    voteTallies: snapshot.voteTallies.length,
    published: false,
  };

  log.info(
    {
      regions: summary.regions.length,
      pollingStations: summary.pollingStations,
      candidates: summary.candidates,
      voteTallies: summary.voteTallies,
    },
    'Election schema built'
  );

  if (input.dryRun === true) {
    log.info('Dry run; election schema not published');
    return ok(summary);
  }

  const published = await repo.replaceAll(snapshot);
  if (published.isErr()) {
    log.error({ error: published.error }, 'Failed to publish election schema');
    return err(published.error);
  }

  log.info('Election schema published');
  return ok({ ...summary, published: true });
};
