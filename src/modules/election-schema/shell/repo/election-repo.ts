/**
 * Election Repository - Kysely Implementation
 *
 * Publishes the base relations with a delete-and-insert inside one
 * transaction, so concurrent readers keep seeing the previous snapshot until
 * commit. Reads the per-village grouped view with a single aggregate query.
 */

import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type ElectionSchemaError } from '../../core/errors.js';

import type { ElectionRepository } from '../../core/ports.js';
import type { ElectionSnapshot, VillageVoteRow } from '../../core/types.js';
import type { ElectionDbClient } from '../../../../infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Rows per INSERT statement; keeps bind parameters well under the Postgres limit */
export const INSERT_CHUNK_SIZE = 5_000;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ElectionRepoOptions {
  db: ElectionDbClient;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Query Builders
// ─────────────────────────────────────────────────────────────────────────────

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

/**
 * Votes summed per (county, town, village, candidate).
 */
export const buildVotesByVillageQuery = (db: ElectionDbClient) =>
  db
    .selectFrom('vote_tallies as vt')
    .innerJoin('polling_stations as ps', 'ps.id', 'vt.polling_station_id')
    .innerJoin('candidates as c', 'c.id', 'vt.candidate_id')
    .select([
      'ps.county',
      'ps.town',
      'ps.village',
      'c.id as candidate_id',
      'c.name as candidate_name',
    ])
    .select((eb) => eb.fn.sum<string | number>('vt.votes').as('sum_votes'))
    .groupBy(['ps.county', 'ps.town', 'ps.village', 'c.id', 'c.name']);

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyElectionRepo implements ElectionRepository {
  private readonly db: ElectionDbClient;
  private readonly log: Logger;

  constructor(options: ElectionRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'election-repo' });
  }

  async replaceAll(snapshot: ElectionSnapshot): Promise<Result<void, ElectionSchemaError>> {
    try {
      await this.db.transaction().execute(async (trx) => {
        await trx.deleteFrom('vote_tallies').execute();
        await trx.deleteFrom('polling_stations').execute();
        await trx.deleteFrom('candidates').execute();

        for (const rows of chunk(snapshot.candidates, INSERT_CHUNK_SIZE)) {
          await trx
            .insertInto('candidates')
            .values(rows.map((c) => ({ id: c.id, number: c.number, name: c.name })))
            .execute();
        }

        for (const rows of chunk(snapshot.pollingStations, INSERT_CHUNK_SIZE)) {
          await trx
            .insertInto('polling_stations')
            .values(
              rows.map((s) => ({
                id: s.id,
                county: s.county,
                town: s.town,
                village: s.village,
                station: s.station,
              }))
            )
            .execute();
        }

        for (const rows of chunk(snapshot.voteTallies, INSERT_CHUNK_SIZE)) {
          await trx
            .insertInto('vote_tallies')
            .values(
              rows.map((t) => ({
                polling_station_id: t.pollingStationId,
                candidate_id: t.candidateId,
                votes: t.votes,
              }))
            )
            .execute();
        }
      });

      this.log.info(
        {
          pollingStations: snapshot.pollingStations.length,
          candidates: snapshot.candidates.length,
          voteTallies: snapshot.voteTallies.length,
        },
        'Replaced election relations'
      );

      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to replace election relations');
      return err(createDatabaseError('Failed to replace election relations', error));
    }
  }

  async getVotesByVillage(): Promise<Result<VillageVoteRow[], ElectionSchemaError>> {
    try {
      const rows = await buildVotesByVillageQuery(this.db).execute();

      return ok(
        rows.map((row) => ({
          county: row.county,
          town: row.town,
          village: row.village,
          candidateId: row.candidate_id,
          candidateName: row.candidate_name,
          // SUM over INTEGER comes back as BIGINT, which pg returns as a string
          sumVotes: Number(row.sum_votes),
        }))
      );
    } catch (error) {
      this.log.error({ err: error }, 'Failed to query votes by village');
      return err(createDatabaseError('Failed to query votes by village', error));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

export const makeElectionRepo = (options: ElectionRepoOptions): ElectionRepository => {
  return new KyselyElectionRepo(options);
};
