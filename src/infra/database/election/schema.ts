/**
 * Election schema setup
 *
 * Creates the three base tables when they do not exist yet. There are no
 * foreign keys between them; a publish deletes and reinserts all three in one
 * transaction.
 */

import type { Kysely } from 'kysely';
import type { ElectionDatabase } from './types.js';

export const ensureElectionSchema = async (db: Kysely<ElectionDatabase>): Promise<void> => {
  await db.schema
    .createTable('polling_stations')
    .ifNotExists()
    .addColumn('id', 'integer', (col) => col.primaryKey())
    .addColumn('county', 'text', (col) => col.notNull())
    .addColumn('town', 'text', (col) => col.notNull())
    .addColumn('village', 'text', (col) => col.notNull())
    .addColumn('station', 'integer', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('candidates')
    .ifNotExists()
    .addColumn('id', 'integer', (col) => col.primaryKey())
    .addColumn('number', 'integer', (col) => col.notNull())
    .addColumn('name', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('vote_tallies')
    .ifNotExists()
    .addColumn('polling_station_id', 'integer', (col) => col.notNull())
    .addColumn('candidate_id', 'integer', (col) => col.notNull())
    .addColumn('votes', 'integer', (col) => col.notNull())
    .addPrimaryKeyConstraint('vote_tallies_pkey', ['polling_station_id', 'candidate_id'])
    .execute();
};
