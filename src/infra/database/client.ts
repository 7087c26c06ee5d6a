import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { ElectionDatabase } from './election/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type ElectionDbClient = Kysely<ElectionDatabase>;

/**
 * Create a Kysely instance for a specific database URL
 */
const createClient = <T>(connectionString: string): Kysely<T> => {
  return new Kysely<T>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};

/**
 * Initialize the election database client
 */
export const initDatabase = (config: AppConfig): ElectionDbClient => {
  const { url } = config.database;

  if (url === '') {
    throw new Error('Missing configuration for Election Database (DATABASE_URL)');
  }

  return createClient<ElectionDatabase>(url);
};

// Re-export types
export * from './election/types.js';
export { ensureElectionSchema } from './election/schema.js';
