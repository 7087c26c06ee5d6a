/**
 * Election Schema Module - Ports
 *
 * Persistence contract for the base relations. The shell layer provides a
 * Kysely implementation.
 */

import type { ElectionSchemaError } from './errors.js';
import type { ElectionSnapshot, VillageVoteRow } from './types.js';
import type { Result } from 'neverthrow';

export interface ElectionRepository {
  /**
   * Replaces every row of all three relations with the snapshot.
   * Readers observe either the previous snapshot or the new one, never a mix.
   */
  replaceAll(snapshot: ElectionSnapshot): Promise<Result<void, ElectionSchemaError>>;

  /**
   * Votes summed per (county, town, village, candidate).
   */
  getVotesByVillage(): Promise<Result<VillageVoteRow[], ElectionSchemaError>>;
}
