/**
 * Election Schema Module Public API
 *
 * Builds the polling-station, candidate and vote-tally relations from
 * normalized records and persists them as one atomic replace.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  StationIdentity,
  PollingStation,
  Candidate,
  VoteTally,
  ElectionSnapshot,
  VillageVoteRow,
  RebuildSummary,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ElectionSchemaError,
  DataConsistencyError,
  DuplicateCandidateError,
  UnknownStationError,
  DuplicateTallyError,
  EmptyElectionError,
  DatabaseError,
} from './core/errors.js';

export {
  createDuplicateCandidateError,
  createUnknownStationError,
  createDuplicateTallyError,
  createEmptyElectionError,
  createDatabaseError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { ElectionRepository } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  buildElectionSchema,
  buildPollingStations,
  buildVoteTallies,
  compareStationIdentities,
} from './core/usecases/build-schema.js';
export {
  rebuildElectionDatabase,
  type RebuildElectionDatabaseDeps,
  type RebuildElectionDatabaseInput,
  type RebuildElectionDatabaseError,
} from './core/usecases/rebuild-election-database.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repository
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeElectionRepo,
  buildVotesByVillageQuery,
  INSERT_CHUNK_SIZE,
  type ElectionRepoOptions,
} from './shell/repo/election-repo.js';
