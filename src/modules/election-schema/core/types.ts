/**
 * Election Schema Module - Core Types
 *
 * The three base relations built once per ingestion run, and the grouped
 * per-village view read back by the similarity ranking.
 */

import type { RegionSummary } from '../../ingestion/index.js';

/**
 * Natural identity of a polling station.
 */
export interface StationIdentity {
  county: string;
  town: string;
  village: string;
  station: number;
}

/**
 * Polling station with its surrogate id (1-based).
 */
export interface PollingStation extends StationIdentity {
  id: number;
}

/**
 * Candidate keyed by ballot number (`id === number`).
 */
export interface Candidate {
  id: number;
  number: number;
  /** Running-mate names joined with `/` */
  name: string;
}

/**
 * One vote count for a (polling station, candidate) pair.
 */
export interface VoteTally {
  pollingStationId: number;
  candidateId: number;
  votes: number;
}

/**
 * Immutable set of base relations published together.
 */
export interface ElectionSnapshot {
  readonly pollingStations: readonly PollingStation[];
  readonly candidates: readonly Candidate[];
  readonly voteTallies: readonly VoteTally[];
}

/**
 * Row of the per-village grouped view:
 * votes summed over all stations of a village, per candidate.
 */
export interface VillageVoteRow {
  county: string;
  town: string;
  village: string;
  candidateId: number;
  candidateName: string;
  sumVotes: number;
}

/**
 * Summary of a full rebuild.
 */
export interface RebuildSummary {
  regions: RegionSummary[];
  pollingStations: number;
  candidates: number;
  voteTallies: number;
  /** False for a dry run, which stops before writing to the database */
  published: boolean;
}
