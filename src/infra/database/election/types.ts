/**
 * Kysely table types for the election database.
 *
 * Column names follow the persisted relation shapes consumed by other
 * storage tooling; do not rename them.
 */

// Polling Stations Table
export interface PollingStations {
  id: number;
  county: string;
  town: string;
  village: string;
  station: number;
}

// Candidates Table
// `id` is the ballot number; `number` repeats it for readers that expect both.
export interface Candidates {
  id: number;
  number: number;
  name: string;
}

// Vote Tallies Table
export interface VoteTallies {
  polling_station_id: number;
  candidate_id: number;
  votes: number;
}

export interface ElectionDatabase {
  polling_stations: PollingStations;
  candidates: Candidates;
  vote_tallies: VoteTallies;
}
