/**
 * Build Election Schema Use Case
 *
 * Consolidates long-form records from all regions into the three base
 * relations:
 * - polling stations: distinct identity tuples, ids 1..n in sorted order
 * - candidates: distinct ballot numbers, ascending; the number is the id
 * - vote tallies: each record joined back to its station id
 *
 * Ids depend only on the set of identity tuples, not on the order regions
 * were read in, so identical input always yields identical ids.
 */

import { err, ok, type Result } from 'neverthrow';

import { compareCodePoints, villageKeyId } from '../../../../common/utils/compare.js';
import {
  createDuplicateCandidateError,
  createDuplicateTallyError,
  createEmptyElectionError,
  createUnknownStationError,
  type DataConsistencyError,
} from '../errors.js';

import type {
  Candidate,
  ElectionSnapshot,
  PollingStation,
  StationIdentity,
  VoteTally,
} from '../types.js';
import type { LongFormVoteRecord } from '../../../ingestion/index.js';

const stationKey = (identity: StationIdentity): string =>
  `${villageKeyId(identity)}\u0000${String(identity.station)}`;

/**
 * Orders stations by county, town, village (code point order), then station.
 */
export const compareStationIdentities = (a: StationIdentity, b: StationIdentity): number =>
  compareCodePoints(a.county, b.county) ||
  compareCodePoints(a.town, b.town) ||
  compareCodePoints(a.village, b.village) ||
  a.station - b.station;

const buildCandidates = (
  records: readonly LongFormVoteRecord[]
): Result<Candidate[], DataConsistencyError> => {
  const names = new Map<number, string>();

  for (const record of records) {
    const existing = names.get(record.candidateNumber);
    if (existing === undefined) {
      names.set(record.candidateNumber, record.candidateName);
    } else if (existing !== record.candidateName) {
      return err(
        createDuplicateCandidateError(record.candidateNumber, existing, record.candidateName)
      );
    }
  }

  return ok(
    Array.from(names.entries())
      .sort(([a], [b]) => a - b)
      .map(([number, name]) => ({ id: number, number, name }))
  );
};

export const buildPollingStations = (records: readonly LongFormVoteRecord[]): PollingStation[] => {
  const identities = new Map<string, StationIdentity>();

  for (const { county, town, village, station } of records) {
    const identity = { county, town, village, station };
    const key = stationKey(identity);
    if (!identities.has(key)) {
      identities.set(key, identity);
    }
  }

  return Array.from(identities.values())
    .sort(compareStationIdentities)
    .map((identity, index) => ({ id: index + 1, ...identity }));
};

/**
 * Joins each record to its station id. A record whose identity tuple is not in
 * `pollingStations` fails with `UnknownStationError`.
 */
export const buildVoteTallies = (
  records: readonly LongFormVoteRecord[],
  pollingStations: readonly PollingStation[]
): Result<VoteTally[], DataConsistencyError> => {
  const stationIds = new Map<string, number>();
  for (const station of pollingStations) {
    stationIds.set(stationKey(station), station.id);
  }

  const seen = new Set<string>();
  const tallies: VoteTally[] = [];

  for (const record of records) {
    const identity = {
      county: record.county,
      town: record.town,
      village: record.village,
      station: record.station,
    };

    const pollingStationId = stationIds.get(stationKey(identity));
    if (pollingStationId === undefined) {
      return err(createUnknownStationError(identity));
    }

    const tallyKey = `${String(pollingStationId)}:${String(record.candidateNumber)}`;
    if (seen.has(tallyKey)) {
      return err(createDuplicateTallyError(identity, record.candidateNumber));
    }
    seen.add(tallyKey);

    tallies.push({
      pollingStationId,
      candidateId: record.candidateNumber,
      votes: record.votes,
    });
  }

  return ok(
    tallies.sort((a, b) => a.pollingStationId - b.pollingStationId || a.candidateId - b.candidateId)
  );
};

/**
 * Builds the base relations from the concatenated long-form records.
 */
export const buildElectionSchema = (
  records: readonly LongFormVoteRecord[]
): Result<ElectionSnapshot, DataConsistencyError> => {
  if (records.length === 0) {
    return err(createEmptyElectionError());
  }

  const candidatesResult = buildCandidates(records);
  if (candidatesResult.isErr()) {
    return err(candidatesResult.error);
  }

  const pollingStations = buildPollingStations(records);

  const talliesResult = buildVoteTallies(records, pollingStations);
  if (talliesResult.isErr()) {
    return err(talliesResult.error);
  }

  return ok({
    pollingStations,
    candidates: candidatesResult.value,
    voteTallies: talliesResult.value,
  });
};
