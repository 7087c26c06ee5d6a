/**
 * Election Schema Module - Domain Errors
 */

// ─────────────────────────────────────────────────────────────────────────────
// Data Consistency Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The same ballot number appears with two different display names.
 */
export interface DuplicateCandidateError {
  readonly type: 'DuplicateCandidateError';
  readonly message: string;
  readonly number: number;
  readonly names: readonly [string, string];
}

/**
 * A vote record references a station tuple missing from the station relation.
 */
export interface UnknownStationError {
  readonly type: 'UnknownStationError';
  readonly message: string;
  readonly county: string;
  readonly town: string;
  readonly village: string;
  readonly station: number;
}

/**
 * Two vote records for the same (station, candidate) pair.
 */
export interface DuplicateTallyError {
  readonly type: 'DuplicateTallyError';
  readonly message: string;
  readonly county: string;
  readonly town: string;
  readonly village: string;
  readonly station: number;
  readonly candidateId: number;
}

/**
 * Nothing left to build after normalization.
 */
export interface EmptyElectionError {
  readonly type: 'EmptyElectionError';
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface DatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Unions
// ─────────────────────────────────────────────────────────────────────────────

export type DataConsistencyError =
  | DuplicateCandidateError
  | UnknownStationError
  | DuplicateTallyError
  | EmptyElectionError;

export type ElectionSchemaError = DataConsistencyError | DatabaseError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

interface StationLocation {
  county: string;
  town: string;
  village: string;
  station: number;
}

const describeStation = (location: StationLocation): string =>
  `${location.county}/${location.town}/${location.village} #${String(location.station)}`;

export const createDuplicateCandidateError = (
  number: number,
  existingName: string,
  conflictingName: string
): DuplicateCandidateError => ({
  type: 'DuplicateCandidateError',
  message: `Ballot number ${String(number)} maps to both '${existingName}' and '${conflictingName}'`,
  number,
  names: [existingName, conflictingName],
});

export const createUnknownStationError = (location: StationLocation): UnknownStationError => ({
  type: 'UnknownStationError',
  message: `No polling station matches ${describeStation(location)}`,
  county: location.county,
  town: location.town,
  village: location.village,
  station: location.station,
});

export const createDuplicateTallyError = (
  location: StationLocation,
  candidateId: number
): DuplicateTallyError => ({
  type: 'DuplicateTallyError',
  message: `Polling station ${describeStation(location)} has more than one tally for candidate ${String(candidateId)}`,
  county: location.county,
  town: location.town,
  village: location.village,
  station: location.station,
  candidateId,
});

export const createEmptyElectionError = (): EmptyElectionError => ({
  type: 'EmptyElectionError',
  message: 'No vote records to build the election schema from',
});

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  cause,
});
