/**
 * Ingestion Module - Core Types
 *
 * Shapes of a region's raw tabular source and of the long-form records the
 * normalizer produces from it.
 */

/**
 * A single spreadsheet cell as handed over by a source reader.
 */
export type RawCell = string | number | null;

/**
 * Number of leading location columns (town, village, station) in every row.
 */
export const LOCATION_COLUMN_COUNT = 3;

/**
 * One region's raw source.
 *
 * `header` holds the three location column labels followed by one
 * candidate-slot cell per candidate column. Each entry of `rows` is one
 * polling station: town, village, station, then a vote count per candidate.
 */
export interface RawRegionTable {
  region: string;
  header: RawCell[];
  rows: RawCell[][];
}

/**
 * A candidate slot parsed from a header cell such as `"(1)\nName A\nName B"`.
 */
export interface CandidateSlot {
  /** Ballot number, doubles as the candidate id */
  number: number;
  /** Running-mate names joined with `/` */
  name: string;
}

/**
 * Separator between the two running-mate names of a candidate slot.
 */
export const CANDIDATE_NAME_SEPARATOR = '/';

/**
 * One (polling station, candidate) vote count in long form.
 */
export interface LongFormVoteRecord {
  county: string;
  town: string;
  village: string;
  station: number;
  candidateNumber: number;
  candidateName: string;
  votes: number;
}

/**
 * Output of normalizing a single region.
 */
export interface RegionNormalization {
  region: string;
  candidates: CandidateSlot[];
  records: LongFormVoteRecord[];
  /** Data rows present in the source */
  rowsRead: number;
  /** Data rows dropped because a required field was missing */
  rowsDropped: number;
}

/**
 * Per-region statistics reported by an ingestion run.
 */
export interface RegionSummary {
  region: string;
  rowsRead: number;
  rowsDropped: number;
  records: number;
}

/**
 * Concatenated output of all regions.
 */
export interface IngestionResult {
  regions: RegionSummary[];
  records: LongFormVoteRecord[];
}
