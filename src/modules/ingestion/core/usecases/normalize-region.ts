/**
 * Normalize Region Use Case
 *
 * Converts one region's wide table (one row per polling station, one column
 * per candidate) into long-form vote records:
 * 1. Parse every candidate header cell
 * 2. Forward-fill blank town labels
 * 3. Drop rows with any missing required field
 * 4. Coerce station ids and vote counts to integers
 * 5. Emit one record per (station, candidate)
 */

import { err, ok, type Result } from 'neverthrow';

import { parseCandidateHeader } from '../candidate-header.js';
import { createSourceFormatError, type SourceFormatError } from '../errors.js';
import {
  LOCATION_COLUMN_COUNT,
  type CandidateSlot,
  type LongFormVoteRecord,
  type RawCell,
  type RawRegionTable,
  type RegionNormalization,
} from '../types.js';

const TOWN_COLUMN = 0;
const VILLAGE_COLUMN = 1;
const STATION_COLUMN = 2;

const INTEGER_PATTERN = /^\d+(?:\.0+)?$/;
/** Digits grouped in threes: `1,234`, `12,345,678` */
const GROUPED_INTEGER_PATTERN = /^\d{1,3}(?:,\d{3})+(?:\.0+)?$/;

/**
 * Returns the cell value, or null when the cell is absent, blank or NaN.
 */
const presentValue = (cell: RawCell | undefined): string | number | null => {
  if (cell === null || cell === undefined) {
    return null;
  }
  if (typeof cell === 'number') {
    return Number.isNaN(cell) ? null : cell;
  }
  return cell.trim() === '' ? null : cell;
};

const toLabel = (cell: string | number): string =>
  typeof cell === 'string' ? cell.trim() : String(cell);

/**
 * Coerces a cell to a non-negative integer, or null when it is not one.
 * `12`, `12.0`, `"12"` and `"12.0"` are accepted; vote counts may also carry
 * thousands separators.
 */
const toNonNegativeInteger = (cell: string | number, allowSeparators: boolean): number | null => {
  if (typeof cell === 'number') {
    return Number.isInteger(cell) && cell >= 0 ? cell : null;
  }

  let text = cell.trim();
  if (allowSeparators && text.includes(',')) {
    if (!GROUPED_INTEGER_PATTERN.test(text)) {
      return null;
    }
    text = text.replace(/,/g, '');
  }
  if (!INTEGER_PATTERN.test(text)) {
    return null;
  }

  return Number.parseInt(text, 10);
};

const parseCandidates = (table: RawRegionTable): Result<CandidateSlot[], SourceFormatError> => {
  const cells = table.header.slice(LOCATION_COLUMN_COUNT);

  if (cells.length === 0) {
    return err(createSourceFormatError(table.region, 'Header row has no candidate columns'));
  }

  const candidates: CandidateSlot[] = [];
  for (const [index, cell] of cells.entries()) {
    const parsed = parseCandidateHeader(cell, table.region, LOCATION_COLUMN_COUNT + index);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    candidates.push(parsed.value);
  }

  return ok(candidates);
};

/**
 * Normalizes one region's raw table into long-form records.
 *
 * Rows missing a town (after forward-fill), village, station or any vote
 * count are dropped whole. A station id or vote count that is present but not
 * a non-negative integer fails the region.
 */
export const normalizeRegion = (
  table: RawRegionTable
): Result<RegionNormalization, SourceFormatError> => {
  const { region } = table;

  const candidatesResult = parseCandidates(table);
  if (candidatesResult.isErr()) {
    return err(candidatesResult.error);
  }
  const candidates = candidatesResult.value;

  const records: LongFormVoteRecord[] = [];
  let lastTown: string | null = null;
  let rowsDropped = 0;

  for (const [index, row] of table.rows.entries()) {
    const rowNumber = index + 1;

    // Forward-fill happens before any row is dropped
    const townCell = presentValue(row[TOWN_COLUMN]);
    if (townCell !== null) {
      lastTown = toLabel(townCell);
    }
    const town = lastTown;

    const villageCell = presentValue(row[VILLAGE_COLUMN]);
    const stationCell = presentValue(row[STATION_COLUMN]);
    const voteCells = candidates.map((_, j) => presentValue(row[LOCATION_COLUMN_COUNT + j]));

    if (
      town === null ||
      villageCell === null ||
      stationCell === null ||
      voteCells.some((cell) => cell === null)
    ) {
      rowsDropped++;
      continue;
    }

    const station = toNonNegativeInteger(stationCell, false);
    if (station === null) {
      return err(
        createSourceFormatError(region, `Station id ${JSON.stringify(stationCell)} is not an integer`, {
          row: rowNumber,
          column: STATION_COLUMN,
        })
      );
    }

    const village = toLabel(villageCell);

    for (const [j, candidate] of candidates.entries()) {
      const cell = voteCells[j];
      const votes = cell === null || cell === undefined ? null : toNonNegativeInteger(cell, true);
      if (votes === null) {
        return err(
          createSourceFormatError(
            region,
            `Vote count ${JSON.stringify(cell)} for candidate ${String(candidate.number)} is not a non-negative integer`,
            { row: rowNumber, column: LOCATION_COLUMN_COUNT + j }
          )
        );
      }

      records.push({
        county: region,
        town,
        village,
        station,
        candidateNumber: candidate.number,
        candidateName: candidate.name,
        votes,
      });
    }
  }

  return ok({
    region,
    candidates,
    records,
    rowsRead: table.rows.length,
    rowsDropped,
  });
};
