/**
 * CSV Region Source Reader
 *
 * Reads one CSV export per region from a directory. A region's file name must
 * contain the configured marker and the region label in parentheses, e.g.
 * `總統-A05-4-候選人得票數一覽表-各投開票所(臺北市).csv`.
 *
 * The first non-blank record is the header row; every later record is a data
 * row. Header cells may span several lines inside quotes. Unless a candidate
 * column count is configured, the candidate columns are the run of ballot
 * number cells after the location columns; trailing summary columns are cut.
 */

import fs from 'node:fs/promises';

import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import { listRegionFiles, type RegionFileEntry } from './discovery.js';
import {
  createNoSourcesError,
  createSourceFormatError,
  createSourceNotFoundError,
  createSourceReadError,
  type IngestionError,
} from '../../core/errors.js';
import { isCandidateSlotCell } from '../../core/candidate-header.js';
import { LOCATION_COLUMN_COUNT, type RawCell, type RawRegionTable } from '../../core/types.js';

import type { RegionSourceReader } from '../../core/ports.js';

const CSV_EXTENSION = '.csv';

export interface CsvRegionSourceReaderOptions {
  rootDir: string;
  /** Substring every region file name must contain */
  fileMarker: string;
  /** Number of candidate columns to keep after the location columns (default: all) */
  candidateColumns?: number | undefined;
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const isStringRecord = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((cell) => typeof cell === 'string');

const isBlankRecord = (record: string[]): boolean => record.every((cell) => cell.trim() === '');

const parseCsv = (content: string, region: string): Result<string[][], IngestionError> => {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    return err(createSourceReadError(`Failed to parse CSV: ${errorMessage(error)}`, region, error));
  }

  if (!Array.isArray(parsed) || !parsed.every(isStringRecord)) {
    return err(createSourceReadError('CSV parser returned unexpected records', region));
  }

  return ok(parsed);
};

/**
 * Number of consecutive candidate-slot cells after the location columns.
 */
export const countCandidateSlots = (header: readonly RawCell[]): number => {
  const cells = header.slice(LOCATION_COLUMN_COUNT);
  const end = cells.findIndex((cell) => !isCandidateSlotCell(cell));
  return end === -1 ? cells.length : end;
};

/**
 * Splits parsed records into header and data rows.
 */
export const toRegionTable = (
  region: string,
  records: string[][],
  candidateColumns?: number
): Result<RawRegionTable, IngestionError> => {
  const headerIndex = records.findIndex((record) => !isBlankRecord(record));
  const header = headerIndex === -1 ? undefined : records[headerIndex];

  if (header === undefined) {
    return err(createSourceFormatError(region, 'Source has no header row'));
  }

  // Without any slot cell the whole header is kept and the normalizer reports the first bad cell
  const detected = countCandidateSlots(header);
  const width =
    candidateColumns !== undefined
      ? LOCATION_COLUMN_COUNT + candidateColumns
      : detected > 0
        ? LOCATION_COLUMN_COUNT + detected
        : header.length;

  if (header.length < width) {
    return err(
      createSourceFormatError(
        region,
        `Header row has ${String(header.length - LOCATION_COLUMN_COUNT)} candidate columns, expected ${String(candidateColumns)}`
      )
    );
  }

  return ok({
    region,
    header: header.slice(0, width),
    rows: records.slice(headerIndex + 1),
  });
};

export const makeCsvRegionSourceReader = (
  options: CsvRegionSourceReaderOptions
): RegionSourceReader => {
  const { rootDir, fileMarker, candidateColumns } = options;

  const listFiles = async (): Promise<Result<RegionFileEntry[], IngestionError>> => {
    try {
      return ok(await listRegionFiles(rootDir, fileMarker, CSV_EXTENSION));
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return err(createNoSourcesError(rootDir));
      }
      return err(
        createSourceReadError(
          `Failed to list sources in ${rootDir}: ${errorMessage(error)}`,
          undefined,
          error
        )
      );
    }
  };

  return {
    async listRegions() {
      const filesResult = await listFiles();
      if (filesResult.isErr()) {
        return err(filesResult.error);
      }
      if (filesResult.value.length === 0) {
        return err(createNoSourcesError(rootDir));
      }
      return ok(filesResult.value.map((file) => file.region));
    },

    async readRegion(region) {
      const filesResult = await listFiles();
      if (filesResult.isErr()) {
        return err(filesResult.error);
      }

      const file = filesResult.value.find((entry) => entry.region === region);
      if (file === undefined) {
        return err(createSourceNotFoundError(region));
      }

      let content: string;
      try {
        content = await fs.readFile(file.absolutePath, 'utf8');
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          return err(createSourceNotFoundError(region, file.absolutePath));
        }
        return err(
          createSourceReadError(
            `Failed to read ${file.absolutePath}: ${errorMessage(error)}`,
            region,
            error
          )
        );
      }

      const recordsResult = parseCsv(content, region);
      if (recordsResult.isErr()) {
        return err(recordsResult.error);
      }

      return toRegionTable(region, recordsResult.value, candidateColumns);
    },
  };
};
