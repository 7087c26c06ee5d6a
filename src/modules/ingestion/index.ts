/**
 * Ingestion Module Public API
 *
 * Reads per-region polling-station result tables and normalizes them into
 * long-form vote records.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  RawCell,
  RawRegionTable,
  CandidateSlot,
  LongFormVoteRecord,
  RegionNormalization,
  RegionSummary,
  IngestionResult,
} from './core/types.js';

export { LOCATION_COLUMN_COUNT, CANDIDATE_NAME_SEPARATOR } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  IngestionError,
  SourceFormatError,
  SourceNotFoundError,
  SourceReadError,
  NoSourcesError,
} from './core/errors.js';

export {
  createSourceFormatError,
  createSourceNotFoundError,
  createSourceReadError,
  createNoSourcesError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { RegionSourceReader } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { isCandidateSlotCell, parseCandidateHeader } from './core/candidate-header.js';
export { normalizeRegion } from './core/usecases/normalize-region.js';
export { ingestRegions, type IngestRegionsDeps } from './core/usecases/ingest-regions.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Source Reader
// ─────────────────────────────────────────────────────────────────────────────

export {
  countCandidateSlots,
  makeCsvRegionSourceReader,
  toRegionTable,
  type CsvRegionSourceReaderOptions,
} from './shell/reader/csv-source-reader.js';
export { listRegionFiles, regionFromFileName, type RegionFileEntry } from './shell/reader/discovery.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - CLI
// ─────────────────────────────────────────────────────────────────────────────

export { parseIngestArgs, type IngestCliOptions } from './shell/cli/args.js';
