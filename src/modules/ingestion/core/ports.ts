/**
 * Ingestion Module - Ports
 *
 * The tabular-source reader is an external collaborator; the shell layer
 * provides the implementation.
 */

import type { IngestionError } from './errors.js';
import type { RawRegionTable } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Reads per-region raw result tables.
 */
export interface RegionSourceReader {
  /**
   * Lists the region labels that have a source, in a stable order.
   */
  listRegions(): Promise<Result<string[], IngestionError>>;

  /**
   * Reads one region's header and data rows.
   */
  readRegion(region: string): Promise<Result<RawRegionTable, IngestionError>>;
}
