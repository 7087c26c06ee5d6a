/**
 * Ingest Regions Use Case
 *
 * Reads and normalizes every region the source reader knows about, in the
 * reader's order, and concatenates the long-form records. The first failing
 * region aborts the run.
 */

import { err, ok, type Result } from 'neverthrow';

import { normalizeRegion } from './normalize-region.js';
import { type IngestionError } from '../errors.js';

import type { RegionSourceReader } from '../ports.js';
import type { IngestionResult, LongFormVoteRecord, RegionSummary } from '../types.js';
import type { Logger } from 'pino';

export interface IngestRegionsDeps {
  reader: RegionSourceReader;
  logger: Logger;
}

export const ingestRegions = async (
  deps: IngestRegionsDeps
): Promise<Result<IngestionResult, IngestionError>> => {
  const { reader, logger } = deps;
  const log = logger.child({ usecase: 'ingestRegions' });

  const regionsResult = await reader.listRegions();
  if (regionsResult.isErr()) {
    log.error({ error: regionsResult.error }, 'Failed to list region sources');
    return err(regionsResult.error);
  }

  const regions: RegionSummary[] = [];
  const records: LongFormVoteRecord[] = [];

  for (const region of regionsResult.value) {
    const tableResult = await reader.readRegion(region);
    if (tableResult.isErr()) {
      log.error({ region, error: tableResult.error }, 'Failed to read region source');
      return err(tableResult.error);
    }

    const normalized = normalizeRegion(tableResult.value);
    if (normalized.isErr()) {
      log.error({ region, error: normalized.error }, 'Region source has an unexpected format');
      return err(normalized.error);
    }

    const { rowsRead, rowsDropped } = normalized.value;
    records.push(...normalized.value.records);
    regions.push({ region, rowsRead, rowsDropped, records: normalized.value.records.length });

    log.info(
      { region, rowsRead, rowsDropped, records: normalized.value.records.length },
      'Region normalized'
    );
  }

  return ok({ regions, records });
};
