/**
 * Ingestion entry point
 *
 * Rebuilds the election relations from the region CSV files and publishes
 * them in one transaction. Exits non-zero when anything fails; in that case
 * the previously published data is left as it was.
 */

import { parseEnv, createConfig } from './infra/config/index.js';
import { ensureElectionSchema, initDatabase } from './infra/database/client.js';
import { createChildLogger, createLogger } from './infra/logger/index.js';
import { makeElectionRepo, rebuildElectionDatabase } from './modules/election-schema/index.js';
import { makeCsvRegionSourceReader, parseIngestArgs } from './modules/ingestion/index.js';

const main = async (): Promise<number> => {
  const optionsResult = parseIngestArgs(process.argv.slice(2));
  if (optionsResult.isErr()) {
    console.error(optionsResult.error);
    return 2;
  }
  const options = optionsResult.value;

  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: 'village-similarity-ingest',
    pretty: config.logger.pretty,
  });

  const rootDir = options.sourceDir ?? config.sources.rootDir;
  logger.info({ rootDir, dryRun: options.dryRun }, 'Starting ingestion');

  const db = initDatabase(config);

  try {
    if (!options.dryRun) {
      await ensureElectionSchema(db);
    }

    const result = await rebuildElectionDatabase(
      {
        reader: makeCsvRegionSourceReader({
          rootDir,
          fileMarker: config.sources.fileMarker,
          candidateColumns: config.sources.candidateColumns,
        }),
        repo: makeElectionRepo({ db, logger }),
        logger: createChildLogger(logger, { step: 'rebuild' }),
      },
      { dryRun: options.dryRun }
    );

    if (result.isErr()) {
      logger.error({ error: result.error }, `Ingestion failed: ${result.error.message}`);
      return 1;
    }

    const summary = result.value;
    logger.info(
      {
        regions: summary.regions.length,
        droppedRows: summary.regions.reduce((sum, region) => sum + region.rowsDropped, 0),
        pollingStations: summary.pollingStations,
        candidates: summary.candidates,
        voteTallies: summary.voteTallies,
        published: summary.published,
      },
      'Ingestion finished'
    );
    return 0;
  } finally {
    await db.destroy();
  }
};

const exitCode = await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  return 1;
});
process.exit(exitCode);
