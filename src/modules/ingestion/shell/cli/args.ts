/**
 * Command line options of the ingestion entry point.
 *
 * Usage:
 *   ingest [--source-dir <dir>] [--dry-run]
 *
 * Options:
 *   --source-dir: directory holding the region CSV files (overrides SOURCE_DIR)
 *   --dry-run: read, normalize and build the relations without publishing them
 */

import { err, ok, type Result } from 'neverthrow';

export interface IngestCliOptions {
  sourceDir?: string;
  dryRun: boolean;
}

export const parseIngestArgs = (args: readonly string[]): Result<IngestCliOptions, string> => {
  const options: IngestCliOptions = { dryRun: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--source-dir': {
        const value = args[i + 1];
        if (value === undefined || value.startsWith('--')) {
          return err('--source-dir requires a directory');
        }
        options.sourceDir = value;
        i++;
        break;
      }
      default:
        return err(`Unknown argument: ${String(arg)}`);
    }
  }

  return ok(options);
};
