/**
 * Reports whether an election has been published. An empty candidates table
 * means ingestion has not run yet: the service is up but every ranking
 * request would answer 404, so the check is non-critical.
 */

import { DEFAULT_DB_CHECK_TIMEOUT_MS, withTimeout } from './db-checker.js';

import type { ElectionDbClient } from '../../../../infra/database/client.js';
import type { HealthChecker } from '../../core/ports.js';

export interface ElectionDataCheckerOptions {
  name?: string;
  timeoutMs?: number;
}

export const makeElectionDataChecker = (
  db: ElectionDbClient,
  options: ElectionDataCheckerOptions = {}
): HealthChecker => {
  const { name = 'election-data', timeoutMs = DEFAULT_DB_CHECK_TIMEOUT_MS } = options;

  return async () => {
    const startTime = Date.now();

    try {
      const row = await withTimeout(
        db
          .selectFrom('candidates')
          .select((eb) => eb.fn.countAll<string | number>().as('count'))
          .executeTakeFirst(),
        timeoutMs,
        'Election data check'
      );
      const candidates = Number(row?.count ?? 0);
      const latencyMs = Date.now() - startTime;

      if (candidates === 0) {
        return {
          name,
          status: 'unhealthy',
          message: 'No election data published',
          latencyMs,
          critical: false,
        };
      }

      return {
        name,
        status: 'healthy',
        message: `${String(candidates)} candidates published`,
        latencyMs,
        critical: false,
      };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown database error',
        latencyMs: Date.now() - startTime,
        critical: false,
      };
    }
  };
};
