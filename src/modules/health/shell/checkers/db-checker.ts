/**
 * Database health checker
 *
 * Runs `SELECT 1` and reports unhealthy when the query fails or exceeds the
 * timeout.
 */

import { sql, type Kysely } from 'kysely';

import type { HealthChecker } from '../../core/ports.js';

/** Default timeout for database health check in milliseconds */
export const DEFAULT_DB_CHECK_TIMEOUT_MS = 3000;

export interface DbHealthCheckerOptions {
  /** Name to identify this database in health check results */
  name: string;
  timeoutMs?: number;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown database error';

/**
 * Resolves with the query's outcome or rejects once `timeoutMs` elapses.
 * The timer is cleared either way.
 */
export const withTimeout = async <T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`${label} timed out after ${String(timeoutMs)}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

export const makeDbHealthChecker = <T>(
  db: Kysely<T>,
  options: DbHealthCheckerOptions
): HealthChecker => {
  const { name, timeoutMs = DEFAULT_DB_CHECK_TIMEOUT_MS } = options;

  return async () => {
    const startTime = Date.now();

    try {
      await withTimeout(sql`SELECT 1`.execute(db), timeoutMs, 'Database health check');
      return { name, status: 'healthy', latencyMs: Date.now() - startTime, critical: true };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: errorMessage(error),
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    }
  };
};
