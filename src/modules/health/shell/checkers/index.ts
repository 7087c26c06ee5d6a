/**
 * Health checker factories
 */

export {
  makeDbHealthChecker,
  withTimeout,
  DEFAULT_DB_CHECK_TIMEOUT_MS,
  type DbHealthCheckerOptions,
} from './db-checker.js';
export {
  makeElectionDataChecker,
  type ElectionDataCheckerOptions,
} from './election-data-checker.js';
