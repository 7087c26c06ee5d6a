/**
 * Health module exports
 */

export { makeHealthRoutes } from './shell/rest/routes.js';
export { getReadiness, determineOverallStatus } from './core/usecases/get-readiness.js';

export {
  makeDbHealthChecker,
  makeElectionDataChecker,
  withTimeout,
  type DbHealthCheckerOptions,
  type ElectionDataCheckerOptions,
} from './shell/checkers/index.js';

export type { HealthChecker } from './core/ports.js';
export type {
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
  ReadinessStatus,
} from './core/types.js';
