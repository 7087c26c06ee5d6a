import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse, ReadinessStatus } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * A checker that throws counts as a critical failure.
 */
const toCheckResults = (
  results: PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] =>
  results.map((result) =>
    result.status === 'fulfilled'
      ? result.value
      : {
          name: 'unknown',
          status: 'unhealthy',
          message: result.reason instanceof Error ? result.reason.message : 'Check failed',
          critical: true,
        }
  );

/**
 * - any critical check unhealthy: "unhealthy" (503)
 * - only non-critical checks unhealthy: "degraded" (200)
 * - otherwise "ok"
 */
export const determineOverallStatus = (checks: HealthCheckResult[]): ReadinessStatus => {
  const failing = checks.filter((check) => check.status === 'unhealthy');
  if (failing.some((check) => check.critical !== false)) {
    return 'unhealthy';
  }
  return failing.length > 0 ? 'degraded' : 'ok';
};

/**
 * Runs every checker in parallel and folds the results into one readiness report.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;

  const results = await Promise.allSettled(checkers.map((checker) => checker()));
  const checks = toCheckResults(results);

  return {
    status: determineOverallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
