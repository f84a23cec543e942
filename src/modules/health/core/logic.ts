import type { HealthCheckResult, ReadinessResponse, ReadinessStatus } from './types.js';

/**
 * Maps settled promises from health checkers to standardized HealthCheckResults.
 * A checker that rejects counts as a critical failure.
 */
export const mapCheckResults = (
  results: PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] => {
  return results.map((result) => {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    return {
      name: 'unknown',
      status: 'unhealthy',
      message: result.reason instanceof Error ? result.reason.message : 'Check failed',
      critical: true,
    };
  });
};

/**
 * - Any critical unhealthy → "unhealthy"
 * - Any non-critical unhealthy → "degraded"
 * - All healthy → "ok"
 */
export const determineOverallStatus = (checks: HealthCheckResult[]): ReadinessStatus => {
  const unhealthy = checks.filter((c) => c.status === 'unhealthy');

  if (unhealthy.some((c) => c.critical !== false)) {
    return 'unhealthy';
  }
  if (unhealthy.length > 0) {
    return 'degraded';
  }
  return 'ok';
};

/**
 * Aggregates individual check results into the readiness response.
 */
export const evaluateReadiness = (
  checks: HealthCheckResult[],
  uptime: number,
  timestamp: string,
  version?: string
): ReadinessResponse => {
  return {
    status: determineOverallStatus(checks),
    timestamp,
    uptime,
    checks,
    ...(version !== undefined && { version }),
  };
};
