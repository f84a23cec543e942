import { evaluateReadiness, mapCheckResults } from '../logic.js';

import type { HealthChecker } from '../ports.js';
import type { ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * Runs every checker in parallel and aggregates the results.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const results = await Promise.allSettled(deps.checkers.map((checker) => checker()));

  return evaluateReadiness(mapCheckResults(results), input.uptime, input.timestamp, deps.version);
}
