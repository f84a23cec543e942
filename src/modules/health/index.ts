/**
 * Health module exports
 */

// Routes
export {
  makeHealthRoutes,
  FOOD_STORE_CHECK_NAME,
  type MakeHealthRoutesDeps,
} from './shell/rest/routes.js';

// Health checker factories
export { makeStoreHealthChecker, type StoreHealthCheckerOptions } from './shell/checkers/index.js';

// Core
export { evaluateReadiness, mapCheckResults, determineOverallStatus } from './core/logic.js';
export { getReadiness, type GetReadinessDeps } from './core/usecases/get-readiness.js';

// Types
export type { HealthChecker } from './core/ports.js';
export type {
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
  ReadinessStatus,
} from './core/types.js';
