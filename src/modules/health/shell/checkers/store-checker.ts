/**
 * Food store health checker
 *
 * Runs `SELECT 1` through the store. Unhealthy when the query fails, times out
 * or the store has been closed.
 */

import { sql } from 'kysely';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';
import type { FoodStore } from '@/infra/database/store.js';

/** Default timeout for the store health check in milliseconds */
const DEFAULT_TIMEOUT_MS = 3000;

export interface StoreHealthCheckerOptions {
  /** Name to identify the store in health check results */
  name: string;
  /** Timeout in milliseconds (default: 3000) */
  timeoutMs?: number;
}

/**
 * @example
 * ```typescript
 * const checker = makeStoreHealthChecker(store, { name: 'food-store' });
 * const result = await checker();
 * // { name: 'food-store', status: 'healthy', latencyMs: 1, critical: true }
 * ```
 */
export const makeStoreHealthChecker = (
  store: FoodStore,
  options: StoreHealthCheckerOptions
): HealthChecker => {
  const { name, timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          reject(new Error(`Store health check timed out after ${String(timeoutMs)}ms`));
        }, timeoutMs);
      });

      await Promise.race([store.query(sql`SELECT 1`), timeoutPromise]);

      return {
        name,
        status: 'healthy',
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown store error',
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    } finally {
      clearTimeout(timer);
    }
  };
};
