/**
 * Health check routes
 *
 * - GET /health/live: process is up
 * - GET /health/ready: food store answers `SELECT 1` (plus any extra checks)
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness } from '../../core/usecases/get-readiness.js';
import { makeStoreHealthChecker } from '../checkers/store-checker.js';

import type { HealthChecker } from '../../core/ports.js';
import type { FoodStore } from '@/infra/database/store.js';
import type { FastifyPluginAsync } from 'fastify';

export const FOOD_STORE_CHECK_NAME = 'food-store';

export interface MakeHealthRoutesDeps {
  store: FoodStore;
  version?: string | undefined;
  /** Run after the store check; reported in this order */
  extraCheckers?: HealthChecker[];
}

export const makeHealthRoutes = (deps: MakeHealthRoutesDeps): FastifyPluginAsync => {
  const { store, version, extraCheckers = [] } = deps;
  const checkers = [
    makeStoreHealthChecker(store, { name: FOOD_STORE_CHECK_NAME }),
    ...extraCheckers,
  ];
  const startedAt = Date.now();

  return async (fastify) => {
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async (_request, reply) => {
        return reply.status(200).send({ status: 'ok' });
      }
    );

    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const response = await getReadiness(
          { version, checkers },
          {
            uptime: Math.floor((Date.now() - startedAt) / 1000),
            timestamp: new Date().toISOString(),
          }
        );

        return reply
          .header('cache-control', 'no-store')
          .status(response.status === 'unhealthy' ? 503 : 200)
          .send(response);
      }
    );
  };
};
