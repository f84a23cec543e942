/**
 * Listings Module REST Routes
 *
 * - GET /api/v1/listings: Filtered browse with per-food-type counts
 * - GET /api/v1/listings/facets: Selectable facet values
 * - GET /api/v1/dashboard/summary: Table row counts
 */

import {
  BrowseListingsQuerySchema,
  BrowseListingsResponseSchema,
  DashboardSummaryResponseSchema,
  ErrorResponseSchema,
  FacetOptionsResponseSchema,
  type BrowseListingsQuery,
} from './schemas.js';
import { getHttpStatusForError, type ListingsError } from '../../core/errors.js';
import { browseListings } from '../../core/usecases/browse-listings.js';
import { getDashboardSummary } from '../../core/usecases/get-dashboard-summary.js';
import { getFacetOptions } from '../../core/usecases/get-facet-options.js';

import type { ListingsRepository } from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeListingsRoutesDeps {
  listingsRepo: ListingsRepository;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function sendError(reply: FastifyReply, error: ListingsError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeListingsRoutes = (deps: MakeListingsRoutesDeps): FastifyPluginAsync => {
  const { listingsRepo } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/listings - Browse listings
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: BrowseListingsQuery }>(
      '/api/v1/listings',
      {
        schema: {
          querystring: BrowseListingsQuerySchema,
          response: {
            200: BrowseListingsResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { city, providerType, foodType, mealType } = request.query;

        const result = await browseListings(
          { listingsRepo },
          {
            filter: {
              cities: city,
              providerTypes: providerType,
              foodTypes: foodType,
              mealTypes: mealType,
            },
          }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/listings/facets - Facet options
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/listings/facets',
      {
        schema: {
          response: {
            200: FacetOptionsResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const result = await getFacetOptions({ listingsRepo });

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/dashboard/summary - Headline counts
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/dashboard/summary',
      {
        schema: {
          response: {
            200: DashboardSummaryResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const result = await getDashboardSummary({ listingsRepo });

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );
  };
};
