/**
 * Management Module REST Routes
 *
 * - POST   /api/v1/providers: Add provider
 * - GET    /api/v1/providers/choices: Providers for selection lists
 * - POST   /api/v1/food-listings: Add food listing
 * - GET    /api/v1/food-listings/choices: Listings for selection lists
 * - GET    /api/v1/food-listings/type-choices: Provider/food/meal type choices
 * - PATCH  /api/v1/food-listings/:foodId/quantity: Update quantity
 * - DELETE /api/v1/food-listings/:foodId: Delete listing
 */

import {
  AddFoodListingBodySchema,
  AddFoodListingResponseSchema,
  AddProviderBodySchema,
  AddProviderResponseSchema,
  DeleteFoodListingResponseSchema,
  ErrorResponseSchema,
  FoodIdParamsSchema,
  FoodListingChoicesResponseSchema,
  ProviderChoicesResponseSchema,
  TypeChoicesResponseSchema,
  UpdateQuantityBodySchema,
  UpdateQuantityResponseSchema,
  type AddFoodListingBody,
  type AddProviderBody,
  type FoodIdParams,
  type UpdateQuantityBody,
} from './schemas.js';
import { getHttpStatusForError, type ManagementError } from '../../core/errors.js';
import { addFoodListing } from '../../core/usecases/add-food-listing.js';
import { addProvider } from '../../core/usecases/add-provider.js';
import { deleteFoodListing } from '../../core/usecases/delete-food-listing.js';
import {
  getFoodListingChoices,
  getProviderChoices,
  getTypeChoices,
} from '../../core/usecases/get-choices.js';
import { updateFoodQuantity } from '../../core/usecases/update-food-quantity.js';

import type { ManagementRepository } from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeManagementRoutesDeps {
  managementRepo: ManagementRepository;
  /** Defaults to the system clock */
  clock?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function sendError(reply: FastifyReply, error: ManagementError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
    ...(error.type === 'ValidationError' && { field: error.field }),
  });
}

const errorResponses = {
  400: ErrorResponseSchema,
  500: ErrorResponseSchema,
};

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeManagementRoutes = (deps: MakeManagementRoutesDeps): FastifyPluginAsync => {
  const { managementRepo, clock = () => new Date() } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // Providers
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: AddProviderBody }>(
      '/api/v1/providers',
      {
        schema: {
          body: AddProviderBodySchema,
          response: { 201: AddProviderResponseSchema, ...errorResponses },
        },
      },
      async (request, reply) => {
        const result = await addProvider({ managementRepo }, request.body);

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(201).send({ ok: true, data: result.value });
      }
    );

    fastify.get(
      '/api/v1/providers/choices',
      {
        schema: {
          response: { 200: ProviderChoicesResponseSchema, 500: ErrorResponseSchema },
        },
      },
      async (_request, reply) => {
        const result = await getProviderChoices({ managementRepo });

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Food listings
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: AddFoodListingBody }>(
      '/api/v1/food-listings',
      {
        schema: {
          body: AddFoodListingBodySchema,
          response: { 201: AddFoodListingResponseSchema, ...errorResponses },
        },
      },
      async (request, reply) => {
        const result = await addFoodListing({ managementRepo, clock }, request.body);

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(201).send({ ok: true, data: result.value });
      }
    );

    fastify.get(
      '/api/v1/food-listings/choices',
      {
        schema: {
          response: { 200: FoodListingChoicesResponseSchema, 500: ErrorResponseSchema },
        },
      },
      async (_request, reply) => {
        const result = await getFoodListingChoices({ managementRepo });

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    fastify.get(
      '/api/v1/food-listings/type-choices',
      {
        schema: {
          response: { 200: TypeChoicesResponseSchema, 500: ErrorResponseSchema },
        },
      },
      async (_request, reply) => {
        const result = await getTypeChoices({ managementRepo });

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    fastify.patch<{ Params: FoodIdParams; Body: UpdateQuantityBody }>(
      '/api/v1/food-listings/:foodId/quantity',
      {
        schema: {
          params: FoodIdParamsSchema,
          body: UpdateQuantityBodySchema,
          response: { 200: UpdateQuantityResponseSchema, ...errorResponses },
        },
      },
      async (request, reply) => {
        const result = await updateFoodQuantity(
          { managementRepo },
          { foodId: request.params.foodId, quantity: request.body.quantity }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    fastify.delete<{ Params: FoodIdParams }>(
      '/api/v1/food-listings/:foodId',
      {
        schema: {
          params: FoodIdParamsSchema,
          response: { 200: DeleteFoodListingResponseSchema, ...errorResponses },
        },
      },
      async (request, reply) => {
        const result = await deleteFoodListing({ managementRepo }, { foodId: request.params.foodId });

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );
  };
};
