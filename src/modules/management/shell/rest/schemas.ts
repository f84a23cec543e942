/**
 * Management Module REST API - TypeBox Schemas
 *
 * Text fields are optional at the schema level; the use cases decide which are
 * required so the client gets the offending field name back.
 */

import { Type, type Static } from '@sinclair/typebox';

const TextField = (maxLength: number) => Type.Optional(Type.String({ maxLength }));

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const AddProviderBodySchema = Type.Object(
  {
    name: TextField(200),
    type: TextField(100),
    address: TextField(500),
    city: TextField(100),
    contact: TextField(200),
  },
  { additionalProperties: false }
);

export type AddProviderBody = Static<typeof AddProviderBodySchema>;

export const AddFoodListingBodySchema = Type.Object(
  {
    providerId: Type.Integer({ minimum: 1, description: 'Provider_ID from the provider choices' }),
    foodName: TextField(200),
    quantity: Type.Optional(Type.Integer({ description: 'Defaults to 1' })),
    expiryDate: Type.Optional(
      Type.String({ maxLength: 10, description: 'YYYY-MM-DD, defaults to today' })
    ),
    location: TextField(100),
    foodType: TextField(100),
    mealType: TextField(100),
  },
  { additionalProperties: false }
);

export type AddFoodListingBody = Static<typeof AddFoodListingBodySchema>;

export const FoodIdParamsSchema = Type.Object(
  {
    foodId: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false }
);

export type FoodIdParams = Static<typeof FoodIdParamsSchema>;

export const UpdateQuantityBodySchema = Type.Object(
  {
    quantity: Type.Integer(),
  },
  { additionalProperties: false }
);

export type UpdateQuantityBody = Static<typeof UpdateQuantityBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const AddProviderResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    providerId: Type.Integer(),
  }),
});

export const AddFoodListingResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    foodId: Type.Integer(),
    providerType: Type.String(),
  }),
});

export const UpdateQuantityResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    foodId: Type.Integer(),
    quantity: Type.Integer(),
    updated: Type.Integer(),
  }),
});

export const DeleteFoodListingResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    foodId: Type.Integer(),
    deleted: Type.Integer(),
  }),
});

export const ProviderChoicesResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(
    Type.Object({
      Provider_ID: Type.Integer(),
      Name: Type.String(),
      Type: Type.String(),
    })
  ),
});

export const FoodListingChoicesResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(
    Type.Object({
      Food_ID: Type.Integer(),
      Food_Name: Type.String(),
      Quantity: Type.Integer(),
    })
  ),
});

export const TypeChoicesResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    providerTypes: Type.Array(Type.String()),
    foodTypes: Type.Array(Type.String()),
    mealTypes: Type.Array(Type.String()),
  }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
  field: Type.Optional(Type.String()),
});
