/**
 * Listings Module REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

const FacetValuesSchema = Type.Optional(
  Type.Array(Type.String({ maxLength: 200 }), {
    maxItems: 100,
    description: 'Repeat the parameter to select several values',
  })
);

/**
 * Browse query string. Each facet may be given several times (`?city=A&city=B`).
 */
export const BrowseListingsQuerySchema = Type.Object(
  {
    city: FacetValuesSchema,
    providerType: FacetValuesSchema,
    foodType: FacetValuesSchema,
    mealType: FacetValuesSchema,
  },
  { additionalProperties: false }
);

export type BrowseListingsQuery = Static<typeof BrowseListingsQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const ListingRowSchema = Type.Object({
  Food_ID: Type.Integer(),
  Food_Name: Type.String(),
  Quantity: Type.Integer(),
  Expiry_Date: Type.String(),
  Provider_ID: Type.Integer(),
  Provider_Name: Type.String(),
  Provider_Type: Type.String(),
  Location: Type.String(),
  Food_Type: Type.String(),
  Meal_Type: Type.String(),
});

export const FoodTypeCountSchema = Type.Object({
  Food_Type: Type.String(),
  Count: Type.Integer(),
});

export const BrowseListingsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    listings: Type.Array(ListingRowSchema),
    foodTypeCounts: Type.Array(FoodTypeCountSchema),
    total: Type.Integer(),
  }),
});

export const FacetOptionsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    cities: Type.Array(Type.String()),
    providerTypes: Type.Array(Type.String()),
    foodTypes: Type.Array(Type.String()),
    mealTypes: Type.Array(Type.String()),
  }),
});

export const DashboardSummaryResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    providers: Type.Integer(),
    receivers: Type.Integer(),
    foodListings: Type.Integer(),
    claims: Type.Integer(),
  }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
