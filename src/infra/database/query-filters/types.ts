/**
 * Query Filter Types
 *
 * Core types for the composable SQL filter pipeline.
 * Uses Kysely's RawBuilder for parameterized queries.
 */

import type { RawBuilder } from 'kysely';

// ============================================================================
// Parameterized SQL Condition Type
// ============================================================================

/**
 * A parameterized SQL condition using Kysely's RawBuilder.
 *
 * Values interpolated in the sql`` template are bound as parameters. SQLite receives:
 * - SQL string with placeholders: `P.City IN (?, ?)`
 * - Parameters array: ['Austin', 'Boston']
 */
export type SqlCondition = RawBuilder<unknown>;

/**
 * A condition builder function that produces parameterized SQL conditions.
 */
export type ConditionBuilder = (ctx: FilterContext) => SqlCondition[];

// ============================================================================
// Filter Context
// ============================================================================

/**
 * Table aliases of the listings browse query
 * (`Food_Listings F JOIN Providers P`).
 */
export interface FilterContext {
  /** Table alias for food listings (fixed: 'F') */
  readonly listingAlias: 'F';
  /** Table alias for providers (fixed: 'P') */
  readonly providerAlias: 'P';
}

export const createFilterContext = (): FilterContext => {
  return {
    listingAlias: 'F',
    providerAlias: 'P',
  };
};

// ============================================================================
// Facet Filter Types
// ============================================================================

/**
 * The four browse facets, in the order their clauses are emitted.
 */
export const FACET_ORDER = ['city', 'providerType', 'foodType', 'mealType'] as const;

export type FacetName = (typeof FACET_ORDER)[number];

/**
 * Selected values per facet. An absent or empty list leaves the facet unconstrained.
 */
export interface ListingFacetFilter {
  cities?: readonly string[] | undefined;
  providerTypes?: readonly string[] | undefined;
  foodTypes?: readonly string[] | undefined;
  mealTypes?: readonly string[] | undefined;
}

/**
 * One typed `column IN (...)` clause, before compilation to SQL.
 */
export interface FacetClause {
  readonly facet: FacetName;
  readonly alias: string;
  readonly column: string;
  readonly values: readonly string[];
}
