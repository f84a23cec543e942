/**
 * Facet Filter
 *
 * Turns the browse facet selections (city, provider type, food type, meal type)
 * into typed clauses, then into parameterized `column IN (...)` conditions.
 *
 * Clauses come out in facet order; joining them with AND gives conjunction across
 * facets and disjunction within one.
 */

import { sql } from 'kysely';

import { col, hasValues } from './composer.js';
import { FACET_ORDER } from './types.js';

import type {
  FacetClause,
  FacetName,
  FilterContext,
  ListingFacetFilter,
  SqlCondition,
} from './types.js';

interface FacetBinding {
  readonly alias: (ctx: FilterContext) => string;
  readonly column: string;
  readonly pick: (filter: ListingFacetFilter) => readonly string[] | undefined;
}

const FACET_BINDINGS: Record<FacetName, FacetBinding> = {
  city: {
    alias: (ctx) => ctx.providerAlias,
    column: 'City',
    pick: (filter) => filter.cities,
  },
  providerType: {
    alias: (ctx) => ctx.providerAlias,
    column: 'Type',
    pick: (filter) => filter.providerTypes,
  },
  foodType: {
    alias: (ctx) => ctx.listingAlias,
    column: 'Food_Type',
    pick: (filter) => filter.foodTypes,
  },
  mealType: {
    alias: (ctx) => ctx.listingAlias,
    column: 'Meal_Type',
    pick: (filter) => filter.mealTypes,
  },
};

/**
 * Builds one clause per non-empty facet, in city → provider type → food type →
 * meal type order. Values keep their selection order.
 */
export function buildFacetClauses(filter: ListingFacetFilter, ctx: FilterContext): FacetClause[] {
  const clauses: FacetClause[] = [];

  for (const facet of FACET_ORDER) {
    const binding = FACET_BINDINGS[facet];
    const values = binding.pick(filter);

    if (hasValues(values)) {
      clauses.push({
        facet,
        alias: binding.alias(ctx),
        column: binding.column,
        values: [...values],
      });
    }
  }

  return clauses;
}

/**
 * Compiles a clause to `alias.column IN (?, ?, ...)` with one bound parameter per value.
 */
export function facetClauseToCondition(clause: FacetClause): SqlCondition {
  return sql`${col(clause.alias, clause.column)} IN (${sql.join(clause.values)})`;
}

/**
 * Builds parameterized SQL conditions for the browse facets.
 */
export function buildFacetConditions(
  filter: ListingFacetFilter,
  ctx: FilterContext
): SqlCondition[] {
  return buildFacetClauses(filter, ctx).map(facetClauseToCondition);
}
