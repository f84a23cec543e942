/**
 * Query Filters
 *
 * Composable, parameterized SQL filter building for the listings browse query.
 * Uses Kysely's RawBuilder so every selected value is a bound parameter.
 *
 * Usage:
 * ```ts
 * import {
 *   createFilterContext,
 *   composeConditions,
 *   buildFacetConditions,
 * } from '@/infra/database/query-filters/index.js';
 *
 * const ctx = createFilterContext();
 * const whereClause = composeConditions(ctx, (c) => buildFacetConditions(filter, c));
 * ```
 */

// Types
export {
  FACET_ORDER,
  createFilterContext,
  type SqlCondition,
  type ConditionBuilder,
  type FilterContext,
  type FacetName,
  type FacetClause,
  type ListingFacetFilter,
} from './types.js';

// Composer utilities
export { col, composeConditions, toWhereClause, hasValues } from './composer.js';

// Facet filter
export { buildFacetClauses, buildFacetConditions, facetClauseToCondition } from './facet-filter.js';
