/**
 * Query Filter Composer
 *
 * Utilities for composing parameterized SQL conditions using Kysely's RawBuilder.
 *
 * All user values go through the sql`` template tag and reach the driver as bound
 * parameters; only trusted identifiers are ever spliced in as raw SQL.
 */

import { sql, type RawBuilder } from 'kysely';

import type { FilterContext, SqlCondition, ConditionBuilder } from './types.js';

// ============================================================================
// Column Reference Helper
// ============================================================================

/**
 * Creates a column reference for use in SQL conditions.
 *
 * Only use with trusted, internal alias and column names (never request input).
 */
export function col(alias: string, column: string): RawBuilder<unknown> {
  return sql.raw(`${alias}.${column}`);
}

// ============================================================================
// Condition Composition
// ============================================================================

/**
 * Composes multiple condition builders into a single WHERE clause RawBuilder.
 *
 * @returns RawBuilder for the complete WHERE clause, or undefined if no conditions
 *
 * @example
 * ```ts
 * const whereClause = composeConditions(ctx, (c) => buildFacetConditions(filter, c));
 * // Use in query: sql`SELECT ... FROM Food_Listings F ${whereClause ?? sql``}`
 * ```
 */
export function composeConditions(
  ctx: FilterContext,
  ...builders: ConditionBuilder[]
): RawBuilder<unknown> | undefined {
  return toWhereClause(builders.flatMap((builder) => builder(ctx)));
}

/**
 * Joins conditions into a WHERE clause RawBuilder.
 * Lower-level than composeConditions - takes raw condition arrays.
 */
export function toWhereClause(conditions: SqlCondition[]): RawBuilder<unknown> | undefined {
  if (conditions.length === 0) {
    return undefined;
  }
  return sql`WHERE ${sql.join(conditions, sql` AND `)}`;
}

// ============================================================================
// Array Utilities
// ============================================================================

/**
 * Checks if an array has values (non-empty).
 * Type guard that narrows undefined arrays.
 */
export function hasValues<T>(arr: readonly T[] | undefined): arr is readonly T[] {
  return arr !== undefined && arr.length > 0;
}
