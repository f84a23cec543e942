import type { FoodTypeCount, ListingFacetFilter, ListingRow } from './types.js';

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Counts listings per food type, sorted by food type.
 */
export const countByFoodType = (rows: readonly ListingRow[]): FoodTypeCount[] => {
  const counts = new Map<string, number>();

  for (const row of rows) {
    counts.set(row.Food_Type, (counts.get(row.Food_Type) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([foodType, count]) => ({ Food_Type: foodType, Count: count }));
};

/**
 * Trims a facet selection and drops blank and repeated values, keeping order.
 * Returns undefined when nothing is left.
 */
export const normalizeSelection = (
  values: readonly string[] | undefined
): string[] | undefined => {
  if (values === undefined) {
    return undefined;
  }

  const kept = [...new Set(values.map((v) => v.trim()).filter((v) => v !== ''))];
  return kept.length > 0 ? kept : undefined;
};

export const normalizeFacetFilter = (filter: ListingFacetFilter): ListingFacetFilter => ({
  cities: normalizeSelection(filter.cities),
  providerTypes: normalizeSelection(filter.providerTypes),
  foodTypes: normalizeSelection(filter.foodTypes),
  mealTypes: normalizeSelection(filter.mealTypes),
});
