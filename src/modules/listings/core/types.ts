/**
 * Listings Module - Domain Types
 */

import type { ListingFacetFilter } from '@/infra/database/query-filters/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Browse
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One food listing joined with its provider.
 * Column names follow the store (`Food_Listings F JOIN Providers P`).
 */
export interface ListingRow {
  Food_ID: number;
  Food_Name: string;
  Quantity: number;
  Expiry_Date: string;
  Provider_ID: number;
  Provider_Name: string;
  Provider_Type: string;
  /** Provider's city */
  Location: string;
  Food_Type: string;
  Meal_Type: string;
}

/**
 * Number of browsed listings per food type (bar chart data).
 */
export interface FoodTypeCount {
  Food_Type: string;
  Count: number;
}

export interface BrowseListingsResult {
  listings: ListingRow[];
  foodTypeCounts: FoodTypeCount[];
  total: number;
}

export type { ListingFacetFilter };

// ─────────────────────────────────────────────────────────────────────────────
// Facets & Summary
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Selectable values for each browse facet, sorted ascending.
 */
export interface FacetOptions {
  cities: string[];
  providerTypes: string[];
  foodTypes: string[];
  mealTypes: string[];
}

/**
 * Headline row counts of the four tables.
 */
export interface DashboardSummary {
  providers: number;
  receivers: number;
  foodListings: number;
  claims: number;
}
