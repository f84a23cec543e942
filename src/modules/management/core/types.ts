/**
 * Management Module - Domain Types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Offered when the store has no providers yet */
export const DEFAULT_PROVIDER_TYPES: readonly string[] = [
  'Restaurant',
  'Grocery Store',
  'Supermarket',
  'Catering Service',
];

/** Offered when the store has no listings yet */
export const DEFAULT_FOOD_TYPES: readonly string[] = ['Vegetarian', 'Non-Vegetarian', 'Vegan'];

/** Offered when the store has no listings yet */
export const DEFAULT_MEAL_TYPES: readonly string[] = ['Breakfast', 'Lunch', 'Dinner', 'Snacks'];

export const DEFAULT_LISTING_QUANTITY = 1;

export const MIN_LISTING_QUANTITY = 1;

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// ─────────────────────────────────────────────────────────────────────────────
// Rows to insert
// ─────────────────────────────────────────────────────────────────────────────

export interface NewProvider {
  name: string;
  type: string;
  address: string | null;
  city: string;
  contact: string | null;
}

export interface NewFoodListing {
  foodName: string;
  quantity: number;
  expiryDate: string;
  providerId: number;
  /** Snapshot of the provider's type; not kept in sync afterwards */
  providerType: string;
  location: string;
  foodType: string;
  mealType: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Choices
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A provider as offered in a selection list. Clients submit `Provider_ID`.
 */
export interface ProviderChoice {
  Provider_ID: number;
  Name: string;
  Type: string;
}

/**
 * A food listing as offered in a selection list. Clients submit `Food_ID`.
 */
export interface FoodListingChoice {
  Food_ID: number;
  Food_Name: string;
  Quantity: number;
}

export interface TypeChoices {
  providerTypes: string[];
  foodTypes: string[];
  mealTypes: string[];
}
