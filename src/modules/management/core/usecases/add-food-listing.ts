/**
 * Add Food Listing Use Case
 *
 * Flow:
 * 1. Validate food name, location, quantity and expiry date (defaults: 1, today)
 * 2. Resolve the provider by id and snapshot its current type
 * 3. Default food/meal type to the first existing value, else the built-in choices
 * 4. Insert the listing
 */

import { ok, err, type Result } from 'neverthrow';

import { createValidationError, type ManagementError } from '../errors.js';
import {
  DEFAULT_FOOD_TYPES,
  DEFAULT_LISTING_QUANTITY,
  DEFAULT_MEAL_TYPES,
  MIN_LISTING_QUANTITY,
} from '../types.js';
import {
  formatLocalDate,
  isIsoDate,
  optionalText,
  pickChoice,
  requireIntegerAtLeast,
  requireText,
} from '../validation.js';

import type { ManagementRepository } from '../ports.js';
import type { TypeChoices } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface AddFoodListingDeps {
  managementRepo: ManagementRepository;
  /** Source of "today" for the default expiry date */
  clock: () => Date;
}

export interface AddFoodListingInput {
  providerId: number;
  foodName?: string | undefined;
  quantity?: number | undefined;
  expiryDate?: string | undefined;
  location?: string | undefined;
  foodType?: string | undefined;
  mealType?: string | undefined;
}

export interface AddFoodListingResult {
  foodId: number;
  providerType: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

export const addFoodListing = async (
  deps: AddFoodListingDeps,
  input: AddFoodListingInput
): Promise<Result<AddFoodListingResult, ManagementError>> => {
  const { managementRepo, clock } = deps;

  // Step 1: Field checks that need no store access
  const foodName = requireText('foodName', 'Food name', input.foodName);
  if (foodName.isErr()) return err(foodName.error);

  const location = requireText('location', 'Location', input.location);
  if (location.isErr()) return err(location.error);

  const quantity = requireIntegerAtLeast(
    'quantity',
    input.quantity ?? DEFAULT_LISTING_QUANTITY,
    MIN_LISTING_QUANTITY
  );
  if (quantity.isErr()) return err(quantity.error);

  const expiryDate = optionalText(input.expiryDate) ?? formatLocalDate(clock());
  if (!isIsoDate(expiryDate)) {
    return err(createValidationError('expiryDate', 'Expiry date must be a YYYY-MM-DD date'));
  }

  // Step 2: Provider must exist
  const providerResult = await managementRepo.findProvider(input.providerId);
  if (providerResult.isErr()) {
    return err(providerResult.error);
  }
  const provider = providerResult.value;
  if (provider === null) {
    return err(
      createValidationError('providerId', `Provider ${String(input.providerId)} does not exist`)
    );
  }

  // Step 3: Existing types are only needed when a choice was left blank
  let existing: TypeChoices | undefined;
  if (optionalText(input.foodType) === null || optionalText(input.mealType) === null) {
    const typesResult = await managementRepo.listExistingTypes();
    if (typesResult.isErr()) {
      return err(typesResult.error);
    }
    existing = typesResult.value;
  }

  const foodType = pickChoice(input.foodType, existing?.foodTypes ?? [], DEFAULT_FOOD_TYPES);
  if (foodType === undefined) {
    return err(createValidationError('foodType', 'Food type is required'));
  }

  const mealType = pickChoice(input.mealType, existing?.mealTypes ?? [], DEFAULT_MEAL_TYPES);
  if (mealType === undefined) {
    return err(createValidationError('mealType', 'Meal type is required'));
  }

  // Step 4: Insert
  const insertResult = await managementRepo.insertFoodListing({
    foodName: foodName.value,
    quantity: quantity.value,
    expiryDate,
    providerId: provider.Provider_ID,
    providerType: provider.Type,
    location: location.value,
    foodType,
    mealType,
  });

  if (insertResult.isErr()) {
    return err(insertResult.error);
  }

  return ok({ foodId: insertResult.value, providerType: provider.Type });
};
