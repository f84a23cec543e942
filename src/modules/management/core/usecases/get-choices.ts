/**
 * Choice lists for the management forms.
 *
 * Selection widgets bind to the returned ids; labels are for display only.
 */

import { ok, err, type Result } from 'neverthrow';

import { DEFAULT_FOOD_TYPES, DEFAULT_MEAL_TYPES, DEFAULT_PROVIDER_TYPES } from '../types.js';
import { choicesOrDefaults } from '../validation.js';

import type { ManagementError } from '../errors.js';
import type { ManagementRepository } from '../ports.js';
import type { FoodListingChoice, ProviderChoice, TypeChoices } from '../types.js';

export interface GetChoicesDeps {
  managementRepo: ManagementRepository;
}

export const getProviderChoices = async (
  deps: GetChoicesDeps
): Promise<Result<ProviderChoice[], ManagementError>> => {
  return deps.managementRepo.listProviderChoices();
};

export const getFoodListingChoices = async (
  deps: GetChoicesDeps
): Promise<Result<FoodListingChoice[], ManagementError>> => {
  return deps.managementRepo.listFoodListingChoices();
};

/**
 * Existing provider/food/meal types, falling back to the built-in lists per kind
 * when the store has none.
 */
export const getTypeChoices = async (
  deps: GetChoicesDeps
): Promise<Result<TypeChoices, ManagementError>> => {
  const result = await deps.managementRepo.listExistingTypes();
  if (result.isErr()) {
    return err(result.error);
  }

  const existing = result.value;
  return ok({
    providerTypes: choicesOrDefaults(existing.providerTypes, DEFAULT_PROVIDER_TYPES),
    foodTypes: choicesOrDefaults(existing.foodTypes, DEFAULT_FOOD_TYPES),
    mealTypes: choicesOrDefaults(existing.mealTypes, DEFAULT_MEAL_TYPES),
  });
};
