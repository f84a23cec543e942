/**
 * Delete Food Listing Use Case
 *
 * Removes one listing. Deleting an id that matches no row reports `deleted: 0`.
 * Claims that reference the listing are left as they are.
 */

import { ok, err, type Result } from 'neverthrow';

import type { ManagementError } from '../errors.js';
import type { ManagementRepository } from '../ports.js';

export interface DeleteFoodListingDeps {
  managementRepo: ManagementRepository;
}

export interface DeleteFoodListingInput {
  foodId: number;
}

export interface DeleteFoodListingResult {
  foodId: number;
  deleted: number;
}

export const deleteFoodListing = async (
  deps: DeleteFoodListingDeps,
  input: DeleteFoodListingInput
): Promise<Result<DeleteFoodListingResult, ManagementError>> => {
  const result = await deps.managementRepo.deleteFoodListing(input.foodId);
  if (result.isErr()) {
    return err(result.error);
  }

  return ok({ foodId: input.foodId, deleted: result.value });
};
