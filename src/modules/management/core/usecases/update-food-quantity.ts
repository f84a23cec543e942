/**
 * Update Food Quantity Use Case
 *
 * Overwrites the quantity of one listing. An id that matches no row is not an
 * error; the caller sees `updated: 0`.
 */

import { ok, err, type Result } from 'neverthrow';

import { requireIntegerAtLeast } from '../validation.js';

import type { ManagementError } from '../errors.js';
import type { ManagementRepository } from '../ports.js';

export interface UpdateFoodQuantityDeps {
  managementRepo: ManagementRepository;
}

export interface UpdateFoodQuantityInput {
  foodId: number;
  quantity: number;
}

export interface UpdateFoodQuantityResult {
  foodId: number;
  quantity: number;
  updated: number;
}

export const updateFoodQuantity = async (
  deps: UpdateFoodQuantityDeps,
  input: UpdateFoodQuantityInput
): Promise<Result<UpdateFoodQuantityResult, ManagementError>> => {
  const quantity = requireIntegerAtLeast('quantity', input.quantity, 0);
  if (quantity.isErr()) return err(quantity.error);

  const result = await deps.managementRepo.updateFoodQuantity(input.foodId, quantity.value);
  if (result.isErr()) {
    return err(result.error);
  }

  return ok({ foodId: input.foodId, quantity: quantity.value, updated: result.value });
};
