/**
 * Management Module - Port Interfaces
 */

import type { ManagementError } from './errors.js';
import type {
  FoodListingChoice,
  NewFoodListing,
  NewProvider,
  ProviderChoice,
  TypeChoices,
} from './types.js';
import type { Result } from 'neverthrow';

/**
 * Write access to providers and food listings, plus the lookups the forms need.
 * Every write is a single autocommitted statement.
 */
export interface ManagementRepository {
  /**
   * Inserts a provider.
   * @returns The new Provider_ID
   */
  insertProvider(provider: NewProvider): Promise<Result<number, ManagementError>>;

  /**
   * Finds a provider by id.
   * @returns The provider if found, null if not found
   */
  findProvider(providerId: number): Promise<Result<ProviderChoice | null, ManagementError>>;

  /**
   * Inserts a food listing.
   * @returns The new Food_ID
   */
  insertFoodListing(listing: NewFoodListing): Promise<Result<number, ManagementError>>;

  /**
   * Overwrites a listing's quantity.
   * @returns Number of rows changed (0 when the id does not exist)
   */
  updateFoodQuantity(foodId: number, quantity: number): Promise<Result<number, ManagementError>>;

  /**
   * Removes a listing.
   * @returns Number of rows removed (0 when the id does not exist)
   */
  deleteFoodListing(foodId: number): Promise<Result<number, ManagementError>>;

  /** Providers ordered by name */
  listProviderChoices(): Promise<Result<ProviderChoice[], ManagementError>>;

  /** Food listings ordered by id */
  listFoodListingChoices(): Promise<Result<FoodListingChoice[], ManagementError>>;

  /** Distinct provider, food and meal types present in the store, each sorted */
  listExistingTypes(): Promise<Result<TypeChoices, ManagementError>>;
}
