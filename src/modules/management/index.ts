/**
 * Management Module - Public API
 *
 * Adds providers and food listings, updates listing quantities and deletes
 * listings. Also serves the id-bound choice lists the forms select from.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  NewProvider,
  NewFoodListing,
  ProviderChoice,
  FoodListingChoice,
  TypeChoices,
} from './core/types.js';

export {
  DEFAULT_PROVIDER_TYPES,
  DEFAULT_FOOD_TYPES,
  DEFAULT_MEAL_TYPES,
  DEFAULT_LISTING_QUANTITY,
  MIN_LISTING_QUANTITY,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { ManagementError, DatabaseError, ValidationError } from './core/errors.js';

export {
  createDatabaseError,
  createValidationError,
  MANAGEMENT_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export type { ManagementRepository } from './core/ports.js';

export {
  addProvider,
  type AddProviderDeps,
  type AddProviderInput,
  type AddProviderResult,
} from './core/usecases/add-provider.js';
export {
  addFoodListing,
  type AddFoodListingDeps,
  type AddFoodListingInput,
  type AddFoodListingResult,
} from './core/usecases/add-food-listing.js';
export {
  updateFoodQuantity,
  type UpdateFoodQuantityDeps,
  type UpdateFoodQuantityInput,
  type UpdateFoodQuantityResult,
} from './core/usecases/update-food-quantity.js';
export {
  deleteFoodListing,
  type DeleteFoodListingDeps,
  type DeleteFoodListingInput,
  type DeleteFoodListingResult,
} from './core/usecases/delete-food-listing.js';
export {
  getProviderChoices,
  getFoodListingChoices,
  getTypeChoices,
  type GetChoicesDeps,
} from './core/usecases/get-choices.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { makeManagementRepo, type ManagementRepoOptions } from './shell/repo/management-repo.js';
export { makeManagementRoutes, type MakeManagementRoutesDeps } from './shell/rest/routes.js';
