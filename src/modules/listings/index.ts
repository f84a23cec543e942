/**
 * Listings Module - Public API
 *
 * Filtered browsing of food listings, facet options and dashboard counts.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ListingRow,
  FoodTypeCount,
  BrowseListingsResult,
  FacetOptions,
  DashboardSummary,
  ListingFacetFilter,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { ListingsError, DatabaseError } from './core/errors.js';

export {
  createDatabaseError,
  LISTINGS_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic & Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { countByFoodType, normalizeFacetFilter, normalizeSelection } from './core/logic.js';
export type { ListingsRepository } from './core/ports.js';

export {
  browseListings,
  type BrowseListingsDeps,
  type BrowseListingsInput,
} from './core/usecases/browse-listings.js';
export { getFacetOptions, type GetFacetOptionsDeps } from './core/usecases/get-facet-options.js';
export {
  getDashboardSummary,
  type GetDashboardSummaryDeps,
} from './core/usecases/get-dashboard-summary.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repository
// ─────────────────────────────────────────────────────────────────────────────

export { makeListingsRepo, type ListingsRepoOptions } from './shell/repo/listings-repo.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST
// ─────────────────────────────────────────────────────────────────────────────

export { makeListingsRoutes, type MakeListingsRoutesDeps } from './shell/rest/routes.js';
