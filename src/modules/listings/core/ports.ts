/**
 * Listings Module - Port Interfaces
 */

import type { ListingsError } from './errors.js';
import type { DashboardSummary, FacetOptions, ListingFacetFilter, ListingRow } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Read access to listings and the dashboard counts.
 */
export interface ListingsRepository {
  /**
   * Returns listings joined with their provider, restricted by the facet filter
   * and ordered by expiry date (earliest first).
   */
  browse(filter: ListingFacetFilter): Promise<Result<ListingRow[], ListingsError>>;

  /**
   * Distinct values available for each facet.
   */
  getFacetOptions(): Promise<Result<FacetOptions, ListingsError>>;

  /**
   * Row counts of providers, receivers, listings and claims.
   */
  getSummary(): Promise<Result<DashboardSummary, ListingsError>>;
}
