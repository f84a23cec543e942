/**
 * Browse Listings Use Case
 *
 * Returns the filtered listings together with the per-food-type counts
 * the dashboard charts.
 */

import { ok, err, type Result } from 'neverthrow';

import { countByFoodType, normalizeFacetFilter } from '../logic.js';

import type { ListingsError } from '../errors.js';
import type { ListingsRepository } from '../ports.js';
import type { BrowseListingsResult, ListingFacetFilter } from '../types.js';

export interface BrowseListingsDeps {
  listingsRepo: ListingsRepository;
}

export interface BrowseListingsInput {
  filter: ListingFacetFilter;
}

export const browseListings = async (
  deps: BrowseListingsDeps,
  input: BrowseListingsInput
): Promise<Result<BrowseListingsResult, ListingsError>> => {
  const filter = normalizeFacetFilter(input.filter);

  const result = await deps.listingsRepo.browse(filter);
  if (result.isErr()) {
    return err(result.error);
  }

  const listings = result.value;

  return ok({
    listings,
    foodTypeCounts: countByFoodType(listings),
    total: listings.length,
  });
};
