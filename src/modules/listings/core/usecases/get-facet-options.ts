import type { ListingsError } from '../errors.js';
import type { ListingsRepository } from '../ports.js';
import type { FacetOptions } from '../types.js';
import type { Result } from 'neverthrow';

export interface GetFacetOptionsDeps {
  listingsRepo: ListingsRepository;
}

/**
 * Lists the selectable values of each browse facet.
 */
export const getFacetOptions = async (
  deps: GetFacetOptionsDeps
): Promise<Result<FacetOptions, ListingsError>> => {
  return deps.listingsRepo.getFacetOptions();
};
