import type { ListingsError } from '../errors.js';
import type { ListingsRepository } from '../ports.js';
import type { DashboardSummary } from '../types.js';
import type { Result } from 'neverthrow';

export interface GetDashboardSummaryDeps {
  listingsRepo: ListingsRepository;
}

/**
 * Headline counts shown above the dashboard.
 */
export const getDashboardSummary = async (
  deps: GetDashboardSummaryDeps
): Promise<Result<DashboardSummary, ListingsError>> => {
  return deps.listingsRepo.getSummary();
};
