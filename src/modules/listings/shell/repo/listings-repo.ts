/**
 * Listings Repository Implementation
 *
 * Raw SQL over the food store; facet filters come from the shared
 * query-filters pipeline as bound parameters.
 */

import { sql, type RawBuilder } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import {
  buildFacetConditions,
  composeConditions,
  createFilterContext,
} from '../../../../infra/database/query-filters/index.js';
import { createDatabaseError, type ListingsError } from '../../core/errors.js';

import type { ListingsRepository } from '../../core/ports.js';
import type {
  DashboardSummary,
  FacetOptions,
  ListingFacetFilter,
  ListingRow,
} from '../../core/types.js';
import type { FoodStore } from '@/infra/database/store.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

interface ValueRow {
  value: string;
}

interface SummaryRow {
  providers: number;
  receivers: number;
  food_listings: number;
  claims: number;
}

export interface ListingsRepoOptions {
  store: FoodStore;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class SqliteListingsRepo implements ListingsRepository {
  private readonly store: FoodStore;
  private readonly log: Logger;

  constructor(options: ListingsRepoOptions) {
    this.store = options.store;
    this.log = options.logger.child({ repo: 'ListingsRepo' });
  }

  async browse(filter: ListingFacetFilter): Promise<Result<ListingRow[], ListingsError>> {
    this.log.debug({ filter }, 'Browsing food listings');

    const ctx = createFilterContext();
    const whereClause = composeConditions(ctx, (c) => buildFacetConditions(filter, c));

    try {
      const rows = await this.store.query(sql<ListingRow>`
        SELECT
          F.Food_ID,
          F.Food_Name,
          F.Quantity,
          F.Expiry_Date,
          F.Provider_ID,
          P.Name AS Provider_Name,
          P.Type AS Provider_Type,
          P.City AS Location,
          F.Food_Type,
          F.Meal_Type
        FROM Food_Listings F
        JOIN Providers P ON F.Provider_ID = P.Provider_ID
        ${whereClause ?? sql``}
        ORDER BY F.Expiry_Date, F.Food_ID
      `);

      this.log.debug({ rowCount: rows.length }, 'Browsed food listings');
      return ok(rows);
    } catch (error) {
      this.log.error({ err: error, filter }, 'Failed to browse food listings');
      return err(createDatabaseError('Failed to browse food listings', error));
    }
  }

  async getFacetOptions(): Promise<Result<FacetOptions, ListingsError>> {
    this.log.debug('Loading facet options');

    try {
      const [cities, providerTypes, foodTypes, mealTypes] = await Promise.all([
        this.distinct(sql<ValueRow>`
          SELECT DISTINCT City AS value FROM Providers WHERE City IS NOT NULL ORDER BY City
        `),
        this.distinct(sql<ValueRow>`
          SELECT DISTINCT Type AS value FROM Providers WHERE Type IS NOT NULL ORDER BY Type
        `),
        this.distinct(sql<ValueRow>`
          SELECT DISTINCT Food_Type AS value FROM Food_Listings
          WHERE Food_Type IS NOT NULL ORDER BY Food_Type
        `),
        this.distinct(sql<ValueRow>`
          SELECT DISTINCT Meal_Type AS value FROM Food_Listings
          WHERE Meal_Type IS NOT NULL ORDER BY Meal_Type
        `),
      ]);

      return ok({ cities, providerTypes, foodTypes, mealTypes });
    } catch (error) {
      this.log.error({ err: error }, 'Failed to load facet options');
      return err(createDatabaseError('Failed to load facet options', error));
    }
  }

  async getSummary(): Promise<Result<DashboardSummary, ListingsError>> {
    this.log.debug('Counting dashboard totals');

    try {
      const rows = await this.store.query(sql<SummaryRow>`
        SELECT
          (SELECT COUNT(*) FROM Providers) AS providers,
          (SELECT COUNT(*) FROM Receivers) AS receivers,
          (SELECT COUNT(*) FROM Food_Listings) AS food_listings,
          (SELECT COUNT(*) FROM Claims) AS claims
      `);

      const row = rows[0];
      return ok({
        providers: row?.providers ?? 0,
        receivers: row?.receivers ?? 0,
        foodListings: row?.food_listings ?? 0,
        claims: row?.claims ?? 0,
      });
    } catch (error) {
      this.log.error({ err: error }, 'Failed to count dashboard totals');
      return err(createDatabaseError('Failed to count dashboard totals', error));
    }
  }

  private async distinct(statement: RawBuilder<ValueRow>): Promise<string[]> {
    const rows = await this.store.query(statement);
    return rows.map((r) => r.value);
  }
}

/**
 * Creates the listings repository over the shared food store.
 */
export const makeListingsRepo = (options: ListingsRepoOptions): ListingsRepository => {
  return new SqliteListingsRepo(options);
};
