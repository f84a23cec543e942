/**
 * Management Repository Implementation
 *
 * Single-statement writes on Providers and Food_Listings, and the lookups
 * behind the management forms.
 */

import { sql } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type ManagementError } from '../../core/errors.js';

import type { ManagementRepository } from '../../core/ports.js';
import type {
  FoodListingChoice,
  NewFoodListing,
  NewProvider,
  ProviderChoice,
  TypeChoices,
} from '../../core/types.js';
import type { FoodStore } from '@/infra/database/store.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

interface ValueRow {
  value: string;
}

export interface ManagementRepoOptions {
  store: FoodStore;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class SqliteManagementRepo implements ManagementRepository {
  private readonly store: FoodStore;
  private readonly log: Logger;

  constructor(options: ManagementRepoOptions) {
    this.store = options.store;
    this.log = options.logger.child({ repo: 'ManagementRepo' });
  }

  async insertProvider(provider: NewProvider): Promise<Result<number, ManagementError>> {
    this.log.debug({ name: provider.name, city: provider.city }, 'Inserting provider');

    try {
      const { lastInsertId } = await this.store.execute(sql`
        INSERT INTO Providers (Name, Type, Address, City, Contact)
        VALUES (
          ${provider.name},
          ${provider.type},
          ${provider.address},
          ${provider.city},
          ${provider.contact}
        )
      `);

      if (lastInsertId === undefined) {
        return err(createDatabaseError('Provider insert returned no row id'));
      }

      this.log.info({ providerId: lastInsertId }, 'Provider added');
      return ok(lastInsertId);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to insert provider');
      return err(createDatabaseError('Failed to insert provider', error));
    }
  }

  async findProvider(
    providerId: number
  ): Promise<Result<ProviderChoice | null, ManagementError>> {
    this.log.debug({ providerId }, 'Finding provider by id');

    try {
      const rows = await this.store.query(sql<ProviderChoice>`
        SELECT Provider_ID, Name, Type FROM Providers WHERE Provider_ID = ${providerId}
      `);
      return ok(rows[0] ?? null);
    } catch (error) {
      this.log.error({ err: error, providerId }, 'Failed to find provider');
      return err(createDatabaseError('Failed to find provider', error));
    }
  }

  async insertFoodListing(listing: NewFoodListing): Promise<Result<number, ManagementError>> {
    this.log.debug(
      { providerId: listing.providerId, foodName: listing.foodName },
      'Inserting food listing'
    );

    try {
      const { lastInsertId } = await this.store.execute(sql`
        INSERT INTO Food_Listings
          (Food_Name, Quantity, Expiry_Date, Provider_ID,
           Provider_Type, Location, Food_Type, Meal_Type)
        VALUES (
          ${listing.foodName},
          ${listing.quantity},
          ${listing.expiryDate},
          ${listing.providerId},
          ${listing.providerType},
          ${listing.location},
          ${listing.foodType},
          ${listing.mealType}
        )
      `);

      if (lastInsertId === undefined) {
        return err(createDatabaseError('Food listing insert returned no row id'));
      }

      this.log.info({ foodId: lastInsertId }, 'Food listing added');
      return ok(lastInsertId);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to insert food listing');
      return err(createDatabaseError('Failed to insert food listing', error));
    }
  }

  async updateFoodQuantity(
    foodId: number,
    quantity: number
  ): Promise<Result<number, ManagementError>> {
    this.log.debug({ foodId, quantity }, 'Updating food quantity');

    try {
      const { changes } = await this.store.execute(sql`
        UPDATE Food_Listings SET Quantity = ${quantity} WHERE Food_ID = ${foodId}
      `);

      if (changes === 0) {
        this.log.warn({ foodId }, 'Quantity update matched no listing');
      }
      return ok(changes);
    } catch (error) {
      this.log.error({ err: error, foodId }, 'Failed to update food quantity');
      return err(createDatabaseError('Failed to update food quantity', error));
    }
  }

  async deleteFoodListing(foodId: number): Promise<Result<number, ManagementError>> {
    this.log.debug({ foodId }, 'Deleting food listing');

    try {
      const { changes } = await this.store.execute(sql`
        DELETE FROM Food_Listings WHERE Food_ID = ${foodId}
      `);

      if (changes === 0) {
        this.log.warn({ foodId }, 'Delete matched no listing');
      }
      return ok(changes);
    } catch (error) {
      this.log.error({ err: error, foodId }, 'Failed to delete food listing');
      return err(createDatabaseError('Failed to delete food listing', error));
    }
  }

  async listProviderChoices(): Promise<Result<ProviderChoice[], ManagementError>> {
    try {
      const rows = await this.store.query(sql<ProviderChoice>`
        SELECT Provider_ID, Name, Type FROM Providers ORDER BY Name, Provider_ID
      `);
      return ok(rows);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to list providers');
      return err(createDatabaseError('Failed to list providers', error));
    }
  }

  async listFoodListingChoices(): Promise<Result<FoodListingChoice[], ManagementError>> {
    try {
      const rows = await this.store.query(sql<FoodListingChoice>`
        SELECT Food_ID, Food_Name, Quantity FROM Food_Listings ORDER BY Food_ID
      `);
      return ok(rows);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to list food listings');
      return err(createDatabaseError('Failed to list food listings', error));
    }
  }

  async listExistingTypes(): Promise<Result<TypeChoices, ManagementError>> {
    try {
      const [providerTypes, foodTypes, mealTypes] = await Promise.all([
        this.store.query(sql<ValueRow>`
          SELECT DISTINCT Type AS value FROM Providers WHERE Type IS NOT NULL ORDER BY Type
        `),
        this.store.query(sql<ValueRow>`
          SELECT DISTINCT Food_Type AS value FROM Food_Listings
          WHERE Food_Type IS NOT NULL ORDER BY Food_Type
        `),
        this.store.query(sql<ValueRow>`
          SELECT DISTINCT Meal_Type AS value FROM Food_Listings
          WHERE Meal_Type IS NOT NULL ORDER BY Meal_Type
        `),
      ]);

      return ok({
        providerTypes: providerTypes.map((r) => r.value),
        foodTypes: foodTypes.map((r) => r.value),
        mealTypes: mealTypes.map((r) => r.value),
      });
    } catch (error) {
      this.log.error({ err: error }, 'Failed to list existing types');
      return err(createDatabaseError('Failed to list existing types', error));
    }
  }
}

export const makeManagementRepo = (options: ManagementRepoOptions): ManagementRepository => {
  return new SqliteManagementRepo(options);
};
