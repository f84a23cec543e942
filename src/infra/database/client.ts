import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';

import type { FoodDatabase } from './food/types.js';
import type { AppConfig } from '../config/env.js';

export type FoodDbClient = Kysely<FoodDatabase>;

/**
 * Create a Kysely instance over a SQLite file (or ':memory:')
 */
export const createFoodDbClient = (path: string): FoodDbClient => {
  return new Kysely<FoodDatabase>({
    dialect: new SqliteDialect({
      database: new Database(path),
    }),
  });
};

/**
 * Initialize the food store client from configuration
 */
export const initDatabase = (config: AppConfig): FoodDbClient => {
  const { path } = config.database;

  if (path.trim() === '') {
    throw new Error('Missing configuration for the food store (FOOD_DATABASE_PATH)');
  }

  return createFoodDbClient(path);
};

// Re-export types
export type {
  FoodDatabase,
  Providers,
  Receivers,
  FoodListings,
  Claims,
} from './food/types.js';
