/**
 * Food store schema bootstrap.
 *
 * Creates the four tables when they are missing; existing tables are left untouched.
 * No foreign keys are declared: listings may be deleted while claims still point at them.
 */

import { sql } from 'kysely';

import type { FoodDbClient } from '../client.js';

export const ensureFoodSchema = async (db: FoodDbClient): Promise<void> => {
  await db.schema
    .createTable('Providers')
    .ifNotExists()
    .addColumn('Provider_ID', 'integer', (c) => c.primaryKey().autoIncrement())
    .addColumn('Name', 'text', (c) => c.notNull())
    .addColumn('Type', 'text', (c) => c.notNull())
    .addColumn('Address', 'text')
    .addColumn('City', 'text', (c) => c.notNull())
    .addColumn('Contact', 'text')
    .execute();

  await db.schema
    .createTable('Receivers')
    .ifNotExists()
    .addColumn('Receiver_ID', 'integer', (c) => c.primaryKey().autoIncrement())
    .addColumn('Name', 'text', (c) => c.notNull())
    .addColumn('Type', 'text')
    .addColumn('City', 'text', (c) => c.notNull())
    .addColumn('Contact', 'text')
    .execute();

  await db.schema
    .createTable('Food_Listings')
    .ifNotExists()
    .addColumn('Food_ID', 'integer', (c) => c.primaryKey().autoIncrement())
    .addColumn('Food_Name', 'text', (c) => c.notNull())
    .addColumn('Quantity', 'integer', (c) => c.notNull().check(sql`Quantity >= 0`))
    .addColumn('Expiry_Date', 'text', (c) => c.notNull())
    .addColumn('Provider_ID', 'integer', (c) => c.notNull())
    .addColumn('Provider_Type', 'text', (c) => c.notNull())
    .addColumn('Location', 'text', (c) => c.notNull())
    .addColumn('Food_Type', 'text', (c) => c.notNull())
    .addColumn('Meal_Type', 'text', (c) => c.notNull())
    .execute();

  await db.schema
    .createTable('Claims')
    .ifNotExists()
    .addColumn('Claim_ID', 'integer', (c) => c.primaryKey().autoIncrement())
    .addColumn('Food_ID', 'integer', (c) => c.notNull())
    .addColumn('Receiver_ID', 'integer', (c) => c.notNull())
    .addColumn('Status', 'text', (c) => c.notNull())
    .addColumn('Timestamp', 'text')
    .execute();
};
