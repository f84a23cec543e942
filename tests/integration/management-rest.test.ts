/**
 * Integration tests for the management REST API
 */

import { describe, expect, it, afterEach, beforeEach } from 'vitest';

import { createApp } from '@/app/build-app.js';

import { makeFixedClock, makeTestConfig } from '../fixtures/builders.js';
import { makeFakeFoodStore, makeFakeManagementRepo } from '../fixtures/fakes.js';
import { createTestFoodStore, createTestLogger, type TestFoodStore } from '../infra/test-db.js';

import type { FastifyInstance } from 'fastify';

describe('Management REST API', () => {
  let app: FastifyInstance;
  let testStore: TestFoodStore;

  beforeEach(async () => {
    testStore = await createTestFoodStore();
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        store: testStore.store,
        config: makeTestConfig(),
        logger: createTestLogger(),
        clock: makeFixedClock(),
      },
    });
  });

  afterEach(async () => {
    await app.close();
    await testStore.store.close();
  });

  describe('POST /api/v1/providers', () => {
    it('creates a provider and returns its id', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/providers',
        payload: { name: ' Soup Kitchen ', type: 'Restaurant', city: 'Denver', contact: '  ' },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual({ ok: true, data: { providerId: 5 } });

      const stored = await testStore.db
        .selectFrom('Providers')
        .selectAll()
        .where('Provider_ID', '=', 5)
        .executeTakeFirst();
      expect(stored).toEqual({
        Provider_ID: 5,
        Name: 'Soup Kitchen',
        Type: 'Restaurant',
        Address: null,
        City: 'Denver',
        Contact: null,
      });
    });

    it('rejects a blank name without writing', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/providers',
        payload: { name: '   ', type: 'Restaurant', city: 'Denver' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'ValidationError',
        message: 'Name is required',
        field: 'name',
      });

      const count = await testStore.db
        .selectFrom('Providers')
        .select((eb) => eb.fn.countAll<number>().as('n'))
        .executeTakeFirst();
      expect(count?.n).toBe(4);
    });
  });

  describe('POST /api/v1/food-listings', () => {
    it('applies defaults and snapshots the provider type', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/food-listings',
        payload: { providerId: 4, foodName: 'Pasta', location: 'Chicago' },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual({
        ok: true,
        data: { foodId: 7, providerType: 'Catering Service' },
      });

      const stored = await testStore.db
        .selectFrom('Food_Listings')
        .selectAll()
        .where('Food_ID', '=', 7)
        .executeTakeFirst();
      expect(stored).toEqual({
        Food_ID: 7,
        Food_Name: 'Pasta',
        Quantity: 1,
        Expiry_Date: '2025-02-14',
        Provider_ID: 4,
        Provider_Type: 'Catering Service',
        Location: 'Chicago',
        Food_Type: 'Non-Vegetarian',
        Meal_Type: 'Breakfast',
      });
    });

    it('rejects a body without providerId at the schema level', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/food-listings',
        payload: { foodName: 'Pasta', location: 'Chicago' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('ValidationError');
    });

    it('rejects an unknown provider', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/food-listings',
        payload: { providerId: 99, foodName: 'Pasta', location: 'Chicago' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'ValidationError',
        message: 'Provider 99 does not exist',
        field: 'providerId',
      });
    });

    it('rejects a zero quantity', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/food-listings',
        payload: { providerId: 1, foodName: 'Pasta', location: 'Austin', quantity: 0 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'ValidationError',
        message: 'quantity must be an integer of at least 1',
        field: 'quantity',
      });
    });

    it('rejects a quantity beyond the safe integer range', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/food-listings',
        payload: { providerId: 1, foodName: 'Pasta', location: 'Austin', quantity: 1e300 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().field).toBe('quantity');
    });

    it('rejects an impossible expiry date', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/food-listings',
        payload: { providerId: 1, foodName: 'Pasta', location: 'Austin', expiryDate: '2025-02-30' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().field).toBe('expiryDate');
    });
  });

  describe('PATCH /api/v1/food-listings/:foodId/quantity', () => {
    it('overwrites the quantity', async () => {
      const response = await app.inject({
        method: 'PATCH',
        url: '/api/v1/food-listings/2/quantity',
        payload: { quantity: 0 },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        ok: true,
        data: { foodId: 2, quantity: 0, updated: 1 },
      });
    });

    it('reports zero updated rows for an unknown listing', async () => {
      const response = await app.inject({
        method: 'PATCH',
        url: '/api/v1/food-listings/42/quantity',
        payload: { quantity: 3 },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual({ foodId: 42, quantity: 3, updated: 0 });
    });

    it('rejects a negative quantity', async () => {
      const response = await app.inject({
        method: 'PATCH',
        url: '/api/v1/food-listings/2/quantity',
        payload: { quantity: -1 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'ValidationError',
        message: 'quantity must be an integer of at least 0',
        field: 'quantity',
      });
    });

    it('rejects a quantity beyond the safe integer range and keeps the stored value', async () => {
      const response = await app.inject({
        method: 'PATCH',
        url: '/api/v1/food-listings/1/quantity',
        payload: { quantity: 1e300 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'ValidationError',
        message: 'quantity must be an integer of at least 0',
        field: 'quantity',
      });

      const stored = await testStore.db
        .selectFrom('Food_Listings')
        .select('Quantity')
        .where('Food_ID', '=', 1)
        .executeTakeFirst();
      expect(stored).toEqual({ Quantity: 20 });
    });

    it('treats food id 0 as a listing that does not exist', async () => {
      const response = await app.inject({
        method: 'PATCH',
        url: '/api/v1/food-listings/0/quantity',
        payload: { quantity: 3 },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual({ foodId: 0, quantity: 3, updated: 0 });
    });

    it('rejects a negative food id at the schema level', async () => {
      const response = await app.inject({
        method: 'PATCH',
        url: '/api/v1/food-listings/-1/quantity',
        payload: { quantity: 3 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('ValidationError');
    });
  });

  describe('DELETE /api/v1/food-listings/:foodId', () => {
    it('deletes once and then reports nothing deleted', async () => {
      const first = await app.inject({ method: 'DELETE', url: '/api/v1/food-listings/6' });
      const second = await app.inject({ method: 'DELETE', url: '/api/v1/food-listings/6' });

      expect(first.statusCode).toBe(200);
      expect(first.json().data).toEqual({ foodId: 6, deleted: 1 });
      expect(second.statusCode).toBe(200);
      expect(second.json().data).toEqual({ foodId: 6, deleted: 0 });
    });

    it('reports nothing deleted for food id 0', async () => {
      const response = await app.inject({ method: 'DELETE', url: '/api/v1/food-listings/0' });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual({ foodId: 0, deleted: 0 });
    });
  });

  describe('choice lists', () => {
    it('lists providers by name', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/providers/choices' });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual([
        { Provider_ID: 3, Name: 'Daily Bread', Type: 'Restaurant' },
        { Provider_ID: 2, Name: 'Fresh Mart', Type: 'Grocery Store' },
        { Provider_ID: 1, Name: 'Green Bistro', Type: 'Restaurant' },
        { Provider_ID: 4, Name: 'Party Plates', Type: 'Catering Service' },
      ]);
    });

    it('lists food listings by id', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/food-listings/choices' });

      expect(response.json().data).toEqual([
        { Food_ID: 1, Food_Name: 'Rice', Quantity: 20 },
        { Food_ID: 2, Food_Name: 'Milk', Quantity: 5 },
        { Food_ID: 3, Food_Name: 'Chicken Curry', Quantity: 8 },
        { Food_ID: 4, Food_Name: 'Bagels', Quantity: 12 },
        { Food_ID: 5, Food_Name: 'Salad', Quantity: 6 },
        { Food_ID: 6, Food_Name: 'Soup', Quantity: 4 },
      ]);
    });

    it('lists the existing type values', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/food-listings/type-choices',
      });

      expect(response.json().data).toEqual({
        providerTypes: ['Catering Service', 'Grocery Store', 'Restaurant'],
        foodTypes: ['Non-Vegetarian', 'Vegan', 'Vegetarian'],
        mealTypes: ['Breakfast', 'Dinner', 'Lunch'],
      });
    });
  });

  it('returns 404 for unknown routes', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/receivers' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: 'NotFoundError',
      message: 'Route GET /api/v1/receivers not found',
    });
  });
});

describe('Management REST API errors', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('returns 500 when the store rejects a write', async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        store: makeFakeFoodStore(),
        config: makeTestConfig(),
        logger: createTestLogger(),
        managementRepo: makeFakeManagementRepo({ simulateDbError: true }),
      },
    });

    const response = await app.inject({
      method: 'DELETE',
      url: '/api/v1/food-listings/1',
    });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      ok: false,
      error: 'DatabaseError',
      message: 'Simulated database error',
    });
  });

  it('offers the built-in types on an empty store', async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        store: makeFakeFoodStore(),
        config: makeTestConfig(),
        logger: createTestLogger(),
        managementRepo: makeFakeManagementRepo(),
      },
    });

    const response = await app.inject({
      method: 'GET',
      url: '/api/v1/food-listings/type-choices',
    });

    expect(response.json().data).toEqual({
      providerTypes: ['Restaurant', 'Grocery Store', 'Supermarket', 'Catering Service'],
      foodTypes: ['Vegetarian', 'Non-Vegetarian', 'Vegan'],
      mealTypes: ['Breakfast', 'Lunch', 'Dinner', 'Snacks'],
    });
  });
});
