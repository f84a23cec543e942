import { describe, expect, it } from 'vitest';

import {
  DEFAULT_FOOD_TYPES,
  DEFAULT_MEAL_TYPES,
  DEFAULT_PROVIDER_TYPES,
  addFoodListing,
  addProvider,
  deleteFoodListing,
  getFoodListingChoices,
  getProviderChoices,
  getTypeChoices,
  updateFoodQuantity,
  type NewFoodListing,
} from '@/modules/management/index.js';

import { makeFixedClock, makeProviderChoice } from '../../fixtures/builders.js';
import { makeFakeManagementRepo } from '../../fixtures/fakes.js';

const freshMart = makeProviderChoice({ Provider_ID: 7, Name: 'Fresh Mart', Type: 'Grocery Store' });

const existingListing: NewFoodListing = {
  foodName: 'Bagels',
  quantity: 12,
  expiryDate: '2025-03-01',
  providerId: 7,
  providerType: 'Grocery Store',
  location: 'Boston',
  foodType: 'Vegan',
  mealType: 'Dinner',
};

// ─────────────────────────────────────────────────────────────────────────────
// addProvider
// ─────────────────────────────────────────────────────────────────────────────

describe('addProvider', () => {
  it('stores trimmed fields and blank optionals as null', async () => {
    const managementRepo = makeFakeManagementRepo();

    const result = await addProvider(
      { managementRepo },
      { name: ' Corner Bakery ', type: 'Restaurant', city: 'Austin', address: '', contact: ' 555-0199 ' }
    );

    expect(result.isOk() && result.value).toEqual({ providerId: 1 });
    expect(managementRepo.insertedProviders).toEqual([
      { name: 'Corner Bakery', type: 'Restaurant', address: null, city: 'Austin', contact: '555-0199' },
    ]);
  });

  it.each([
    ['name', { type: 'Restaurant', city: 'Austin' }, 'Name is required'],
    ['type', { name: 'Corner Bakery', type: '  ', city: 'Austin' }, 'Type is required'],
    ['city', { name: 'Corner Bakery', type: 'Restaurant' }, 'City is required'],
  ])('rejects a missing %s without writing', async (field, input, message) => {
    const managementRepo = makeFakeManagementRepo();

    const result = await addProvider({ managementRepo }, input);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ type: 'ValidationError', field, message });
    }
    expect(managementRepo.insertedProviders).toEqual([]);
  });

  it('reports the first missing field', async () => {
    const result = await addProvider({ managementRepo: makeFakeManagementRepo() }, {});

    expect(result.isErr() && result.error.type === 'ValidationError' && result.error.field).toBe(
      'name'
    );
  });

  it('propagates repository errors', async () => {
    const result = await addProvider(
      { managementRepo: makeFakeManagementRepo({ simulateDbError: true }) },
      { name: 'Corner Bakery', type: 'Restaurant', city: 'Austin' }
    );

    expect(result.isErr() && result.error.type).toBe('DatabaseError');
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// addFoodListing
// ─────────────────────────────────────────────────────────────────────────────

describe('addFoodListing', () => {
  const clock = makeFixedClock();

  it('inserts the listing with the provider type snapshot', async () => {
    const managementRepo = makeFakeManagementRepo({ providers: [freshMart] });

    const result = await addFoodListing(
      { managementRepo, clock },
      {
        providerId: 7,
        foodName: ' Soup ',
        quantity: 4,
        expiryDate: '2025-03-07',
        location: 'Boston',
        foodType: 'Vegetarian',
        mealType: 'Dinner',
      }
    );

    expect(result.isOk() && result.value).toEqual({ foodId: 1, providerType: 'Grocery Store' });
    expect(managementRepo.listings.get(1)).toEqual({
      foodName: 'Soup',
      quantity: 4,
      expiryDate: '2025-03-07',
      providerId: 7,
      providerType: 'Grocery Store',
      location: 'Boston',
      foodType: 'Vegetarian',
      mealType: 'Dinner',
    });
    expect(managementRepo.typeLookups()).toBe(0);
  });

  it('defaults quantity, expiry date and types on an empty store', async () => {
    const managementRepo = makeFakeManagementRepo({ providers: [freshMart] });

    const result = await addFoodListing(
      { managementRepo, clock },
      { providerId: 7, foodName: 'Soup', location: 'Boston' }
    );

    expect(result.isOk()).toBe(true);
    expect(managementRepo.listings.get(1)).toEqual({
      foodName: 'Soup',
      quantity: 1,
      expiryDate: '2025-02-14',
      providerId: 7,
      providerType: 'Grocery Store',
      location: 'Boston',
      foodType: DEFAULT_FOOD_TYPES[0],
      mealType: DEFAULT_MEAL_TYPES[0],
    });
  });

  it('defaults types to the first existing values', async () => {
    const managementRepo = makeFakeManagementRepo({
      providers: [freshMart],
      listings: [existingListing],
    });

    const result = await addFoodListing(
      { managementRepo, clock },
      { providerId: 7, foodName: 'Soup', location: 'Boston', mealType: 'Lunch' }
    );

    expect(result.isOk() && result.value).toEqual({ foodId: 2, providerType: 'Grocery Store' });
    expect(managementRepo.listings.get(2)?.foodType).toBe('Vegan');
    expect(managementRepo.listings.get(2)?.mealType).toBe('Lunch');
    expect(managementRepo.typeLookups()).toBe(1);
  });

  it('rejects an unknown provider without writing', async () => {
    const managementRepo = makeFakeManagementRepo({ providers: [freshMart] });

    const result = await addFoodListing(
      { managementRepo, clock },
      { providerId: 99, foodName: 'Soup', location: 'Boston' }
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        type: 'ValidationError',
        field: 'providerId',
        message: 'Provider 99 does not exist',
      });
    }
    expect(managementRepo.listings.size).toBe(0);
  });

  it.each([
    ['foodName', { foodName: '  ' }, 'Food name is required'],
    ['location', { location: undefined }, 'Location is required'],
    ['quantity', { quantity: 0 }, 'quantity must be an integer of at least 1'],
    ['quantity', { quantity: 1.5 }, 'quantity must be an integer of at least 1'],
    ['expiryDate', { expiryDate: '2025-02-30' }, 'Expiry date must be a YYYY-MM-DD date'],
    ['expiryDate', { expiryDate: 'next week' }, 'Expiry date must be a YYYY-MM-DD date'],
  ])('rejects an invalid %s', async (field, override, message) => {
    const managementRepo = makeFakeManagementRepo({ providers: [freshMart] });

    const result = await addFoodListing(
      { managementRepo, clock },
      { providerId: 7, foodName: 'Soup', location: 'Boston', ...override }
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ type: 'ValidationError', field, message });
    }
    expect(managementRepo.listings.size).toBe(0);
  });

  it('validates fields before looking up the provider', async () => {
    const result = await addFoodListing(
      { managementRepo: makeFakeManagementRepo(), clock },
      { providerId: 99, location: 'Boston' }
    );

    expect(result.isErr() && result.error.type === 'ValidationError' && result.error.field).toBe(
      'foodName'
    );
  });

  it('propagates repository errors', async () => {
    const result = await addFoodListing(
      { managementRepo: makeFakeManagementRepo({ simulateDbError: true }), clock },
      { providerId: 7, foodName: 'Soup', location: 'Boston' }
    );

    expect(result.isErr() && result.error.type).toBe('DatabaseError');
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// updateFoodQuantity / deleteFoodListing
// ─────────────────────────────────────────────────────────────────────────────

describe('updateFoodQuantity', () => {
  it('overwrites the quantity', async () => {
    const managementRepo = makeFakeManagementRepo({ listings: [existingListing] });

    const result = await updateFoodQuantity({ managementRepo }, { foodId: 1, quantity: 0 });

    expect(result.isOk() && result.value).toEqual({ foodId: 1, quantity: 0, updated: 1 });
    expect(managementRepo.listings.get(1)?.quantity).toBe(0);
  });

  it('reports zero updated rows for an unknown id', async () => {
    const result = await updateFoodQuantity(
      { managementRepo: makeFakeManagementRepo() },
      { foodId: 42, quantity: 3 }
    );

    expect(result.isOk() && result.value).toEqual({ foodId: 42, quantity: 3, updated: 0 });
  });

  it('rejects a negative quantity', async () => {
    const managementRepo = makeFakeManagementRepo({ listings: [existingListing] });

    const result = await updateFoodQuantity({ managementRepo }, { foodId: 1, quantity: -2 });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        type: 'ValidationError',
        field: 'quantity',
        message: 'quantity must be an integer of at least 0',
      });
    }
    expect(managementRepo.listings.get(1)?.quantity).toBe(12);
  });
});

describe('deleteFoodListing', () => {
  it('deletes once, then reports nothing deleted', async () => {
    const managementRepo = makeFakeManagementRepo({ listings: [existingListing] });

    const first = await deleteFoodListing({ managementRepo }, { foodId: 1 });
    const second = await deleteFoodListing({ managementRepo }, { foodId: 1 });

    expect(first.isOk() && first.value).toEqual({ foodId: 1, deleted: 1 });
    expect(second.isOk() && second.value).toEqual({ foodId: 1, deleted: 0 });
  });

  it('propagates repository errors', async () => {
    const result = await deleteFoodListing(
      { managementRepo: makeFakeManagementRepo({ simulateDbError: true }) },
      { foodId: 1 }
    );

    expect(result.isErr() && result.error.type).toBe('DatabaseError');
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Choices
// ─────────────────────────────────────────────────────────────────────────────

describe('choice lists', () => {
  it('lists providers by name with their ids', async () => {
    const managementRepo = makeFakeManagementRepo({
      providers: [
        freshMart,
        makeProviderChoice({ Provider_ID: 2, Name: 'Corner Bakery', Type: 'Restaurant' }),
      ],
    });

    const result = await getProviderChoices({ managementRepo });

    expect(result.isOk() && result.value).toEqual([
      { Provider_ID: 2, Name: 'Corner Bakery', Type: 'Restaurant' },
      { Provider_ID: 7, Name: 'Fresh Mart', Type: 'Grocery Store' },
    ]);
  });

  it('lists food listings by id', async () => {
    const managementRepo = makeFakeManagementRepo({ listings: [existingListing] });

    const result = await getFoodListingChoices({ managementRepo });

    expect(result.isOk() && result.value).toEqual([
      { Food_ID: 1, Food_Name: 'Bagels', Quantity: 12 },
    ]);
  });

  it('offers the built-in types on an empty store', async () => {
    const result = await getTypeChoices({ managementRepo: makeFakeManagementRepo() });

    expect(result.isOk() && result.value).toEqual({
      providerTypes: [...DEFAULT_PROVIDER_TYPES],
      foodTypes: [...DEFAULT_FOOD_TYPES],
      mealTypes: [...DEFAULT_MEAL_TYPES],
    });
  });

  it('offers existing types per kind, defaults for the rest', async () => {
    const managementRepo = makeFakeManagementRepo({ providers: [freshMart] });

    const result = await getTypeChoices({ managementRepo });

    expect(result.isOk() && result.value).toEqual({
      providerTypes: ['Grocery Store'],
      foodTypes: [...DEFAULT_FOOD_TYPES],
      mealTypes: [...DEFAULT_MEAL_TYPES],
    });
  });
});
