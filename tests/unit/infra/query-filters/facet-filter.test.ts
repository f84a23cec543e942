import { describe, it, expect } from 'vitest';

import {
  FACET_ORDER,
  buildFacetClauses,
  buildFacetConditions,
  composeConditions,
  createFilterContext,
  facetClauseToCondition,
} from '@/infra/database/query-filters/index.js';

import { compileSql } from './compile-db.js';

const ctx = createFilterContext();

describe('buildFacetClauses', () => {
  it('returns no clauses for an empty filter', () => {
    expect(buildFacetClauses({}, ctx)).toEqual([]);
  });

  it('skips facets with an empty selection', () => {
    expect(buildFacetClauses({ cities: [], mealTypes: [] }, ctx)).toEqual([]);
  });

  it('binds each facet to its column', () => {
    const clauses = buildFacetClauses(
      {
        cities: ['Austin'],
        providerTypes: ['Restaurant'],
        foodTypes: ['Vegan'],
        mealTypes: ['Lunch'],
      },
      ctx
    );

    expect(clauses).toEqual([
      { facet: 'city', alias: 'P', column: 'City', values: ['Austin'] },
      { facet: 'providerType', alias: 'P', column: 'Type', values: ['Restaurant'] },
      { facet: 'foodType', alias: 'F', column: 'Food_Type', values: ['Vegan'] },
      { facet: 'mealType', alias: 'F', column: 'Meal_Type', values: ['Lunch'] },
    ]);
  });

  it('emits clauses in facet order regardless of property order', () => {
    const clauses = buildFacetClauses(
      { mealTypes: ['Dinner'], cities: ['Boston'], foodTypes: ['Vegetarian'] },
      ctx
    );

    expect(clauses.map((c) => c.facet)).toEqual(['city', 'foodType', 'mealType']);
    expect(FACET_ORDER).toEqual(['city', 'providerType', 'foodType', 'mealType']);
  });

  it('keeps the selection order of values', () => {
    const [clause] = buildFacetClauses({ cities: ['Chicago', 'Austin', 'Boston'] }, ctx);

    expect(clause?.values).toEqual(['Chicago', 'Austin', 'Boston']);
  });
});

describe('facetClauseToCondition', () => {
  it('compiles one placeholder per value', () => {
    const compiled = compileSql(
      facetClauseToCondition({
        facet: 'foodType',
        alias: 'F',
        column: 'Food_Type',
        values: ['Vegan', 'Vegetarian'],
      })
    );

    expect(compiled.sql).toBe('F.Food_Type IN (?, ?)');
    expect(compiled.parameters).toEqual(['Vegan', 'Vegetarian']);
  });
});

describe('buildFacetConditions', () => {
  it('ANDs facets and ORs values within a facet', () => {
    const where = composeConditions(ctx, (c) =>
      buildFacetConditions(
        { cities: ['Austin', 'Boston'], foodTypes: ['Vegetarian'], mealTypes: ['Breakfast'] },
        c
      )
    );

    expect(where).not.toBeUndefined();
    if (where !== undefined) {
      const compiled = compileSql(where);
      expect(compiled.sql).toBe(
        'WHERE P.City IN (?, ?) AND F.Food_Type IN (?) AND F.Meal_Type IN (?)'
      );
      expect(compiled.parameters).toEqual(['Austin', 'Boston', 'Vegetarian', 'Breakfast']);
    }
  });

  it('produces no WHERE clause when nothing is selected', () => {
    const where = composeConditions(ctx, (c) => buildFacetConditions({ cities: [] }, c));

    expect(where).toBeUndefined();
  });

  it('never splices selected values into the SQL text', () => {
    const hostile = ["Austin' OR '1'='1", 'Boston); DROP TABLE Providers; --'];
    const [condition] = buildFacetConditions({ cities: hostile }, ctx);

    expect(condition).not.toBeUndefined();
    if (condition !== undefined) {
      const compiled = compileSql(condition);
      expect(compiled.sql).toBe('P.City IN (?, ?)');
      expect(compiled.parameters).toEqual(hostile);
    }
  });
});
