import { describe, it, expect } from 'vitest';
import { filterDeals, validateCriteria } from '../services/filters.ts';
import { InvalidInputError } from '../shared/errors.ts';
import type { Deal } from '../types.ts';

const deals: Deal[] = [
  { id: '1', amount: 1_200_000, date: '2024-01-10', area: 60, rooms: 3, floor: 'שניה', floorNumber: 2, propertyType: 'דירה בבניין' },
  { id: '2', amount: 2_500_000, date: '2024-02-10', area: 110, rooms: 5, floor: 'קומה 9', propertyType: 'דירת גג' },
  { id: '3', amount: 900_000, date: '2024-03-10', rooms: 2, propertyType: 'דירה בבניין' },
  { id: '4', amount: 1_800_000, date: '2024-04-10', area: 90, floor: 'גג' },
];

const ids = (list: Deal[]) => list.map(d => d.id);

describe('filterDeals', () => {
  it('returns everything when no criteria are given', () => {
    expect(ids(filterDeals(deals))).toEqual(['1', '2', '3', '4']);
  });

  it('filters by property type as a case-insensitive substring', () => {
    expect(ids(filterDeals(deals, { propertyType: 'דירה' }))).toEqual(['1', '3']);
  });

  it('drops deals without a property type when one is requested', () => {
    expect(ids(filterDeals(deals, { propertyType: 'גג' }))).toEqual(['2']);
  });

  it('applies inclusive price bounds', () => {
    expect(ids(filterDeals(deals, { minPrice: 1_200_000, maxPrice: 1_800_000 }))).toEqual(['1', '4']);
  });

  it('excludes deals missing the bounded dimension', () => {
    expect(ids(filterDeals(deals, { minArea: 50 }))).toEqual(['1', '2', '4']);
    expect(ids(filterDeals(deals, { maxRooms: 3 }))).toEqual(['1', '3']);
  });

  it('keeps deals with an unknown floor', () => {
    // deal 2 parses to floor 9 from its descriptor
    expect(ids(filterDeals(deals, { minFloor: 1, maxFloor: 5 }))).toEqual(['1', '3', '4']);
  });

  it('combines criteria', () => {
    expect(ids(filterDeals(deals, { propertyType: 'דירה', minRooms: 3, minArea: 50 }))).toEqual(['1']);
  });

  it('composes like a single call with the intersected ranges', () => {
    const twice = filterDeals(filterDeals(deals, { minPrice: 1_000_000, maxArea: 100 }), { maxPrice: 2_000_000, minArea: 50 });
    const once = filterDeals(deals, { minPrice: 1_000_000, maxPrice: 2_000_000, minArea: 50, maxArea: 100 });
    expect(ids(twice)).toEqual(ids(once));
    expect(ids(once)).toEqual(['1', '4']);
  });

  it('preserves input order', () => {
    const reversed = [...deals].reverse();
    expect(ids(filterDeals(reversed, { minPrice: 1_000_000 }))).toEqual(['4', '2', '1']);
  });
});

describe('validateCriteria', () => {
  it('rejects a lower bound above its upper bound', () => {
    expect(() => validateCriteria({ minPrice: 2_000_000, maxPrice: 1_000_000 }))
      .toThrow('Invalid filter criteria: minPrice: minPrice cannot be greater than maxPrice');
  });

  it('rejects negative bounds', () => {
    expect(() => validateCriteria({ minArea: -1 })).toThrow(InvalidInputError);
  });

  it('rejects unknown keys', () => {
    expect(() => validateCriteria({ minPirce: 5 })).toThrow(InvalidInputError);
  });

  it('treats a missing criteria object as empty', () => {
    expect(validateCriteria(undefined)).toEqual({});
  });
});
