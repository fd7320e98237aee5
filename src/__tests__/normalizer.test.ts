import { describe, it, expect } from 'vitest';
import {
  computePricePerArea, dealKey, extractFloorNumber, normalizeDeal, normalizeDeals, withPricePerArea,
} from '../services/normalizer.ts';
import { InvalidInputError } from '../shared/errors.ts';

describe('normalizeDeal', () => {
  it('maps registry camelCase fields onto the canonical deal', () => {
    const deal = normalizeDeal({
      objectid: 42,
      dealAmount: '1,500,000',
      dealDate: '2024-03-15T00:00:00',
      assetArea: 75,
      assetRoomNum: 3,
      floorNo: 'שלישית',
      propertyTypeDescription: 'דירה בבניין',
      settlementNameHeb: 'תל אביב',
      streetNameHeb: 'דיזנגוף',
      houseNum: 50,
    });

    expect(deal).toEqual({
      id: '42',
      amount: 1_500_000,
      date: '2024-03-15',
      area: 75,
      rooms: 3,
      floor: 'שלישית',
      floorNumber: 3,
      propertyType: 'דירה בבניין',
      settlement: 'תל אביב',
      street: 'דיזנגוף',
      houseNumber: '50',
      pricePerArea: 20_000,
    });
  });

  it('accepts snake_case aliases', () => {
    const deal = normalizeDeal({
      id: 'a1',
      deal_amount: 900_000,
      deal_date: '2023-01-02',
      asset_area: 60,
      street_name: 'הרצל',
      house_number: '7א',
      floor_number: 4,
    });
    expect(deal.id).toBe('a1');
    expect(deal.amount).toBe(900_000);
    expect(deal.date).toBe('2023-01-02');
    expect(deal.street).toBe('הרצל');
    expect(deal.houseNumber).toBe('7א');
    expect(deal.floorNumber).toBe(4);
    expect(deal.pricePerArea).toBe(15_000);
  });

  it('leaves price-per-area absent when area is zero or missing', () => {
    const zero = normalizeDeal({ dealAmount: 1_000_000, dealDate: '2024-01-01', assetArea: 0 });
    const missing = normalizeDeal({ dealAmount: 1_000_000, dealDate: '2024-01-01' });
    expect('pricePerArea' in zero).toBe(false);
    expect('pricePerArea' in missing).toBe(false);
    expect(zero.id).toBeNull();
  });

  it('rejects a non-numeric amount', () => {
    expect(() => normalizeDeal({ dealAmount: 'abc', dealDate: '2024-01-01' })).toThrow(InvalidInputError);
  });

  it('rejects a missing or impossible date', () => {
    expect(() => normalizeDeal({ dealAmount: 1_000_000 })).toThrow(InvalidInputError);
    expect(() => normalizeDeal({ dealAmount: 1_000_000, dealDate: '2024-02-30' })).toThrow(InvalidInputError);
  });

  it('drops optional numbers that do not parse', () => {
    const deal = normalizeDeal({ dealAmount: 1_000_000, dealDate: '2024-01-01', assetRoomNum: 'n/a' });
    expect('rooms' in deal).toBe(false);
  });
});

describe('normalizeDeals', () => {
  it('rejects non-array input', () => {
    expect(() => normalizeDeals({ dealAmount: 1 })).toThrow('deals must be an array');
  });

  it('rejects non-object entries with their position', () => {
    expect(() => normalizeDeals([{ dealAmount: 1, dealDate: '2024-01-01' }, 5])).toThrow('deals[1] must be an object');
  });
});

describe('computePricePerArea', () => {
  it('rounds to 2 decimals', () => {
    expect(computePricePerArea(1_000_000, 3)).toBe(333_333.33);
  });

  it('is undefined for non-positive area', () => {
    expect(computePricePerArea(1_000_000, -5)).toBeUndefined();
    expect(computePricePerArea(1_000_000, undefined)).toBeUndefined();
  });

  it('withPricePerArea replaces a stale value', () => {
    const fixed = withPricePerArea({ id: null, amount: 2_000_000, date: '2024-01-01', area: 100, pricePerArea: 1 });
    expect(fixed.pricePerArea).toBe(20_000);
  });
});

describe('extractFloorNumber', () => {
  it('reads Hebrew ordinal floor names', () => {
    expect(extractFloorNumber('קרקע')).toBe(0);
    expect(extractFloorNumber('מרתף')).toBe(-1);
    expect(extractFloorNumber('קומה שניה')).toBe(2);
    expect(extractFloorNumber('עשירית')).toBe(10);
  });

  it('falls back to the first integer', () => {
    expect(extractFloorNumber('קומה 7 מתוך 9')).toBe(7);
  });

  it('returns null when nothing is usable', () => {
    expect(extractFloorNumber('')).toBeNull();
    expect(extractFloorNumber('גג')).toBeNull();
    expect(extractFloorNumber(undefined)).toBeNull();
  });
});

describe('dealKey', () => {
  it('uses the identifier and date when present', () => {
    expect(dealKey({ id: '42', date: '2024-03-15' })).toBe('id:42|2024-03-15');
  });

  it('falls back to the normalized address', () => {
    expect(dealKey({ id: null, date: '2024-01-01', street: 'רחוב הרצל', houseNumber: '5' })).toBe('addr:הרצל 5|2024-01-01');
  });
});
