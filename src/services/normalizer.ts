/**
 * normalizer.ts — Raw registry records → canonical Deal
 *
 * The registry names the same field differently depending on the endpoint
 * (camelCase, snake_case, Hebrew/English variants). Everything downstream only
 * ever sees the canonical Deal shape produced here.
 */
import { InvalidInputError } from '../shared/errors.ts';
import { normalizeAddress } from './address-match.ts';
import { parseDealDate, round, toNumber } from './helpers.ts';
import type { Deal, RawDeal } from '../types.ts';

// ── Field aliases, first match wins ──

export const FIELD_ALIASES = {
  id: ['objectid', 'objectId', 'id'],
  amount: ['dealAmount', 'deal_amount'],
  date: ['dealDate', 'deal_date'],
  area: ['assetArea', 'asset_area'],
  rooms: ['assetRoomNum', 'rooms'],
  floor: ['floorNo', 'floor'],
  floorNumber: ['floorNumber', 'floor_number'],
  propertyType: ['propertyTypeDescription', 'assetTypeHeb', 'property_type_description'],
  settlement: ['settlementNameHeb', 'settlement_name_heb'],
  neighborhood: ['neighborhood'],
  street: ['streetNameHeb', 'streetNameEng', 'streetName', 'street_name'],
  houseNumber: ['houseNum', 'houseNumber', 'house_number'],
} as const satisfies Record<string, readonly string[]>;

type CanonicalField = keyof typeof FIELD_ALIASES;

function pick(raw: RawDeal, field: CanonicalField): unknown {
  for (const key of FIELD_ALIASES[field]) {
    const v = raw[key];
    if (v !== undefined && v !== null && v !== '') return v;
  }
  return undefined;
}

function pickText(raw: RawDeal, field: CanonicalField): string | undefined {
  const v = pick(raw, field);
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  if (typeof v !== 'string') return undefined;
  const t = v.trim();
  return t || undefined;
}

function pickNumber(raw: RawDeal, field: CanonicalField): number | undefined {
  return toNumber(pick(raw, field)) ?? undefined;
}

// ── Floors ──

// Hebrew ordinal floor names, checked as substrings in this order
const HEBREW_FLOORS: ReadonlyArray<readonly [string, number]> = [
  ['קרקע', 0],
  ['מרתף', -1],
  ['ראשונה', 1],
  ['שניה', 2],
  ['שלישית', 3],
  ['רביעית', 4],
  ['חמישית', 5],
  ['שישית', 6],
  ['שביעית', 7],
  ['שמינית', 8],
  ['תשיעית', 9],
  ['עשירית', 10],
];

/** "שלישית" → 3, "קומה 4" → 4, "קרקע" → 0; null when nothing usable */
export function extractFloorNumber(floor: string | null | undefined): number | null {
  if (!floor) return null;
  const text = floor.toLowerCase().trim();
  for (const [name, num] of HEBREW_FLOORS) {
    if (text.includes(name)) return num;
  }
  const m = /\d+/.exec(floor);
  return m ? parseInt(m[0], 10) : null;
}

/** Parsed floor number, falling back to the descriptor */
export function resolveFloor(deal: Pick<Deal, 'floor' | 'floorNumber'>): number | null {
  if (deal.floorNumber !== undefined) return deal.floorNumber;
  return extractFloorNumber(deal.floor);
}

// ── Derived fields ──

/** amount / area rounded to 2 decimals; undefined unless area is positive */
export function computePricePerArea(amount: number, area: number | undefined): number | undefined {
  if (area === undefined || !(area > 0)) return undefined;
  return round(amount / area, 2);
}

/** Copy of the deal with price-per-area recomputed (and dropped when undefined) */
export function withPricePerArea(deal: Deal): Deal {
  const { pricePerArea: _stale, ...rest } = deal;
  const ppa = computePricePerArea(deal.amount, deal.area);
  return ppa === undefined ? rest : { ...rest, pricePerArea: ppa };
}

/** "street houseNumber", empty when neither is known */
export function dealAddress(deal: Pick<Deal, 'street' | 'houseNumber'>): string {
  return `${deal.street ?? ''} ${deal.houseNumber ?? ''}`.trim();
}

/**
 * Dedup key: source identifier + date, or normalized address + date when the
 * registry gave no identifier.
 */
export function dealKey(deal: Pick<Deal, 'id' | 'date' | 'street' | 'houseNumber'>): string {
  if (deal.id !== null) return `id:${deal.id}|${deal.date}`;
  return `addr:${normalizeAddress(dealAddress(deal))}|${deal.date}`;
}

// ── Normalization ──

/**
 * Map one raw record into a canonical Deal.
 * Throws InvalidInputError when the amount is not a finite number or the date is unusable.
 */
export function normalizeDeal(raw: RawDeal): Deal {
  const rawAmount = pick(raw, 'amount');
  const amount = toNumber(rawAmount);
  if (amount === null) {
    throw new InvalidInputError(`Deal amount must be a finite number, got ${String(rawAmount)}`);
  }

  const rawDate = pick(raw, 'date');
  const date = parseDealDate(rawDate);
  if (date === null) {
    throw new InvalidInputError(`Deal date must be YYYY-MM-DD, got ${String(rawDate)}`);
  }

  const rawId = pick(raw, 'id');
  const id = typeof rawId === 'string' || typeof rawId === 'number' ? String(rawId) : null;

  const deal: Deal = { id, amount, date };

  const area = pickNumber(raw, 'area');
  if (area !== undefined) deal.area = area;
  const rooms = pickNumber(raw, 'rooms');
  if (rooms !== undefined) deal.rooms = rooms;

  const floor = pickText(raw, 'floor');
  if (floor !== undefined) deal.floor = floor;
  const floorNumber = pickNumber(raw, 'floorNumber') ?? extractFloorNumber(floor) ?? undefined;
  if (floorNumber !== undefined && Number.isInteger(floorNumber)) deal.floorNumber = floorNumber;

  const propertyType = pickText(raw, 'propertyType');
  if (propertyType !== undefined) deal.propertyType = propertyType;
  const settlement = pickText(raw, 'settlement');
  if (settlement !== undefined) deal.settlement = settlement;
  const neighborhood = pickText(raw, 'neighborhood');
  if (neighborhood !== undefined) deal.neighborhood = neighborhood;
  const street = pickText(raw, 'street');
  if (street !== undefined) deal.street = street;
  const houseNumber = pickText(raw, 'houseNumber');
  if (houseNumber !== undefined) deal.houseNumber = houseNumber;

  return withPricePerArea(deal);
}

/** Normalize a list; rejects anything that is not an array */
export function normalizeDeals(raws: unknown): Deal[] {
  if (!Array.isArray(raws)) throw new InvalidInputError('deals must be an array');
  return raws.map((raw: unknown, i) => {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new InvalidInputError(`deals[${i}] must be an object`);
    }
    return normalizeDeal(Object.fromEntries(Object.entries(raw)));
  });
}
