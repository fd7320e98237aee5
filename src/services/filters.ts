/**
 * filters.ts — Criteria-based deal filtering
 *
 * Criteria are validated before any deal is looked at; a lower bound above its
 * upper bound is an input error, never an empty result.
 */
import { DealFilterCriteriaSchema } from '../schemas.ts';
import { InvalidInputError } from '../shared/errors.ts';
import { resolveFloor } from './normalizer.ts';
import type { Deal, DealFilterCriteria } from '../types.ts';

/** Validate criteria, throwing InvalidInputError with every issue found */
export function validateCriteria(criteria: unknown): DealFilterCriteria {
  const result = DealFilterCriteriaSchema.safeParse(criteria ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    throw new InvalidInputError(`Invalid filter criteria: ${issues.join('; ')}`);
  }
  return result.data;
}

function inRange(value: number, lo: number | undefined, hi: number | undefined): boolean {
  if (lo !== undefined && value < lo) return false;
  if (hi !== undefined && value > hi) return false;
  return true;
}

/** Inclusive range check; a missing value fails whenever either bound is set */
function passesRange(value: number | undefined, lo: number | undefined, hi: number | undefined): boolean {
  if (lo === undefined && hi === undefined) return true;
  if (value === undefined) return false;
  return inRange(value, lo, hi);
}

export function matchesCriteria(deal: Deal, c: DealFilterCriteria): boolean {
  if (c.propertyType !== undefined) {
    if (!deal.propertyType) return false;
    if (!deal.propertyType.toLowerCase().trim().includes(c.propertyType.toLowerCase().trim())) return false;
  }

  if (!passesRange(deal.rooms, c.minRooms, c.maxRooms)) return false;
  if (!passesRange(deal.amount, c.minPrice, c.maxPrice)) return false;
  if (!passesRange(deal.area, c.minArea, c.maxArea)) return false;

  // Unknown floor stays in
  if (c.minFloor !== undefined || c.maxFloor !== undefined) {
    const floor = resolveFloor(deal);
    if (floor !== null && !inRange(floor, c.minFloor, c.maxFloor)) return false;
  }

  return true;
}

/**
 * Keep the deals matching every criterion. Order is preserved.
 */
export function filterDeals(deals: readonly Deal[], criteria: DealFilterCriteria = {}): Deal[] {
  if (!Array.isArray(deals)) throw new InvalidInputError('deals must be an array');
  const c = validateCriteria(criteria);
  return deals.filter(d => matchesCriteria(d, c));
}
