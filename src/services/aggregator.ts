/**
 * aggregator.ts — Deal aggregation for an address
 *
 * Resolves the address, picks the nearest registry polygons, fetches their
 * street and neighborhood deals concurrently, then merges everything into one
 * deduplicated sequence ordered by tier (same building, street, neighborhood)
 * and newest first within each tier.
 *
 * Output order never depends on fetch completion order: batches are merged in
 * polygon-distance order and the final ordering comes from a two-pass stable sort.
 */
import type { RegistryConfig } from '../config/analysis.ts';
import { AggregateSchema } from '../schemas.ts';
import { AddressNotFoundError, InvalidInputError } from '../shared/errors.ts';
import { childLogger } from '../shared/logger.ts';
import { polygonsSkipped } from '../shared/metrics.ts';
import { isSameBuilding, type AddressMatcher } from './address-match.ts';
import { daysBefore, distance, round } from './helpers.ts';
import { dealAddress, dealKey, normalizeDeal, withPricePerArea } from './normalizer.ts';
import type {
  AggregateRequest, AggregationResult, AggregationSummary, Deal, DealBatch, DealQuery, DealSource,
  DealType, DealTypeDescription, Point, PolygonRef, PriorityTier, RawDeal,
} from '../types.ts';

const log = childLogger({ module: 'aggregator' });

const MAX_CANDIDATES = 3;
const EXPANDED_RADIUS_METERS = 200;

export const dealTypeDescription = (t: DealType): DealTypeDescription =>
  t === 1 ? 'first_hand_new' : 'second_hand_used';

// ── Ordering ──

/**
 * Priority-major, date-minor ordering in two stable passes:
 * date descending first, then tier ascending. The second pass keeps the
 * date order inside each tier.
 */
export function prioritySort(deals: readonly Deal[]): Deal[] {
  const byDate = [...deals].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
  return byDate.sort((a, b) => (a.priority ?? 3) - (b.priority ?? 3));
}

// ── Merge ──

export interface MergeOptions {
  searchAddress: string;
  maxDeals: number;
  dealType?: DealType;
  matcher?: AddressMatcher;
  maxStreetDistanceMeters?: number;
  maxNeighborhoodDistanceMeters?: number;
}

function tierOf(
  batch: DealBatch,
  deal: Deal,
  opts: MergeOptions,
  matcher: AddressMatcher,
): PriorityTier | null {
  const dist = batch.distanceMeters ?? 0;
  if (batch.kind === 'neighborhood') {
    return dist <= (opts.maxNeighborhoodDistanceMeters ?? Infinity) ? 2 : null;
  }
  if (matcher(opts.searchAddress, dealAddress(deal))) return 0;
  return dist <= (opts.maxStreetDistanceMeters ?? Infinity) ? 1 : null;
}

const SOURCE_BY_TIER = ['same_building', 'street', 'neighborhood'] as const;

/** Normalized deal, or null (logged) when the record's amount or date is unusable */
function tryNormalize(raw: RawDeal, batch: DealBatch, index: number): Deal | null {
  try {
    return normalizeDeal(raw);
  } catch (err) {
    if (!(err instanceof InvalidInputError)) throw err;
    log.warn({ polygonId: batch.polygonId, kind: batch.kind, index, reason: err.message }, 'Skipping malformed deal record');
    return null;
  }
}

/**
 * Merge raw batches into one ordered, deduplicated, capped sequence.
 * Street batches are consumed before neighborhood batches; the first deal seen
 * under a dedup key wins, even when the distance limits then drop it.
 * Records that do not normalize are skipped.
 */
export function mergeBatches(batches: readonly DealBatch[], opts: MergeOptions): Deal[] {
  if (!Array.isArray(batches)) throw new InvalidInputError('batches must be an array');
  if (!Number.isInteger(opts.maxDeals) || opts.maxDeals < 1) {
    throw new InvalidInputError('maxDeals must be a positive integer');
  }
  const matcher = opts.matcher ?? isSameBuilding;
  const ordered = [
    ...batches.filter(b => b.kind === 'street'),
    ...batches.filter(b => b.kind === 'neighborhood'),
  ];

  const seen = new Set<string>();
  const merged: Deal[] = [];

  for (const batch of ordered) {
    for (const [index, raw] of batch.records.entries()) {
      const deal = tryNormalize(raw, batch, index);
      if (!deal) continue;
      const key = dealKey(deal);
      if (seen.has(key)) continue;
      seen.add(key);

      const tier = tierOf(batch, deal, opts, matcher);
      if (tier === null) continue;

      const annotated: Deal = {
        ...deal,
        priority: tier,
        source: SOURCE_BY_TIER[tier],
        sourcePolygonId: batch.polygonId,
      };
      if (batch.distanceMeters !== undefined) annotated.distanceMeters = round(batch.distanceMeters, 1);
      if (opts.dealType !== undefined) {
        annotated.dealType = opts.dealType;
        annotated.dealTypeDescription = dealTypeDescription(opts.dealType);
      }
      merged.push(annotated);
    }
  }

  return prioritySort(merged).slice(0, opts.maxDeals).map(withPricePerArea);
}

export function summarize(deals: readonly Deal[], polygonsQueried: number, skipped: number): AggregationSummary {
  return {
    sameBuilding: deals.filter(d => d.priority === 0).length,
    street: deals.filter(d => d.priority === 1).length,
    neighborhood: deals.filter(d => d.priority === 2).length,
    polygonsQueried,
    polygonsSkipped: skipped,
  };
}

// ── Polygon selection ──

interface RankedPolygon {
  polygonId: string;
  distanceMeters: number;
}

/** Dedup by id keeping the closest, nearest first, capped */
export function rankPolygons(refs: readonly PolygonRef[], origin: Point, max: number): RankedPolygon[] {
  const byId = new Map<string, RankedPolygon>();
  for (const ref of refs) {
    if (!ref.polygonId) continue;
    const d = ref.point ? distance(origin, ref.point) : 0;
    const prev = byId.get(ref.polygonId);
    if (!prev || d < prev.distanceMeters) byId.set(ref.polygonId, { polygonId: ref.polygonId, distanceMeters: d });
  }
  return [...byId.values()].sort((a, b) => a.distanceMeters - b.distanceMeters).slice(0, max);
}

async function locatePolygons(
  source: DealSource,
  address: string,
  radius: number,
): Promise<{ origin: Point; polygons: PolygonRef[] } | null> {
  const candidates = await source.resolve(address);
  if (!candidates.length) throw new AddressNotFoundError(address);

  const located = candidates.slice(0, MAX_CANDIDATES)
    .flatMap(c => (c.point ? [{ text: c.text, point: c.point }] : []));
  if (!located.length) throw new AddressNotFoundError(address);

  const radii = radius < EXPANDED_RADIUS_METERS ? [radius, EXPANDED_RADIUS_METERS] : [radius];
  for (const r of radii) {
    if (r !== radius) log.warn({ address, radius, expandedTo: r }, 'No polygons at requested radius, expanding');
    for (const c of located) {
      const polygons = await source.dealsNear(c.point, r);
      if (polygons.length) {
        log.info({ candidate: c.text, radius: r, polygons: polygons.length }, 'Using address candidate');
        return { origin: c.point, polygons };
      }
    }
  }
  return null;
}

// ── Entry point ──

export interface AggregateOptions {
  matcher?: AddressMatcher;
  now?: Date;
}

/**
 * Aggregate recent deals around an address.
 * A polygon whose fetch fails is skipped and counted; the rest still contribute.
 */
export async function aggregateForAddress(
  source: DealSource,
  request: Pick<AggregateRequest, 'address'> & Partial<AggregateRequest>,
  config: RegistryConfig,
  options: AggregateOptions = {},
): Promise<AggregationResult> {
  const parsed = AggregateSchema.safeParse(request);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidInputError(`Invalid aggregate request: ${issues.join('; ')}`);
  }
  const req: AggregateRequest = {
    address: parsed.data.address,
    yearsBack: parsed.data.yearsBack ?? config.defaultYearsBack,
    radius: parsed.data.radius ?? config.defaultRadiusMeters,
    maxDeals: parsed.data.maxDeals ?? config.defaultDealLimit,
    dealType: parsed.data.dealType,
  };
  const now = options.now ?? new Date();

  log.info({ address: req.address, dealType: req.dealType }, 'Aggregating deals for address');

  const located = await locatePolygons(source, req.address, req.radius);
  if (!located) {
    log.warn({ address: req.address }, 'No polygons found, returning empty result');
    return { deals: [], summary: summarize([], 0, 0) };
  }

  const polygons = rankPolygons(located.polygons, located.origin, config.maxPolygonsToQuery);
  const query: Omit<DealQuery, 'limit'> = {
    startDate: daysBefore(now, req.yearsBack * 365).slice(0, 7),
    endDate: now.toISOString().slice(0, 7),
    dealType: req.dealType,
  };
  const streetLimit = Math.max(1, Math.floor(req.maxDeals / 2));
  const neighborhoodLimit = Math.max(1, Math.floor(req.maxDeals / 4));

  const fetched = await Promise.all(polygons.map(async poly => {
    try {
      const [street, neighborhood]: [RawDeal[], RawDeal[]] = await Promise.all([
        source.streetDeals(poly.polygonId, { ...query, limit: streetLimit }),
        source.neighborhoodDeals(poly.polygonId, { ...query, limit: neighborhoodLimit }),
      ]);
      return { poly, street, neighborhood };
    } catch (err) {
      log.warn({ err, polygonId: poly.polygonId }, 'Skipping polygon after fetch failure');
      polygonsSkipped.inc();
      return null;
    }
  }));

  const batches: DealBatch[] = [];
  let skipped = 0;
  for (const f of fetched) {
    if (!f) { skipped++; continue; }
    const { polygonId, distanceMeters } = f.poly;
    batches.push({ kind: 'street', polygonId, distanceMeters, records: f.street });
    batches.push({ kind: 'neighborhood', polygonId, distanceMeters, records: f.neighborhood });
  }

  const deals = mergeBatches(batches, {
    searchAddress: req.address,
    maxDeals: req.maxDeals,
    dealType: req.dealType,
    matcher: options.matcher,
    maxStreetDistanceMeters: config.maxStreetDealDistanceMeters,
    maxNeighborhoodDistanceMeters: config.maxNeighborhoodDealDistanceMeters,
  });

  const summary = summarize(deals, polygons.length, skipped);
  log.info({ address: req.address, total: deals.length, ...summary }, 'Aggregation complete');
  return { deals, summary };
}
