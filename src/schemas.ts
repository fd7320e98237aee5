// ═══════════════════════════════════════════════════════
// Zod Schemas — Input validation for deals and every API endpoint
// ═══════════════════════════════════════════════════════
import { z } from 'zod';
import { OutlierMethodEnum, OutlierMetricEnum } from './config/analysis.ts';
import { normalizeDeal, withPricePerArea } from './services/normalizer.ts';
import { parseDealDate } from './services/helpers.ts';
import { errorMessage } from './shared/errors.ts';

// ── Shared enums ──

export const DealTypeSchema = z.union([z.literal(1), z.literal(2)]);
export const PriorityTierSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);
export const DealSourceEnum = z.enum(['same_building', 'street', 'neighborhood']);
export const DealTypeDescriptionEnum = z.enum(['first_hand_new', 'second_hand_used']);

// ── Deals ──

/** A registry record is accepted when it normalizes (finite amount, valid date). */
export const RawDealSchema = z.record(z.string(), z.unknown()).superRefine((raw, ctx) => {
  try {
    normalizeDeal(raw);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(err) });
  }
});

const optionalText = z.string().trim().min(1).max(200).optional();

/** Canonical deal as returned by the aggregate endpoint and posted back by callers. */
export const DealSchema = z.object({
  id: z.union([z.string(), z.number().transform(String)]).nullable().default(null),
  amount: z.number().finite(),
  date: z.string().transform((v, ctx) => {
    const parsed = parseDealDate(v);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'date must be YYYY-MM-DD' });
      return z.NEVER;
    }
    return parsed;
  }),
  area: z.number().finite().optional(),
  rooms: z.number().finite().min(0).optional(),
  floor: optionalText,
  floorNumber: z.number().int().optional(),
  propertyType: optionalText,
  settlement: optionalText,
  neighborhood: optionalText,
  street: optionalText,
  houseNumber: z.string().max(20).optional(),
  pricePerArea: z.number().optional(),   // recomputed, never trusted
  priority: PriorityTierSchema.optional(),
  source: DealSourceEnum.optional(),
  sourcePolygonId: z.string().max(100).optional(),
  distanceMeters: z.number().min(0).optional(),
  dealType: DealTypeSchema.optional(),
  dealTypeDescription: DealTypeDescriptionEnum.optional(),
}).transform(withPricePerArea);

/** Either a canonical deal or a raw registry record. */
export const DealInputSchema = z.union([
  DealSchema,
  RawDealSchema.transform(raw => normalizeDeal(raw)),
]);

export const DealListSchema = z.array(DealInputSchema).max(10_000);

// ── Filter criteria ──

const bound = z.number().finite().min(0).optional();
const floorBound = z.number().int().optional();

export const DealFilterCriteriaSchema = z.object({
  propertyType: z.string().trim().min(1).max(100).optional(),
  minRooms: bound,
  maxRooms: bound,
  minPrice: bound,
  maxPrice: bound,
  minArea: bound,
  maxArea: bound,
  minFloor: floorBound,
  maxFloor: floorBound,
}).strict().superRefine((c, ctx) => {
  const pairs = [
    ['minRooms', 'maxRooms'],
    ['minPrice', 'maxPrice'],
    ['minArea', 'maxArea'],
    ['minFloor', 'maxFloor'],
  ] as const;
  for (const [lo, hi] of pairs) {
    const a = c[lo];
    const b = c[hi];
    if (a !== undefined && b !== undefined && a > b) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [lo], message: `${lo} cannot be greater than ${hi}` });
    }
  }
});

// ── POST /api/deals/aggregate ──

export const AggregateSchema = z.object({
  address: z.string().trim().min(1, 'address must not be empty').max(500),
  yearsBack: z.number().int().min(1).max(50).optional(),
  radius: z.number().int().min(1).max(5000).optional(),
  maxDeals: z.number().int().min(1).max(10_000).optional(),
  dealType: DealTypeSchema.default(2),
});

// ── GET /api/address/trends, GET /api/address/analysis ──

export const AddressQuerySchema = z.object({
  address: z.string().trim().min(1, 'address must not be empty').max(500),
  yearsBack: z.coerce.number().int().min(1).max(50).optional(),
  radius: z.coerce.number().int().min(1).max(5000).optional(),
  maxDeals: z.coerce.number().int().min(1).max(10_000).optional(),
  dealType: z.coerce.number().pipe(DealTypeSchema).default(2),
});

export const AddressAnalysisQuerySchema = AddressQuerySchema.extend({
  metric: OutlierMetricEnum.default('price_per_area'),
});

// ── POST /api/address/compare ──

export const CompareBodySchema = AggregateSchema.omit({ address: true }).extend({
  addresses: z.array(z.string().trim().min(1, 'address must not be empty').max(500))
    .min(1, 'at least one address is required')
    .max(10, 'at most 10 addresses can be compared'),
});

// ── POST /api/address/comparables ──

export const ComparablesBodySchema = AggregateSchema.extend({
  criteria: DealFilterCriteriaSchema.default({}),
  area: z.number().positive().optional(),
});

// ── POST /api/deals/* (deal-list bodies) ──

export const DealsBodySchema = z.object({
  deals: DealListSchema,
});

export const FilterBodySchema = z.object({
  deals: DealListSchema,
  criteria: DealFilterCriteriaSchema.default({}),
});

export const WindowedBodySchema = z.object({
  deals: DealListSchema,
  windowMonths: z.number().int().min(1).max(600).nullable().default(12),
});

export const OutlierBodySchema = z.object({
  deals: DealListSchema,
  method: OutlierMethodEnum.optional(),
  metric: OutlierMetricEnum.default('price_per_area'),
  iqrMultiplier: z.number().positive().optional(),
});

export const AnalysisBodySchema = z.object({
  deals: DealListSchema,
  metric: OutlierMetricEnum.default('price_per_area'),
});
