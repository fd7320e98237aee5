/**
 * comparison.ts — Market trends, address comparison and valuation comparables
 *
 * Pure functions over normalized deals. Fetching stays in the service layer so
 * the per-address failures of a comparison never reach this module.
 */
import { InsufficientDataError } from '../shared/errors.ts';
import { filterDeals } from './filters.ts';
import { mean, round, sortedRecord } from './helpers.ts';
import { computeStatistics, isMetric } from './statistics.ts';
import type {
  AddressComparison, AddressComparisonFailure, AddressMarketSummary, Deal, DealFilterCriteria,
  DealStatistics, MarketTrends, PriceBand, ValuationComparables, ValuationEstimate,
} from '../types.ts';

const UNKNOWN_TYPE = 'unknown';

function priceBand(prices: readonly number[]): PriceBand {
  return {
    averagePrice: round(mean(prices)),
    minPrice: Math.min(...prices),
    maxPrice: Math.max(...prices),
    dealCount: prices.length,
  };
}

function bandsBy(deals: readonly Deal[], keyOf: (d: Deal) => string): Record<string, PriceBand> {
  const groups: Record<string, number[]> = {};
  for (const d of deals) (groups[keyOf(d)] ??= []).push(d.amount);
  const out: Record<string, PriceBand> = {};
  for (const [key, prices] of Object.entries(sortedRecord(groups))) out[key] = priceBand(prices);
  return out;
}

// ── Trends ──

/** Price bands per deal year and per property type (unlabeled deals under "unknown") */
export function analyzeMarketTrends(deals: readonly Deal[]): MarketTrends {
  const priced = deals.filter(d => d.amount > 0 && d.date);
  if (!priced.length) throw new InsufficientDataError('No priced deals to analyze for market trends');
  return {
    totalDeals: deals.length,
    yearlyTrends: bandsBy(priced, d => d.date.slice(0, 4)),
    propertyTypeTrends: bandsBy(priced, d => d.propertyType || UNKNOWN_TYPE),
  };
}

// ── Comparison ──

/** Price and area ranges for one address; both are {} when it has no deals */
export function summarizeAddressMarket(address: string, deals: readonly Deal[]): AddressMarketSummary {
  const prices = deals.map(d => d.amount).filter(v => v > 0);
  const areas = deals.map(d => d.area).filter((a): a is number => a !== undefined && a > 0);
  return {
    address,
    totalDeals: deals.length,
    priceStats: prices.length
      ? { averagePrice: round(mean(prices)), minPrice: Math.min(...prices), maxPrice: Math.max(...prices) }
      : {},
    areaStats: areas.length
      ? { averageArea: round(mean(areas)), minArea: Math.min(...areas), maxArea: Math.max(...areas) }
      : {},
  };
}

export const isComparisonFailure = (c: AddressComparison): c is AddressComparisonFailure => 'error' in c;

const averagePrice = (c: AddressMarketSummary): number =>
  'averagePrice' in c.priceStats ? c.priceStats.averagePrice : 0;

/** Addresses with a positive average price, most expensive first; ties keep input order */
export function rankByAveragePrice(results: readonly AddressComparison[]): AddressMarketSummary[] {
  return results
    .filter((c): c is AddressMarketSummary => !isComparisonFailure(c) && averagePrice(c) > 0)
    .sort((a, b) => averagePrice(b) - averagePrice(a));
}

// ── Valuation ──

/** Mean, p25 and p75 price-per-area scaled to the subject area; null without price-per-area data */
export function estimateValue(statistics: DealStatistics, area: number): ValuationEstimate | null {
  const ppa = statistics.pricePerAreaStatistics;
  if (!isMetric(ppa)) return null;
  return {
    area,
    pricePerArea: ppa.mean,
    estimatedValue: round(ppa.mean * area, 0),
    low: round(ppa.p25 * area, 0),
    high: round(ppa.p75 * area, 0),
  };
}

/**
 * Filter candidate deals down to comparables and describe them.
 * With a subject area, also estimates its value from the comparables' price-per-area.
 */
export function buildComparables(
  candidates: readonly Deal[],
  criteria: DealFilterCriteria,
  area?: number,
): Omit<ValuationComparables, 'address' | 'summary'> {
  const deals = filterDeals(candidates, criteria);
  const statistics = computeStatistics(deals);
  return {
    criteria,
    totalCandidates: candidates.length,
    deals,
    statistics,
    estimate: area === undefined ? null : estimateValue(statistics, area),
  };
}
