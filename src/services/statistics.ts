/**
 * statistics.ts — Descriptive statistics over a deal sequence
 *
 * Per metric (price, area, price-per-area) only present positive values count;
 * a metric without any yields {} rather than zeros.
 *
 * Medians differ by metric: price averages the two central values on even
 * samples, area and price-per-area take s[⌊n/2⌋]. Quartiles are index-based.
 */
import type { AnalysisConfig } from '../config/analysis.ts';
import { InvalidInputError } from '../shared/errors.ts';
import { filterForAnalysis } from './outliers.ts';
import { med, mean, middleValue, quantileAt, round, sampleStdDev, sortedAsc, sum } from './helpers.ts';
import type {
  ComprehensiveStatistics, DateRange, Deal, DealStatistics, MetricStatistics, MetricSummary, OutlierMetric,
} from '../types.ts';

const positive = (v: number | undefined): v is number => v !== undefined && Number.isFinite(v) && v > 0;

function priceStats(values: number[]): MetricSummary {
  if (!values.length) return {};
  const s = sortedAsc(values);
  return {
    mean: round(mean(values)),
    median: med(values),
    min: s[0],
    max: s[s.length - 1],
    p25: quantileAt(s, 1, 4),
    p75: quantileAt(s, 3, 4),
    stdDev: round(sampleStdDev(values)),
    total: sum(values),
  };
}

function areaStats(values: number[]): MetricSummary {
  if (!values.length) return {};
  const s = sortedAsc(values);
  return {
    mean: round(mean(values)),
    median: middleValue(s),
    min: s[0],
    max: s[s.length - 1],
    p25: quantileAt(s, 1, 4),
    p75: quantileAt(s, 3, 4),
    stdDev: round(sampleStdDev(values)),
  };
}

function pricePerAreaStats(values: number[]): MetricSummary {
  const base = areaStats(values);
  if (!isMetric(base)) return base;
  const out: MetricStatistics = {
    mean: round(base.mean),
    median: round(base.median),
    min: round(base.min),
    max: round(base.max),
    p25: round(base.p25),
    p75: round(base.p75),
    stdDev: round(base.stdDev),
  };
  return out;
}

/** Narrow a summary to populated statistics */
export function isMetric(summary: MetricSummary): summary is MetricStatistics {
  return 'mean' in summary;
}

function countBy(keys: string[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const k of keys) out[k] = (out[k] || 0) + 1;
  return out;
}

function dateRange(deals: readonly Deal[]): DateRange | null {
  if (!deals.length) return null;
  let earliest = deals[0].date;
  let latest = deals[0].date;
  for (const d of deals) {
    if (d.date < earliest) earliest = d.date;
    if (d.date > latest) latest = d.date;
  }
  return { earliest, latest };
}

/**
 * Descriptive statistics; an empty sequence yields totalDeals 0 and empty maps.
 */
export function computeStatistics(deals: readonly Deal[]): DealStatistics {
  if (!Array.isArray(deals)) throw new InvalidInputError('deals must be an array');

  const prices = deals.map(d => d.amount).filter(positive);
  const areas = deals.map(d => d.area).filter(positive);
  const ppas = deals.map(d => d.pricePerArea).filter(positive);

  const rooms = deals.map(d => d.rooms).filter((r): r is number => r !== undefined && Number.isFinite(r));
  const roomDistribution = countBy(sortedAsc(rooms).map(String));

  const labels = deals.map(d => d.propertyType).filter((t): t is string => !!t);

  return {
    totalDeals: deals.length,
    priceStatistics: priceStats(prices),
    areaStatistics: areaStats(areas),
    pricePerAreaStatistics: pricePerAreaStats(ppas),
    propertyTypeDistribution: countBy(labels),
    roomDistribution,
    dateRange: dateRange(deals),
  };
}

/**
 * Outlier-screened statistics: the filtered set, optionally the unfiltered set,
 * and the report describing what was removed.
 */
export function computeComprehensiveStatistics(
  deals: readonly Deal[],
  config: AnalysisConfig,
  metric: OutlierMetric = 'price_per_area',
): ComprehensiveStatistics {
  const { deals: kept, report } = filterForAnalysis(deals, config, { metric });
  const result: ComprehensiveStatistics = {
    filtered: computeStatistics(kept),
    outlierReport: report,
  };
  if (config.includeUnfilteredStats) result.unfiltered = computeStatistics(deals);
  return result;
}
