/**
 * outliers.ts — Outlier screening for deal sets
 *
 * Pipeline (filterForAnalysis):
 *   1. Hard bounds: price-per-area window and minimum deal amount, always first
 *   2. Statistical pass on the surviving values of one metric (iqr | percent)
 *   3. Percent-of-median backup pass, iqr only, when enabled
 *
 * Each statistical pass works on a subset; positions map back to original
 * indices through an explicit index list.
 */
import type { AnalysisConfig } from '../config/analysis.ts';
import { childLogger } from '../shared/logger.ts';
import { InvalidInputError } from '../shared/errors.ts';
import { middleValue, quantileAt, sortedAsc } from './helpers.ts';
import type {
  Deal, OutlierFilterResult, OutlierMethod, OutlierMetric, OutlierParameters,
  OutlierReason, OutlierRemoval, OutlierReport,
} from '../types.ts';

const log = childLogger({ module: 'outliers' });

// ── Primitive detectors ──

/** Q3 − Q1 with index-based quartiles; 0 for empty input */
export function computeQuartileRange(values: readonly number[]): number {
  if (!values.length) return 0;
  const s = sortedAsc(values);
  return quantileAt(s, 3, 4) - quantileAt(s, 1, 4);
}

/** Flags values outside [Q1 − k·IQR, Q3 + k·IQR]; nothing is flagged below 4 values */
export function flagQuartileOutliers(values: readonly number[], multiplier = 1.5): boolean[] {
  if (values.length < 4) return values.map(() => false);
  const s = sortedAsc(values);
  const q1 = quantileAt(s, 1, 4);
  const q3 = quantileAt(s, 3, 4);
  const iqr = q3 - q1;
  const lower = q1 - multiplier * iqr;
  const upper = q3 + multiplier * iqr;
  return values.map(v => v < lower || v > upper);
}

/** Flags values outside [median·(1−t), median·(1+t)], median = s[⌊n/2⌋] */
export function flagPercentOutliers(values: readonly number[], threshold = 0.5): boolean[] {
  if (!values.length) return [];
  const median = middleValue(sortedAsc(values));
  const lower = median * (1 - threshold);
  const upper = median * (1 + threshold);
  return values.map(v => v < lower || v > upper);
}

export interface HardBoundFlags {
  pricePerArea: boolean[];
  minAmount: boolean[];
}

/**
 * Price-per-area outside [min, max] and amount below the minimum, flagged independently.
 * Deals without a price-per-area are never flagged by the window.
 */
export function applyHardBounds(
  deals: readonly Deal[],
  bounds: Pick<AnalysisConfig, 'pricePerAreaMin' | 'pricePerAreaMax' | 'minDealAmount'>,
): HardBoundFlags {
  return {
    pricePerArea: deals.map(d =>
      d.pricePerArea !== undefined && (d.pricePerArea < bounds.pricePerAreaMin || d.pricePerArea > bounds.pricePerAreaMax)),
    minAmount: deals.map(d => d.amount < bounds.minDealAmount),
  };
}

// ── Strategies ──

/** A statistical pass: given metric values, return one flag per value. */
export interface OutlierStrategy {
  readonly reason: OutlierReason;
  flag(values: readonly number[]): boolean[];
}

export const quartileStrategy = (multiplier: number): OutlierStrategy => ({
  reason: 'iqr',
  flag: values => flagQuartileOutliers(values, multiplier),
});

export const percentStrategy = (threshold: number, reason: OutlierReason = 'percent'): OutlierStrategy => ({
  reason,
  flag: values => flagPercentOutliers(values, threshold),
});

/** Ordered statistical passes for a method; empty for 'none' */
export function strategiesFor(method: OutlierMethod, config: AnalysisConfig, multiplier: number): OutlierStrategy[] {
  switch (method) {
    case 'none':
      return [];
    case 'percent':
      return [percentStrategy(config.percentThreshold)];
    case 'iqr':
      return config.usePercentageBackup
        ? [quartileStrategy(multiplier), percentStrategy(config.percentageBackupThreshold, 'percent_backup')]
        : [quartileStrategy(multiplier)];
  }
}

function metricValue(deal: Deal, metric: OutlierMetric): number | undefined {
  return metric === 'price_per_area' ? deal.pricePerArea : deal.amount;
}

// ── Orchestration ──

export interface FilterOptions {
  method?: OutlierMethod;
  metric?: OutlierMetric;
  iqrMultiplier?: number;
}

function skippedReport(totalDeals: number, reason: string): OutlierReport {
  return Object.freeze({
    totalDeals,
    outliersRemoved: 0,
    outlierIndices: Object.freeze([]),
    removals: Object.freeze([]),
    methodUsed: 'none',
    parameters: null,
    skipReason: reason,
  });
}

/**
 * Screen a deal set for outliers.
 * Returns the surviving deals (original order) and an immutable report of what
 * was removed and why.
 */
export function filterForAnalysis(
  deals: readonly Deal[],
  config: AnalysisConfig,
  options: FilterOptions = {},
): OutlierFilterResult {
  if (!Array.isArray(deals)) throw new InvalidInputError('deals must be an array');
  const method = options.method ?? config.outlierMethod;
  const metric = options.metric ?? 'price_per_area';
  const multiplier = options.iqrMultiplier ?? config.iqrMultiplier;
  if (!(multiplier > 0)) throw new InvalidInputError('iqrMultiplier must be positive');

  if (method === 'none') {
    return { deals: [...deals], report: skippedReport(deals.length, 'outlier detection disabled') };
  }
  if (deals.length < config.minDealsForOutlierDetection) {
    return {
      deals: [...deals],
      report: skippedReport(deals.length, `insufficient data (${deals.length} < ${config.minDealsForOutlierDetection})`),
    };
  }

  const reasons: OutlierReason[][] = deals.map(() => []);

  const hard = applyHardBounds(deals, config);
  deals.forEach((_, i) => {
    if (hard.pricePerArea[i]) reasons[i].push('price_per_area_bounds');
    if (hard.minAmount[i]) reasons[i].push('min_deal_amount');
  });

  for (const strategy of strategiesFor(method, config, multiplier)) {
    // Survivors so far, with their original positions
    const indices: number[] = [];
    const values: number[] = [];
    deals.forEach((d, i) => {
      const v = metricValue(d, metric);
      if (v !== undefined && reasons[i].length === 0) {
        indices.push(i);
        values.push(v);
      }
    });
    if (!values.length) continue;

    strategy.flag(values).forEach((flagged, pos) => {
      if (flagged) reasons[indices[pos]].push(strategy.reason);
    });
  }

  const kept: Deal[] = [];
  const removals: OutlierRemoval[] = [];
  deals.forEach((d, i) => {
    if (reasons[i].length) removals.push(Object.freeze({ index: i, reasons: Object.freeze(reasons[i]) }));
    else kept.push(d);
  });

  const isIqr = method === 'iqr';
  const parameters: OutlierParameters = Object.freeze({
    metric,
    iqrMultiplier: isIqr ? multiplier : null,
    percentThreshold: method === 'percent' ? config.percentThreshold : null,
    percentageBackupEnabled: isIqr ? config.usePercentageBackup : null,
    percentageBackupThreshold: isIqr && config.usePercentageBackup ? config.percentageBackupThreshold : null,
    pricePerAreaMin: config.pricePerAreaMin,
    pricePerAreaMax: config.pricePerAreaMax,
    minDealAmount: config.minDealAmount,
  });

  const report: OutlierReport = Object.freeze({
    totalDeals: deals.length,
    outliersRemoved: removals.length,
    outlierIndices: Object.freeze(removals.map(r => r.index)),
    removals: Object.freeze(removals),
    methodUsed: method,
    parameters,
    skipReason: null,
  });

  if (removals.length) {
    log.debug({ method, metric, total: deals.length, removed: removals.length }, 'Outliers removed');
  }
  return { deals: kept, report };
}
