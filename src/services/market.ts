/**
 * market.ts — Market activity, liquidity and investment metrics
 *
 * All three scores interpolate linearly inside fixed bands and are clamped to [0, 100].
 * Every call recomputes from the deals given; nothing is cached.
 */
import { InsufficientDataError, InvalidInputError } from '../shared/errors.ts';
import { childLogger } from '../shared/logger.ts';
import {
  clamp, daysBefore, fractionalYear, mean, monthKey, parseDealDate, quarterKey, round, sampleStdDev, sortedRecord,
} from './helpers.ts';
import type {
  ActivityTrend, DataQuality, Deal, InvestmentAnalysis, LiquidityLevel, LiquidityMetrics, LiquidityTrend,
  MarketActivityScore, MarketStability, ParsedDealDates, PriceTrend,
} from '../types.ts';

const log = childLogger({ module: 'market' });

// ── Thresholds ──

// deals per month
const ACTIVITY = { veryHigh: 10, high: 5, moderate: 3, low: 1 } as const;
const LIQUIDITY = { veryHigh: 8, high: 5, moderate: 2, low: 0.5 } as const;
// coefficient of variation, %
const VOLATILITY = { veryVolatile: 50, volatile: 30, moderate: 20, stable: 10 } as const;

const ACTIVITY_TREND_CHANGE = 0.15;
const LIQUIDITY_IMPROVING = 1.2;
const LIQUIDITY_DECLINING = 0.8;
const PRICE_TREND_RATE = 2;
const MIN_INVESTMENT_POINTS = 3;

/** base + ((v − lo) / (hi − lo)) · 25 */
const interpolate = (base: number, v: number, lo: number, hi: number): number => base + ((v - lo) / (hi - lo)) * 25;

function assertDeals(deals: readonly Deal[], what: string): void {
  if (!Array.isArray(deals)) throw new InvalidInputError('deals must be an array');
  if (!deals.length) throw new InsufficientDataError(`Cannot calculate ${what} from an empty deal list`);
}

// ── Date bucketing ──

/**
 * Group deal dates by month (YYYY-MM) and quarter (YYYY-Qn).
 * With a window, deals dated before now − windowMonths·30 days are ignored.
 * Throws InsufficientDataError when no date survives.
 */
export function parseDealDates(
  deals: readonly Deal[],
  windowMonths: number | null = null,
  now: Date = new Date(),
): ParsedDealDates {
  const cutoff = windowMonths === null ? null : daysBefore(now, windowMonths * 30);
  const dates: string[] = [];
  const monthly: Record<string, number> = {};
  const quarterly: Record<string, number> = {};

  for (const deal of deals) {
    const date = parseDealDate(deal.date);
    if (date === null) {
      log.warn({ date: deal.date }, 'Skipping deal with invalid date');
      continue;
    }
    if (cutoff !== null && date < cutoff) continue;

    const m = monthKey(date);
    const q = quarterKey(date);
    monthly[m] = (monthly[m] || 0) + 1;
    quarterly[q] = (quarterly[q] || 0) + 1;
    dates.push(date);
  }

  if (!dates.length) throw new InsufficientDataError('No valid deal dates found in the requested period');
  return { dates, monthly: sortedRecord(monthly), quarterly: sortedRecord(quarterly) };
}

// ── Activity ──

export function activityBandScore(dealsPerMonth: number): number {
  const v = dealsPerMonth;
  if (v >= ACTIVITY.veryHigh) return 100;
  if (v >= ACTIVITY.high) return interpolate(75, v, ACTIVITY.high, ACTIVITY.veryHigh);
  if (v >= ACTIVITY.moderate) return interpolate(50, v, ACTIVITY.moderate, ACTIVITY.high);
  if (v >= ACTIVITY.low) return interpolate(25, v, ACTIVITY.low, ACTIVITY.moderate);
  return v * 25;
}

/** First half of the sorted months against the second half */
export function activityTrend(monthly: Record<string, number>): ActivityTrend {
  const months = Object.keys(monthly).sort();
  if (months.length < 4) return 'insufficient_data';
  const mid = Math.floor(months.length / 2);
  const first = mean(months.slice(0, mid).map(m => monthly[m]));
  const second = mean(months.slice(mid).map(m => monthly[m]));
  const change = first > 0 ? (second - first) / first : 0;
  if (change > ACTIVITY_TREND_CHANGE) return 'increasing';
  if (change < -ACTIVITY_TREND_CHANGE) return 'decreasing';
  return 'stable';
}

export function calculateActivityScore(
  deals: readonly Deal[],
  windowMonths: number | null = 12,
  now: Date = new Date(),
): MarketActivityScore {
  assertDeals(deals, 'market activity');
  const { dates, monthly } = parseDealDates(deals, windowMonths, now);

  const distinctMonths = Object.keys(monthly).length;
  const dealsPerMonth = distinctMonths > 0 ? dates.length / distinctMonths : 0;

  return {
    activityScore: round(clamp(activityBandScore(dealsPerMonth), 0, 100), 1),
    totalDeals: dates.length,
    dealsPerMonth: round(dealsPerMonth, 2),
    trend: activityTrend(monthly),
    timePeriodMonths: windowMonths,
    monthlyDistribution: monthly,
  };
}

// ── Liquidity ──

export function liquidityBand(dealsPerMonth: number): { score: number; level: LiquidityLevel } {
  const v = dealsPerMonth;
  if (v >= LIQUIDITY.veryHigh) return { score: 100, level: 'very_high' };
  if (v >= LIQUIDITY.high) return { score: interpolate(75, v, LIQUIDITY.high, LIQUIDITY.veryHigh), level: 'high' };
  if (v >= LIQUIDITY.moderate) return { score: interpolate(50, v, LIQUIDITY.moderate, LIQUIDITY.high), level: 'moderate' };
  if (v >= LIQUIDITY.low) return { score: interpolate(25, v, LIQUIDITY.low, LIQUIDITY.moderate), level: 'low' };
  return { score: v * 50, level: 'very_low' };
}

/** Most recent quarter against the mean of all earlier quarters */
export function liquidityTrend(quarterly: Record<string, number>): LiquidityTrend {
  const quarters = Object.keys(quarterly).sort();
  if (quarters.length < 3) return 'insufficient_data';
  const recent = quarterly[quarters[quarters.length - 1]];
  const earlier = mean(quarters.slice(0, -1).map(q => quarterly[q]));
  if (recent > earlier * LIQUIDITY_IMPROVING) return 'improving';
  if (recent < earlier * LIQUIDITY_DECLINING) return 'declining';
  return 'stable';
}

/** Key with the highest count; earliest key wins ties */
function busiest(counts: Record<string, number>): string {
  let best = '';
  let max = -1;
  for (const [k, n] of Object.entries(counts)) {
    if (n > max) { max = n; best = k; }
  }
  return best;
}

export function calculateLiquidity(
  deals: readonly Deal[],
  windowMonths: number | null = 12,
  now: Date = new Date(),
): LiquidityMetrics {
  assertDeals(deals, 'market liquidity');
  const { dates, monthly, quarterly } = parseDealDates(deals, windowMonths, now);

  const total = dates.length;
  const distinctMonths = Object.keys(monthly).length;
  const distinctQuarters = Object.keys(quarterly).length;
  const perMonth = distinctMonths > 0 ? total / distinctMonths : 0;
  const perQuarter = distinctQuarters > 0 ? total / distinctQuarters : 0;
  const band = liquidityBand(perMonth);

  return {
    liquidityScore: round(clamp(band.score, 0, 100), 1),
    totalDeals: total,
    timePeriodMonths: windowMonths,
    avgDealsPerMonth: round(perMonth, 2),
    avgDealsPerQuarter: round(perQuarter, 2),
    dealVelocity: round(perMonth, 2),
    marketActivityLevel: band.level,
    trendDirection: liquidityTrend(quarterly),
    quarterlyBreakdown: quarterly,
    mostActiveQuarter: busiest(quarterly),
    mostActiveMonth: busiest(monthly),
  };
}

// ── Investment potential ──

export function volatilityBand(cv: number): { score: number; stability: MarketStability } {
  if (cv > VOLATILITY.veryVolatile) return { score: 100, stability: 'very_volatile' };
  if (cv > VOLATILITY.volatile) return { score: interpolate(75, cv, VOLATILITY.volatile, VOLATILITY.veryVolatile), stability: 'volatile' };
  if (cv > VOLATILITY.moderate) return { score: interpolate(50, cv, VOLATILITY.moderate, VOLATILITY.volatile), stability: 'moderate' };
  if (cv > VOLATILITY.stable) return { score: interpolate(25, cv, VOLATILITY.stable, VOLATILITY.moderate), stability: 'stable' };
  return { score: (cv / VOLATILITY.stable) * 25, stability: 'very_stable' };
}

export function dataQualityFor(n: number): DataQuality {
  if (n >= 20) return 'excellent';
  if (n >= 10) return 'good';
  if (n >= 5) return 'fair';
  return 'limited';
}

/** Closed-form OLS slope of y against t; 0 when t has no spread */
export function olsSlope(points: ReadonlyArray<readonly [number, number]>): number {
  const n = points.length;
  let st = 0, sp = 0, stp = 0, st2 = 0;
  for (const [t, p] of points) {
    st += t; sp += p; stp += t * p; st2 += t * t;
  }
  const den = n * st2 - st * st;
  return den !== 0 ? (n * stp - st * sp) / den : 0;
}

/**
 * Appreciation and stability of price-per-area over time.
 * Needs at least 3 deals with both a positive price-per-area and a valid date.
 */
export function analyzeInvestmentPotential(deals: readonly Deal[]): InvestmentAnalysis {
  assertDeals(deals, 'investment potential');

  const points: Array<[number, number]> = [];
  for (const d of deals) {
    const date = parseDealDate(d.date);
    if (date === null || d.pricePerArea === undefined || !(d.pricePerArea > 0)) continue;
    points.push([fractionalYear(date), d.pricePerArea]);
  }
  if (points.length < MIN_INVESTMENT_POINTS) {
    throw new InsufficientDataError(
      `Insufficient data for investment analysis (need at least ${MIN_INVESTMENT_POINTS} deals with price-per-area and date, got ${points.length})`,
    );
  }

  points.sort((a, b) => a[0] - b[0]);
  const prices = points.map(p => p[1]);
  const avg = mean(prices);

  const slope = olsSlope(points);
  const rate = avg > 0 ? (slope / avg) * 100 : 0;

  const first = prices[0];
  const last = prices[prices.length - 1];
  const priceChangePct = first > 0 ? ((last - first) / first) * 100 : 0;

  let priceTrend: PriceTrend = 'stable';
  if (rate > PRICE_TREND_RATE) priceTrend = 'increasing';
  else if (rate < -PRICE_TREND_RATE) priceTrend = 'decreasing';

  const cv = avg > 0 ? (sampleStdDev(prices) / avg) * 100 : 0;
  const vol = volatilityBand(cv);
  const volatilityScore = clamp(vol.score, 0, 100);

  const appreciationComponent = clamp(rate * 5, -25, 50);
  const stabilityComponent = (100 - volatilityScore) * 0.5;

  return {
    investmentScore: round(clamp(appreciationComponent + stabilityComponent, 0, 100), 1),
    priceTrend,
    priceAppreciationRate: round(rate, 2),
    priceVolatility: round(volatilityScore, 1),
    marketStability: vol.stability,
    coefficientOfVariation: round(cv, 2),
    appreciationComponent: round(appreciationComponent, 2),
    stabilityComponent: round(stabilityComponent, 2),
    avgPricePerArea: round(avg, 0),
    priceChangePct: round(priceChangePct, 2),
    totalDeals: points.length,
    dataQuality: dataQualityFor(points.length),
  };
}
