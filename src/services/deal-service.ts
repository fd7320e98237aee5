/**
 * deal-service.ts — Caller-facing operations
 *
 * Binds the registry source and both configuration values once, so routes and
 * scripts call plain methods. Stateless apart from those injected values.
 */
import type { AnalysisConfig, RegistryConfig } from '../config/analysis.ts';
import { AnalysisError, InsufficientDataError } from '../shared/errors.ts';
import { childLogger } from '../shared/logger.ts';
import { aggregateForAddress } from './aggregator.ts';
import { analyzeMarketTrends, buildComparables, rankByAveragePrice, summarizeAddressMarket } from './comparison.ts';
import { filterDeals } from './filters.ts';
import { analyzeInvestmentPotential, calculateActivityScore, calculateLiquidity } from './market.ts';
import { filterForAnalysis, type FilterOptions } from './outliers.ts';
import { computeComprehensiveStatistics, computeStatistics } from './statistics.ts';
import type {
  AddressAnalysis, AddressComparison, AddressComparisonResult, AddressTrends, AggregateRequest, AggregationResult,
  ComprehensiveStatistics, Deal, DealFilterCriteria, DealSource, DealStatistics, InvestmentAnalysis,
  LiquidityMetrics, MarketActivityScore, MarketTrends, MaybeMetric, OutlierFilterResult, OutlierMetric,
  ValuationComparables,
} from '../types.ts';

type AddressRequest = Pick<AggregateRequest, 'address'> & Partial<AggregateRequest>;

const log = childLogger({ module: 'deal-service' });

/** Metric result, or the reason it could not be computed from too little data */
function attempt<T>(fn: () => T): MaybeMetric<T> {
  try {
    return { value: fn(), error: null };
  } catch (err) {
    if (err instanceof InsufficientDataError) return { value: null, error: err.message };
    throw err;
  }
}

export class DealService {
  constructor(
    private readonly source: DealSource,
    private readonly analysis: AnalysisConfig,
    private readonly registry: RegistryConfig,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  aggregate(request: AddressRequest): Promise<AggregationResult> {
    return aggregateForAddress(this.source, request, this.registry, { now: this.clock() });
  }

  filter(deals: readonly Deal[], criteria: DealFilterCriteria): Deal[] {
    return filterDeals(deals, criteria);
  }

  statistics(deals: readonly Deal[]): DealStatistics {
    return computeStatistics(deals);
  }

  comprehensiveStatistics(deals: readonly Deal[], metric: OutlierMetric = 'price_per_area'): ComprehensiveStatistics {
    return computeComprehensiveStatistics(deals, this.analysis, metric);
  }

  filterOutliers(deals: readonly Deal[], options: FilterOptions = {}): OutlierFilterResult {
    return filterForAnalysis(deals, this.analysis, options);
  }

  activityScore(deals: readonly Deal[], windowMonths: number | null = 12): MarketActivityScore {
    return calculateActivityScore(deals, windowMonths, this.clock());
  }

  liquidity(deals: readonly Deal[], windowMonths: number | null = 12): LiquidityMetrics {
    return calculateLiquidity(deals, windowMonths, this.clock());
  }

  investmentPotential(deals: readonly Deal[]): InvestmentAnalysis {
    return analyzeInvestmentPotential(deals);
  }

  /**
   * Aggregate around an address, then every metric the data supports.
   * Metrics short on data come back as { value: null, error }.
   */
  async addressAnalysis(
    request: AddressRequest,
    metric: OutlierMetric = 'price_per_area',
  ): Promise<AddressAnalysis> {
    const { deals, summary } = await this.aggregate(request);
    const statistics = this.comprehensiveStatistics(deals, metric);
    const screened = this.filterOutliers(deals, { metric }).deals;

    return {
      address: request.address.trim(),
      summary,
      deals,
      statistics,
      activity: attempt(() => this.activityScore(deals, null)),
      liquidity: attempt(() => this.liquidity(deals, null)),
      investment: attempt(() => this.investmentPotential(screened)),
    };
  }

  marketTrends(deals: readonly Deal[]): MarketTrends {
    return analyzeMarketTrends(deals);
  }

  async addressTrends(request: AddressRequest): Promise<AddressTrends> {
    const { deals, summary } = await this.aggregate(request);
    return { address: request.address.trim(), summary, trends: analyzeMarketTrends(deals) };
  }

  /**
   * Aggregate each address concurrently and rank them by average price.
   * An address that fails with an AnalysisError is reported in place; anything
   * else rejects the whole comparison.
   */
  async compareAddresses(
    addresses: readonly string[],
    options: Partial<Omit<AggregateRequest, 'address'>> = {},
  ): Promise<AddressComparisonResult> {
    const results = await Promise.all(addresses.map(async (address): Promise<AddressComparison> => {
      try {
        const { deals } = await this.aggregate({ ...options, address });
        return summarizeAddressMarket(address, deals);
      } catch (err) {
        if (!(err instanceof AnalysisError)) throw err;
        log.warn({ address, code: err.code, reason: err.message }, 'Address comparison entry failed');
        return { address, error: err.message, code: err.code };
      }
    }));
    return {
      addressesCompared: addresses.length,
      rankingByAveragePrice: rankByAveragePrice(results),
      results,
    };
  }

  /** Aggregate around the address, keep the deals matching the criteria, describe them */
  async valuationComparables(
    request: AddressRequest,
    criteria: DealFilterCriteria = {},
    area?: number,
  ): Promise<ValuationComparables> {
    const { deals, summary } = await this.aggregate(request);
    return { address: request.address.trim(), summary, ...buildComparables(deals, criteria, area) };
  }
}
