// ═══════════════════════════════════════════════════════
// Deal Analytics — Core Type Definitions
// Every data shape passed between the pipeline stages.
// ═══════════════════════════════════════════════════════

// ── Registry raw shapes ──

/** Raw deal record as returned by the registry. Field names vary by endpoint. */
export type RawDeal = Record<string, unknown>;

export interface Point {
  x: number;      // ITM easting, metres
  y: number;      // ITM northing, metres
}

export interface AddressCandidate {
  text: string;
  id: string;
  type: string;
  score: number;
  point: Point | null;
}

export interface PolygonRef {
  polygonId: string;
  point: Point | null;
  dealsCount?: number;
}

/** 1 = first hand (new), 2 = second hand (used) */
export type DealType = 1 | 2;

export interface DealQuery {
  limit: number;
  startDate?: string;   // YYYY-MM
  endDate?: string;     // YYYY-MM
  dealType: DealType;
}

/** Fetch collaborator the aggregator pulls registry data through. */
export interface DealSource {
  resolve(address: string): Promise<AddressCandidate[]>;
  dealsNear(point: Point, radius: number): Promise<PolygonRef[]>;
  streetDeals(polygonId: string, query: DealQuery): Promise<RawDeal[]>;
  neighborhoodDeals(polygonId: string, query: DealQuery): Promise<RawDeal[]>;
}

// ── Canonical records ──

/** 0 = same building, 1 = street, 2 = neighborhood */
export type PriorityTier = 0 | 1 | 2;
export type DealSourceKind = 'same_building' | 'street' | 'neighborhood';
export type BatchKind = 'street' | 'neighborhood';
export type DealTypeDescription = 'first_hand_new' | 'second_hand_used';

export interface Deal {
  id: string | null;
  amount: number;
  date: string;               // YYYY-MM-DD
  area?: number;              // sqm
  rooms?: number;
  floor?: string;
  floorNumber?: number;
  propertyType?: string;
  settlement?: string;
  neighborhood?: string;
  street?: string;
  houseNumber?: string;
  pricePerArea?: number;      // amount / area, 2 decimals, only when area > 0
  // set during aggregation
  priority?: PriorityTier;
  source?: DealSourceKind;
  sourcePolygonId?: string;
  distanceMeters?: number;
  dealType?: DealType;
  dealTypeDescription?: DealTypeDescription;
}

export interface DealBatch {
  kind: BatchKind;
  polygonId: string;
  distanceMeters?: number;
  records: RawDeal[];
}

// ── Filtering ──

export interface DealFilterCriteria {
  propertyType?: string;
  minRooms?: number;
  maxRooms?: number;
  minPrice?: number;
  maxPrice?: number;
  minArea?: number;
  maxArea?: number;
  minFloor?: number;
  maxFloor?: number;
}

// ── Outliers ──

export type OutlierMethod = 'none' | 'iqr' | 'percent';
export type OutlierMetric = 'price_per_area' | 'amount';
export type OutlierReason =
  | 'price_per_area_bounds'
  | 'min_deal_amount'
  | 'iqr'
  | 'percent'
  | 'percent_backup';

export interface OutlierRemoval {
  readonly index: number;
  readonly reasons: readonly OutlierReason[];
}

export interface OutlierParameters {
  readonly metric: OutlierMetric;
  readonly iqrMultiplier: number | null;
  readonly percentThreshold: number | null;
  readonly percentageBackupEnabled: boolean | null;
  readonly percentageBackupThreshold: number | null;
  readonly pricePerAreaMin: number;
  readonly pricePerAreaMax: number;
  readonly minDealAmount: number;
}

export interface OutlierReport {
  readonly totalDeals: number;
  readonly outliersRemoved: number;
  readonly outlierIndices: readonly number[];
  readonly removals: readonly OutlierRemoval[];
  readonly methodUsed: OutlierMethod;
  readonly parameters: OutlierParameters | null;   // null when screening was skipped
  readonly skipReason: string | null;
}

export interface OutlierFilterResult {
  deals: Deal[];
  report: OutlierReport;
}

// ── Statistics ──

export interface MetricStatistics {
  mean: number;
  median: number;
  min: number;
  max: number;
  p25: number;
  p75: number;
  stdDev: number;
  total?: number;
}

/** A metric with no qualifying values has no entries at all. */
export type MetricSummary = MetricStatistics | Record<string, never>;

export interface DateRange {
  earliest: string;
  latest: string;
}

export interface DealStatistics {
  totalDeals: number;
  priceStatistics: MetricSummary;
  areaStatistics: MetricSummary;
  pricePerAreaStatistics: MetricSummary;
  propertyTypeDistribution: Record<string, number>;
  roomDistribution: Record<string, number>;
  dateRange: DateRange | null;
}

export interface ComprehensiveStatistics {
  filtered: DealStatistics;
  unfiltered?: DealStatistics;
  outlierReport: OutlierReport;
}

// ── Market analytics ──

export type ActivityTrend = 'increasing' | 'stable' | 'decreasing' | 'insufficient_data';
export type LiquidityTrend = 'improving' | 'stable' | 'declining' | 'insufficient_data';
export type LiquidityLevel = 'very_high' | 'high' | 'moderate' | 'low' | 'very_low';
export type PriceTrend = 'increasing' | 'stable' | 'decreasing';
export type MarketStability = 'very_stable' | 'stable' | 'moderate' | 'volatile' | 'very_volatile';
export type DataQuality = 'excellent' | 'good' | 'fair' | 'limited';

export interface ParsedDealDates {
  dates: string[];
  monthly: Record<string, number>;     // "2024-03" → count
  quarterly: Record<string, number>;   // "2024-Q1" → count
}

export interface MarketActivityScore {
  activityScore: number;
  totalDeals: number;
  dealsPerMonth: number;
  trend: ActivityTrend;
  timePeriodMonths: number | null;
  monthlyDistribution: Record<string, number>;
}

export interface LiquidityMetrics {
  liquidityScore: number;
  totalDeals: number;
  timePeriodMonths: number | null;
  avgDealsPerMonth: number;
  avgDealsPerQuarter: number;
  dealVelocity: number;
  marketActivityLevel: LiquidityLevel;
  trendDirection: LiquidityTrend;
  quarterlyBreakdown: Record<string, number>;
  mostActiveQuarter: string;
  mostActiveMonth: string;
}

export interface InvestmentAnalysis {
  investmentScore: number;
  priceTrend: PriceTrend;
  priceAppreciationRate: number;
  priceVolatility: number;
  marketStability: MarketStability;
  coefficientOfVariation: number;
  appreciationComponent: number;
  stabilityComponent: number;
  avgPricePerArea: number;
  priceChangePct: number;
  totalDeals: number;
  dataQuality: DataQuality;
}

// ── Aggregation output ──

export interface AggregationSummary {
  sameBuilding: number;
  street: number;
  neighborhood: number;
  polygonsQueried: number;
  polygonsSkipped: number;
}

export interface AggregationResult {
  deals: Deal[];
  summary: AggregationSummary;
}

export interface AggregateRequest {
  address: string;
  yearsBack: number;
  radius: number;
  maxDeals: number;
  dealType: DealType;
}

// ── Address analysis (HTTP composite) ──

export type MaybeMetric<T> = { value: T; error: null } | { value: null; error: string };

export interface AddressAnalysis {
  address: string;
  summary: AggregationSummary;
  deals: Deal[];
  statistics: ComprehensiveStatistics;
  activity: MaybeMetric<MarketActivityScore>;
  liquidity: MaybeMetric<LiquidityMetrics>;
  investment: MaybeMetric<InvestmentAnalysis>;
}

// ── Trends, comparison, valuation ──

export interface PriceBand {
  averagePrice: number;
  minPrice: number;
  maxPrice: number;
  dealCount: number;
}

export interface MarketTrends {
  totalDeals: number;
  yearlyTrends: Record<string, PriceBand>;        // "2024" → band
  propertyTypeTrends: Record<string, PriceBand>;  // label (or "unknown") → band
}

export interface AddressTrends {
  address: string;
  summary: AggregationSummary;
  trends: MarketTrends;
}

export interface AddressMarketSummary {
  address: string;
  totalDeals: number;
  priceStats: { averagePrice: number; minPrice: number; maxPrice: number } | Record<string, never>;
  areaStats: { averageArea: number; minArea: number; maxArea: number } | Record<string, never>;
}

export interface AddressComparisonFailure {
  address: string;
  error: string;
  code: string;
}

export type AddressComparison = AddressMarketSummary | AddressComparisonFailure;

export interface AddressComparisonResult {
  addressesCompared: number;
  rankingByAveragePrice: AddressMarketSummary[];
  results: AddressComparison[];
}

export interface ValuationEstimate {
  area: number;
  pricePerArea: number;
  estimatedValue: number;
  low: number;    // p25 price-per-area × area
  high: number;   // p75 price-per-area × area
}

export interface ValuationComparables {
  address: string;
  summary: AggregationSummary;
  criteria: DealFilterCriteria;
  totalCandidates: number;
  deals: Deal[];
  statistics: DealStatistics;
  estimate: ValuationEstimate | null;
}

// ── API response ──

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  details?: string[];
  requestId?: string;
}
