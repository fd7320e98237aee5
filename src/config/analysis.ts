/**
 * config/analysis.ts — Zod-validated configuration values
 *
 * AnalysisConfig drives outlier screening and reporting.
 * RegistryConfig drives the registry client and aggregation.
 * Both are plain immutable values passed into every entry point.
 */
import { z } from 'zod';
import { InvalidInputError } from '../shared/errors.ts';

export const OutlierMethodEnum = z.enum(['none', 'iqr', 'percent']);
export const OutlierMetricEnum = z.enum(['price_per_area', 'amount']);

export const AnalysisConfigSchema = z.object({
  outlierMethod: OutlierMethodEnum.default('iqr'),
  iqrMultiplier: z.number().positive().default(1.0),
  percentThreshold: z.number().gt(0).lt(1).default(0.5),
  usePercentageBackup: z.boolean().default(true),
  percentageBackupThreshold: z.number().gt(0).lt(1).default(0.4),
  minDealsForOutlierDetection: z.number().int().min(0).default(10),

  // ── Hard bounds (data-entry errors, partial deals) ──
  pricePerAreaMin: z.number().positive().default(1000),
  pricePerAreaMax: z.number().positive().default(100_000),
  minDealAmount: z.number().positive().default(100_000),

  includeUnfilteredStats: z.boolean().default(true),
}).refine(c => c.pricePerAreaMax > c.pricePerAreaMin, {
  message: 'pricePerAreaMax must be greater than pricePerAreaMin',
  path: ['pricePerAreaMax'],
});

export type AnalysisConfig = Readonly<z.infer<typeof AnalysisConfigSchema>>;

export const RegistryConfigSchema = z.object({
  baseUrl: z.string().url().default('https://www.govmap.gov.il/api/'),
  connectTimeoutMs: z.number().int().positive().default(10_000),
  readTimeoutMs: z.number().int().positive().default(30_000),
  maxRetries: z.number().int().min(0).default(3),
  retryMinWaitMs: z.number().int().positive().default(1000),
  retryMaxWaitMs: z.number().int().positive().default(10_000),
  requestsPerSecond: z.number().positive().default(5),

  // ── Search defaults ──
  defaultRadiusMeters: z.number().int().positive().default(50),
  defaultYearsBack: z.number().int().positive().default(2),
  defaultDealLimit: z.number().int().positive().default(100),
  maxPolygonsToQuery: z.number().int().positive().default(10),

  // ── Relevance cut-offs by polygon distance ──
  maxStreetDealDistanceMeters: z.number().positive().default(500),
  maxNeighborhoodDealDistanceMeters: z.number().positive().default(1000),

  userAgent: z.string().min(1).default('DealAnalytics/1.0.0'),
}).refine(c => c.retryMaxWaitMs >= c.retryMinWaitMs, {
  message: 'retryMaxWaitMs must be >= retryMinWaitMs',
  path: ['retryMaxWaitMs'],
});

export type RegistryConfig = Readonly<z.infer<typeof RegistryConfigSchema>>;

function parseConfig<T extends z.ZodTypeAny>(schema: T, name: string, input: unknown): Readonly<z.infer<T>> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidInputError(`Invalid ${name}: ${issues.join('; ')}`);
  }
  return Object.freeze(result.data);
}

/** Build an analysis config from partial overrides; throws InvalidInputError on bad values. */
export function parseAnalysisConfig(overrides: Partial<z.input<typeof AnalysisConfigSchema>> = {}): AnalysisConfig {
  return parseConfig(AnalysisConfigSchema, 'analysis config', overrides);
}

export function parseRegistryConfig(overrides: Partial<z.input<typeof RegistryConfigSchema>> = {}): RegistryConfig {
  return parseConfig(RegistryConfigSchema, 'registry config', overrides);
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = parseAnalysisConfig();
