/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if a variable is malformed.
 * Maps the flat variable set onto the typed AnalysisConfig / RegistryConfig values.
 */
import { z } from 'zod';
import {
  AnalysisConfigSchema, RegistryConfigSchema,
  type AnalysisConfig, type RegistryConfig,
} from './analysis.ts';

const flag = z.enum(['true', 'false']).transform(v => v === 'true');

const envSchema = z.object({
  // ── Server ──
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  ALLOWED_ORIGINS: z.string().default('*'),

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // ── Registry API ──
  REGISTRY_BASE_URL: z.string().url().optional(),
  REGISTRY_CONNECT_TIMEOUT_MS: z.coerce.number().optional(),
  REGISTRY_READ_TIMEOUT_MS: z.coerce.number().optional(),
  REGISTRY_MAX_RETRIES: z.coerce.number().optional(),
  REGISTRY_RETRY_MIN_WAIT_MS: z.coerce.number().optional(),
  REGISTRY_RETRY_MAX_WAIT_MS: z.coerce.number().optional(),
  REGISTRY_REQUESTS_PER_SECOND: z.coerce.number().optional(),
  REGISTRY_DEFAULT_RADIUS: z.coerce.number().optional(),
  REGISTRY_DEFAULT_YEARS_BACK: z.coerce.number().optional(),
  REGISTRY_DEFAULT_DEAL_LIMIT: z.coerce.number().optional(),
  REGISTRY_MAX_POLYGONS: z.coerce.number().optional(),
  MAX_STREET_DEAL_DISTANCE_METERS: z.coerce.number().optional(),
  MAX_NEIGHBORHOOD_DEAL_DISTANCE_METERS: z.coerce.number().optional(),
  REGISTRY_USER_AGENT: z.string().optional(),

  // ── Outlier screening ──
  ANALYSIS_OUTLIER_METHOD: z.string().optional(),
  ANALYSIS_IQR_MULTIPLIER: z.coerce.number().optional(),
  ANALYSIS_PERCENT_THRESHOLD: z.coerce.number().optional(),
  ANALYSIS_USE_PERCENTAGE_BACKUP: flag.optional(),
  ANALYSIS_PERCENTAGE_THRESHOLD: z.coerce.number().optional(),
  ANALYSIS_MIN_DEALS_FOR_OUTLIER_DETECTION: z.coerce.number().optional(),
  ANALYSIS_PRICE_PER_AREA_MIN: z.coerce.number().optional(),
  ANALYSIS_PRICE_PER_AREA_MAX: z.coerce.number().optional(),
  ANALYSIS_MIN_DEAL_AMOUNT: z.coerce.number().optional(),
  ANALYSIS_INCLUDE_UNFILTERED_STATS: flag.optional(),
});

const withEnv = envSchema.transform((raw, ctx) => {
  const analysis = AnalysisConfigSchema.safeParse({
    outlierMethod: raw.ANALYSIS_OUTLIER_METHOD,
    iqrMultiplier: raw.ANALYSIS_IQR_MULTIPLIER,
    percentThreshold: raw.ANALYSIS_PERCENT_THRESHOLD,
    usePercentageBackup: raw.ANALYSIS_USE_PERCENTAGE_BACKUP,
    percentageBackupThreshold: raw.ANALYSIS_PERCENTAGE_THRESHOLD,
    minDealsForOutlierDetection: raw.ANALYSIS_MIN_DEALS_FOR_OUTLIER_DETECTION,
    pricePerAreaMin: raw.ANALYSIS_PRICE_PER_AREA_MIN,
    pricePerAreaMax: raw.ANALYSIS_PRICE_PER_AREA_MAX,
    minDealAmount: raw.ANALYSIS_MIN_DEAL_AMOUNT,
    includeUnfilteredStats: raw.ANALYSIS_INCLUDE_UNFILTERED_STATS,
  });
  const registry = RegistryConfigSchema.safeParse({
    baseUrl: raw.REGISTRY_BASE_URL,
    connectTimeoutMs: raw.REGISTRY_CONNECT_TIMEOUT_MS,
    readTimeoutMs: raw.REGISTRY_READ_TIMEOUT_MS,
    maxRetries: raw.REGISTRY_MAX_RETRIES,
    retryMinWaitMs: raw.REGISTRY_RETRY_MIN_WAIT_MS,
    retryMaxWaitMs: raw.REGISTRY_RETRY_MAX_WAIT_MS,
    requestsPerSecond: raw.REGISTRY_REQUESTS_PER_SECOND,
    defaultRadiusMeters: raw.REGISTRY_DEFAULT_RADIUS,
    defaultYearsBack: raw.REGISTRY_DEFAULT_YEARS_BACK,
    defaultDealLimit: raw.REGISTRY_DEFAULT_DEAL_LIMIT,
    maxPolygonsToQuery: raw.REGISTRY_MAX_POLYGONS,
    maxStreetDealDistanceMeters: raw.MAX_STREET_DEAL_DISTANCE_METERS,
    maxNeighborhoodDealDistanceMeters: raw.MAX_NEIGHBORHOOD_DEAL_DISTANCE_METERS,
    userAgent: raw.REGISTRY_USER_AGENT,
  });

  for (const [prefix, result] of [['ANALYSIS', analysis], ['REGISTRY', registry]] as const) {
    if (!result.success) {
      for (const issue of result.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [prefix, ...issue.path], message: issue.message });
      }
    }
  }
  if (!analysis.success || !registry.success) return z.NEVER;

  const configs: { analysis: AnalysisConfig; registry: RegistryConfig } = {
    analysis: Object.freeze(analysis.data),
    registry: Object.freeze(registry.data),
  };
  return { ...raw, ...configs };
});

export type Env = z.infer<typeof withEnv>;

/** Parse an environment map. Exposed separately so tests can feed their own. */
export function parseEnv(source: NodeJS.ProcessEnv) {
  return withEnv.safeParse(source);
}

function loadEnv(): Env {
  const result = parseEnv(process.env);
  if (!result.success) {
    console.error('❌ Environment validation failed:');
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
