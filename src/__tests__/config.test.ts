import { describe, it, expect } from 'vitest';
import { DEFAULT_ANALYSIS_CONFIG, parseAnalysisConfig, parseRegistryConfig } from '../config/analysis.ts';
import { parseEnv } from '../config/env.ts';
import { InvalidInputError } from '../shared/errors.ts';

describe('analysis config', () => {
  it('has the documented defaults', () => {
    expect(DEFAULT_ANALYSIS_CONFIG).toEqual({
      outlierMethod: 'iqr',
      iqrMultiplier: 1,
      percentThreshold: 0.5,
      usePercentageBackup: true,
      percentageBackupThreshold: 0.4,
      minDealsForOutlierDetection: 10,
      pricePerAreaMin: 1000,
      pricePerAreaMax: 100_000,
      minDealAmount: 100_000,
      includeUnfilteredStats: true,
    });
    expect(Object.isFrozen(DEFAULT_ANALYSIS_CONFIG)).toBe(true);
  });

  it('applies overrides', () => {
    const config = parseAnalysisConfig({ outlierMethod: 'percent', percentThreshold: 0.3 });
    expect(config.outlierMethod).toBe('percent');
    expect(config.percentThreshold).toBe(0.3);
    expect(config.iqrMultiplier).toBe(1);
  });

  it('rejects an inverted price-per-area window', () => {
    expect(() => parseAnalysisConfig({ pricePerAreaMin: 50_000, pricePerAreaMax: 10_000 }))
      .toThrow('Invalid analysis config: pricePerAreaMax: pricePerAreaMax must be greater than pricePerAreaMin');
  });

  it('rejects out-of-range thresholds', () => {
    expect(() => parseAnalysisConfig({ percentThreshold: 1.5 })).toThrow(InvalidInputError);
    expect(() => parseAnalysisConfig({ iqrMultiplier: -1 })).toThrow(InvalidInputError);
  });
});

describe('registry config', () => {
  it('has the documented defaults', () => {
    const config = parseRegistryConfig();
    expect(config).toMatchObject({
      maxRetries: 3,
      retryMinWaitMs: 1000,
      retryMaxWaitMs: 10_000,
      requestsPerSecond: 5,
      defaultRadiusMeters: 50,
      defaultYearsBack: 2,
      defaultDealLimit: 100,
      maxPolygonsToQuery: 10,
      maxStreetDealDistanceMeters: 500,
      maxNeighborhoodDealDistanceMeters: 1000,
    });
  });

  it('rejects a max wait below the min wait', () => {
    expect(() => parseRegistryConfig({ retryMinWaitMs: 5000, retryMaxWaitMs: 1000 }))
      .toThrow('Invalid registry config: retryMaxWaitMs: retryMaxWaitMs must be >= retryMinWaitMs');
  });
});

describe('parseEnv', () => {
  it('builds both configs from environment variables', () => {
    const result = parseEnv({
      NODE_ENV: 'production',
      PORT: '8080',
      ANALYSIS_OUTLIER_METHOD: 'none',
      ANALYSIS_USE_PERCENTAGE_BACKUP: 'false',
      REGISTRY_MAX_RETRIES: '1',
      REGISTRY_DEFAULT_RADIUS: '120',
    });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.PORT).toBe(8080);
    expect(result.data.analysis.outlierMethod).toBe('none');
    expect(result.data.analysis.usePercentageBackup).toBe(false);
    expect(result.data.registry.maxRetries).toBe(1);
    expect(result.data.registry.defaultRadiusMeters).toBe(120);
  });

  it('falls back to defaults for an empty environment', () => {
    const result = parseEnv({});
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.NODE_ENV).toBe('development');
    expect(result.data.PORT).toBe(3001);
    expect(result.data.analysis).toEqual(DEFAULT_ANALYSIS_CONFIG);
  });

  it('reports nested config issues under their section', () => {
    const result = parseEnv({ ANALYSIS_OUTLIER_METHOD: 'median' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].path).toEqual(['ANALYSIS', 'outlierMethod']);
  });
});
