import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../app.ts';
import { DealService } from '../services/deal-service.ts';
import { DEFAULT_ANALYSIS_CONFIG, parseRegistryConfig } from '../config/analysis.ts';
import type { AddressCandidate, DealSource, PolygonRef, RawDeal } from '../types.ts';

// Registry stand-in: one building on one polygon, nothing else resolves
const source: DealSource = {
  async resolve(address: string): Promise<AddressCandidate[]> {
    if (!address.includes('הרצל')) return [];
    return [{ text: 'הרצל 10', id: '1', type: 'address', score: 1, point: { x: 180_000, y: 665_000 } }];
  },
  async dealsNear(): Promise<PolygonRef[]> {
    return [{ polygonId: 'A', point: { x: 180_000, y: 665_000 } }];
  },
  async streetDeals(): Promise<RawDeal[]> {
    return [
      { objectid: 1, dealAmount: 1_500_000, dealDate: '2024-06-01', assetArea: 75, streetNameHeb: 'הרצל', houseNum: 10 },
      { objectid: 2, dealAmount: 1_800_000, dealDate: '2024-07-01', assetArea: 90, streetNameHeb: 'הרצל', houseNum: 12 },
    ];
  },
  async neighborhoodDeals(): Promise<RawDeal[]> {
    return [];
  },
};

const service = new DealService(source, DEFAULT_ANALYSIS_CONFIG, parseRegistryConfig(), () => new Date('2025-01-15T00:00:00Z'));

let server: Server;
let baseUrl = '';

beforeAll(async () => {
  server = createApp(service).listen(0);
  await new Promise<void>(resolve => server.once('listening', () => resolve()));
  const addr = server.address();
  if (typeof addr === 'object' && addr !== null) baseUrl = `http://127.0.0.1:${addr.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
});

const post = (path: string, body: unknown) => fetch(`${baseUrl}${path}`, {
  method: 'POST',
  headers: { 'Content-Type': 'application/json' },
  body: JSON.stringify(body),
});

describe('API', () => {
  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', env: 'test' });
  });

  it('computes statistics from raw and canonical deals', async () => {
    const res = await post('/api/deals/statistics', {
      deals: [
        { dealAmount: '1,000,000', dealDate: '2024-01-10', assetArea: 50 },
        { id: 'x', amount: 3_000_000, date: '2024-02-10', area: 100 },
      ],
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      data: {
        totalDeals: 2,
        priceStatistics: { median: 2_000_000, total: 4_000_000 },
        pricePerAreaStatistics: { min: 20_000, max: 30_000 },
        dateRange: { earliest: '2024-01-10', latest: '2024-02-10' },
      },
    });
  });

  it('filters deals by criteria', async () => {
    const res = await post('/api/deals/filter', {
      deals: [
        { amount: 900_000, date: '2024-01-10' },
        { amount: 2_100_000, date: '2024-01-11' },
      ],
      criteria: { minPrice: 1_000_000 },
    });
    expect(await res.json()).toEqual({
      success: true,
      data: [{ id: null, amount: 2_100_000, date: '2024-01-11' }],
    });
  });

  it('rejects inverted filter bounds', async () => {
    const res = await post('/api/deals/filter', { deals: [], criteria: { minPrice: 2, maxPrice: 1 } });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: 'Validation failed',
      code: 'VALIDATION_FAILED',
      details: ['criteria.minPrice: minPrice cannot be greater than maxPrice'],
    });
  });

  it('maps insufficient data to 422', async () => {
    const res = await post('/api/deals/investment', {
      deals: [
        { amount: 1_000_000, date: '2024-01-10', area: 50 },
        { amount: 1_100_000, date: '2024-02-10', area: 50 },
      ],
    });
    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ success: false, code: 'INSUFFICIENT_DATA' });
  });

  it('scores activity over an explicit window', async () => {
    const res = await post('/api/deals/activity', {
      deals: [
        { amount: 1_000_000, date: '2024-12-01' },
        { amount: 1_000_000, date: '2023-01-01' },
      ],
      windowMonths: 6,
    });
    expect(await res.json()).toMatchObject({
      success: true,
      data: { totalDeals: 1, timePeriodMonths: 6, monthlyDistribution: { '2024-12': 1 } },
    });
  });

  it('returns 404 for an unknown address', async () => {
    const res = await post('/api/deals/aggregate', { address: 'רוטשילד 1' });
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({
      success: false,
      error: 'No results found for address: רוטשילד 1',
      code: 'ADDRESS_NOT_FOUND',
    });
  });

  it('aggregates deals around an address', async () => {
    const res = await post('/api/deals/aggregate', { address: 'הרצל 10' });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      data: {
        deals: [
          { id: '1', source: 'same_building', pricePerArea: 20_000 },
          { id: '2', source: 'street', pricePerArea: 20_000 },
        ],
        summary: { sameBuilding: 1, street: 1, neighborhood: 0, polygonsQueried: 1, polygonsSkipped: 0 },
      },
    });
  });

  it('runs the full address analysis', async () => {
    const query = new URLSearchParams({ address: 'הרצל 10', maxDeals: '50' });
    const res = await fetch(`${baseUrl}/api/address/analysis?${query.toString()}`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      data: {
        address: 'הרצל 10',
        statistics: {
          filtered: { totalDeals: 2 },
          outlierReport: { skipReason: 'insufficient data (2 < 10)' },
        },
        activity: { value: { activityScore: 25, dealsPerMonth: 1 }, error: null },
        liquidity: { value: { liquidityScore: 33.3, marketActivityLevel: 'low' }, error: null },
        investment: {
          value: null,
          error: 'Insufficient data for investment analysis (need at least 3 deals with price-per-area and date, got 2)',
        },
      },
    });
  });

  it('bands deal prices by year', async () => {
    const res = await post('/api/deals/trends', {
      deals: [
        { amount: 1_000_000, date: '2023-03-01' },
        { amount: 2_000_000, date: '2024-03-01', propertyType: 'דירה' },
      ],
    });
    expect(await res.json()).toMatchObject({
      success: true,
      data: {
        totalDeals: 2,
        yearlyTrends: {
          2023: { averagePrice: 1_000_000, dealCount: 1 },
          2024: { averagePrice: 2_000_000, dealCount: 1 },
        },
        propertyTypeTrends: { unknown: { dealCount: 1 }, 'דירה': { dealCount: 1 } },
      },
    });
  });

  it('analyzes trends around an address', async () => {
    const query = new URLSearchParams({ address: 'הרצל 10' });
    const res = await fetch(`${baseUrl}/api/address/trends?${query.toString()}`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      data: {
        address: 'הרצל 10',
        trends: {
          totalDeals: 2,
          yearlyTrends: { 2024: { averagePrice: 1_650_000, minPrice: 1_500_000, maxPrice: 1_800_000, dealCount: 2 } },
        },
      },
    });
  });

  it('compares addresses and reports the ones that fail', async () => {
    const res = await post('/api/address/compare', { addresses: ['הרצל 10', 'בלפור 3'] });
    expect(res.status).toBe(200);
    const herzl = {
      address: 'הרצל 10',
      totalDeals: 2,
      priceStats: { averagePrice: 1_650_000, minPrice: 1_500_000, maxPrice: 1_800_000 },
      areaStats: { averageArea: 82.5, minArea: 75, maxArea: 90 },
    };
    expect(await res.json()).toEqual({
      success: true,
      data: {
        addressesCompared: 2,
        rankingByAveragePrice: [herzl],
        results: [
          herzl,
          { address: 'בלפור 3', error: 'No results found for address: בלפור 3', code: 'ADDRESS_NOT_FOUND' },
        ],
      },
    });
  });

  it('rejects an empty comparison', async () => {
    const res = await post('/api/address/compare', { addresses: [] });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      code: 'VALIDATION_FAILED',
      details: ['addresses: at least one address is required'],
    });
  });

  it('returns valuation comparables with an estimate', async () => {
    const res = await post('/api/address/comparables', { address: 'הרצל 10', criteria: { minArea: 80 }, area: 100 });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      data: {
        address: 'הרצל 10',
        totalCandidates: 2,
        deals: [{ id: '2', area: 90 }],
        statistics: { totalDeals: 1 },
        estimate: { area: 100, pricePerArea: 20_000, estimatedValue: 2_000_000, low: 2_000_000, high: 2_000_000 },
      },
    });
  });

  it('rejects malformed JSON', async () => {
    const res = await fetch(`${baseUrl}/api/deals/statistics`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"deals": [',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ success: false, error: 'Malformed request', code: 'BAD_REQUEST' });
  });

  it('echoes the request id', async () => {
    const res = await fetch(`${baseUrl}/api/health`, { headers: { 'X-Request-Id': 'test-req-1' } });
    expect(res.headers.get('x-request-id')).toBe('test-req-1');
  });

  it('serves prometheus metrics', async () => {
    const res = await fetch(`${baseUrl}/api/metrics`);
    expect(res.status).toBe(200);
    expect(await res.text()).toContain('deals_http_requests_total');
  });

  it('returns 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/api/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, error: 'Not found', code: 'NOT_FOUND' });
  });
});
