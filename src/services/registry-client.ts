// ═══════════════════════════════════════════════════════
// registry-client.ts — Property registry HTTP client
// Address autocomplete, polygon lookup, street/neighborhood deals.
// Handles rate limiting, retry with exponential backoff, response validation.
// ═══════════════════════════════════════════════════════
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import type { RegistryConfig } from '../config/analysis.ts';
import { RawDealSchema, DealTypeSchema } from '../schemas.ts';
import { InvalidInputError, RegistryError } from '../shared/errors.ts';
import { childLogger } from '../shared/logger.ts';
import { registryRequests } from '../shared/metrics.ts';
import { sleep as defaultSleep, toNumber } from './helpers.ts';
import type { AddressCandidate, DealQuery, DealSource, Point, PolygonRef, RawDeal } from '../types.ts';

const log = childLogger({ module: 'registry-client' });

// ── Input validation ──

const AddressInput = z.string().trim().min(1, 'address must not be empty').max(500, 'address must be at most 500 characters');
const PointInput = z.object({ x: z.number().finite(), y: z.number().finite() });
const RadiusInput = z.number().int().min(1).max(5000);
const PolygonIdInput = z.string().trim().min(1, 'polygonId must not be empty');
const DealQueryInput = z.object({
  limit: z.number().int().min(1).max(1000),
  startDate: z.string().regex(/^\d{4}-\d{2}$/).optional(),
  endDate: z.string().regex(/^\d{4}-\d{2}$/).optional(),
  dealType: DealTypeSchema,
});

function validated<T extends z.ZodTypeAny>(schema: T, value: unknown, name: string): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(`Invalid ${name}: ${result.error.issues.map(i => i.message).join('; ')}`);
  }
  return result.data;
}

// ── Response shapes ──

const AutocompleteResponse = z.object({
  results: z.array(z.object({
    text: z.string().default(''),
    id: z.union([z.string(), z.number().transform(String)]).default(''),
    type: z.string().default(''),
    score: z.number().default(0),
    shape: z.string().nullish(),
  }).passthrough()),
});

const PolygonMetadata = z.object({
  polygon_id: z.union([z.string(), z.number().transform(String)]).nullish(),
  longitude: z.unknown().optional(),
  latitude: z.unknown().optional(),
  dealscount: z.number().optional(),
}).passthrough();

const DealListResponse = z.union([
  z.array(z.unknown()),
  z.object({ data: z.array(z.unknown()) }).passthrough().transform(r => r.data),
]);

/** "POINT(180000.5 665000.25)" → { x, y } */
export function parseWktPoint(shape: string | null | undefined): Point | null {
  if (!shape) return null;
  const m = /^POINT\s*\(\s*(\S+)\s+(\S+)\s*\)$/.exec(shape.trim());
  if (!m) return null;
  const x = Number(m[1]);
  const y = Number(m[2]);
  return Number.isFinite(x) && Number.isFinite(y) ? { x, y } : null;
}

// ── Client ──

export interface RegistryClientOptions {
  /** Replaces the HTTP transport; tests pass a stub here. */
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
}

export class RegistryClient implements DealSource {
  private readonly http: AxiosInstance;
  private readonly config: RegistryConfig;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => number;
  private readonly minIntervalMs: number;
  private lastRequestAt = Number.NEGATIVE_INFINITY;
  private gate: Promise<void> = Promise.resolve();

  constructor(config: RegistryConfig, options: RegistryClientOptions = {}) {
    this.config = config;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? Date.now;
    this.minIntervalMs = 1000 / config.requestsPerSecond;
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.connectTimeoutMs + config.readTimeoutMs,
      headers: { 'Content-Type': 'application/json', 'User-Agent': config.userAgent },
      adapter: options.adapter,
    });
  }

  /** Space successive requests by at least 1000 / requestsPerSecond ms, across concurrent callers. */
  private throttle(): Promise<void> {
    const turn = this.gate.then(async () => {
      const wait = this.lastRequestAt + this.minIntervalMs - this.clock();
      if (wait > 0) await this.sleep(wait);
      this.lastRequestAt = this.clock();
    });
    this.gate = turn;
    return turn;
  }

  private backoff(attempt: number): number {
    return Math.min(this.config.retryMinWaitMs * 2 ** attempt, this.config.retryMaxWaitMs);
  }

  /** One logical request: throttled, retried on transport/HTTP failures. */
  private async request(endpoint: string, req: AxiosRequestConfig): Promise<unknown> {
    const attempts = this.config.maxRetries + 1;
    for (let attempt = 0; attempt < attempts; attempt++) {
      await this.throttle();
      try {
        const res = await this.http.request<unknown>(req);
        registryRequests.inc({ endpoint, outcome: 'success' });
        return res.data;
      } catch (err) {
        if (!axios.isAxiosError(err)) throw err;
        const status = err.response?.status;
        if (attempt + 1 >= attempts) {
          registryRequests.inc({ endpoint, outcome: 'failure' });
          log.error({ endpoint, status, attempts }, `Registry request failed after ${attempts} attempts`);
          throw new RegistryError(endpoint, status ? `HTTP ${status}` : err.message);
        }
        const delay = this.backoff(attempt);
        registryRequests.inc({ endpoint, outcome: 'retry' });
        log.warn({ endpoint, status, attempt: attempt + 1, delay }, `Registry request failed, retrying in ${delay}ms`);
        await this.sleep(delay);
      }
    }
    throw new RegistryError(endpoint, 'no attempts made');
  }

  private shape<T extends z.ZodTypeAny>(endpoint: string, schema: T, data: unknown): z.infer<T> {
    const result = schema.safeParse(data);
    if (!result.success) {
      registryRequests.inc({ endpoint, outcome: 'failure' });
      throw new RegistryError(endpoint, `unexpected response shape (${result.error.issues[0]?.message ?? 'invalid'})`);
    }
    return result.data;
  }

  /** Ranked address candidates; coordinates come from the WKT point shape. */
  async resolve(address: string): Promise<AddressCandidate[]> {
    const searchText = validated(AddressInput, address, 'address');
    const data = await this.request('autocomplete', {
      method: 'POST',
      url: 'search-service/autocomplete',
      data: { searchText, language: 'he', isAccurate: false, maxResults: 10 },
    });
    const body = this.shape('autocomplete', AutocompleteResponse, data);
    return body.results.map(r => {
      const point = parseWktPoint(r.shape);
      if (r.shape && !point) log.warn({ shape: r.shape }, 'Could not parse candidate coordinates');
      return { text: r.text, id: r.id, type: r.type, score: r.score, point };
    });
  }

  /** Polygons with deals within `radius` metres of a point. */
  async dealsNear(point: Point, radius: number): Promise<PolygonRef[]> {
    const p = validated(PointInput, point, 'coordinates');
    const r = validated(RadiusInput, radius, 'radius');
    const data = await this.request('deals-by-radius', { method: 'GET', url: `real-estate/deals/${p.x},${p.y}/${r}` });
    const rows = this.shape('deals-by-radius', z.array(PolygonMetadata), data);

    const refs: PolygonRef[] = [];
    for (const row of rows) {
      if (!row.polygon_id) continue;
      const x = toNumber(row.longitude);
      const y = toNumber(row.latitude);
      const ref: PolygonRef = { polygonId: row.polygon_id, point: x !== null && y !== null ? { x, y } : null };
      if (row.dealscount !== undefined) ref.dealsCount = row.dealscount;
      refs.push(ref);
    }
    log.debug({ radius: r, polygons: refs.length }, 'Polygons near point');
    return refs;
  }

  async streetDeals(polygonId: string, query: DealQuery): Promise<RawDeal[]> {
    return this.dealList('street-deals', polygonId, query);
  }

  async neighborhoodDeals(polygonId: string, query: DealQuery): Promise<RawDeal[]> {
    return this.dealList('neighborhood-deals', polygonId, query);
  }

  private async dealList(endpoint: 'street-deals' | 'neighborhood-deals', polygonId: string, query: DealQuery): Promise<RawDeal[]> {
    const id = validated(PolygonIdInput, polygonId, 'polygonId');
    const q = validated(DealQueryInput, query, 'deal query');
    const params: Record<string, string | number> = { limit: q.limit, dealType: q.dealType };
    if (q.startDate) params.startDate = q.startDate;
    if (q.endDate) params.endDate = q.endDate;

    const data = await this.request(endpoint, { method: 'GET', url: `real-estate/${endpoint}/${encodeURIComponent(id)}`, params });
    const rows = this.shape(endpoint, DealListResponse, data);

    const records: RawDeal[] = [];
    rows.forEach((row, i) => {
      const parsed = RawDealSchema.safeParse(row);
      if (parsed.success) records.push(parsed.data);
      else log.warn({ endpoint, polygonId: id, index: i, reason: parsed.error.issues[0]?.message }, 'Skipping invalid deal record');
    });
    return records;
  }
}
