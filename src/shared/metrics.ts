/**
 * shared/metrics.ts — Prometheus metrics via prom-client
 *
 * Exposes: /api/metrics
 *
 * Metrics:
 *   deals_http_requests_total              — Counter by method/route/status
 *   deals_http_request_duration_seconds    — Histogram by method/route/status
 *   deals_registry_requests_total          — Counter by endpoint/outcome
 *   deals_aggregation_polygons_skipped_total — Polygons dropped after a fetch failure
 */
import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import type { Request, Response, NextFunction } from 'express';

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: 'deals_' });

// ── HTTP Metrics ──

export const httpRequestsTotal = new Counter({
  name: 'deals_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'deals_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

// ── Registry / aggregation ──

export const registryRequests = new Counter({
  name: 'deals_registry_requests_total',
  help: 'Registry API requests by endpoint and outcome',
  labelNames: ['endpoint', 'outcome'] as const, // success, retry, failure
  registers: [registry],
});

export const polygonsSkipped = new Counter({
  name: 'deals_aggregation_polygons_skipped_total',
  help: 'Polygons skipped during aggregation because their fetch failed',
  registers: [registry],
});

/** Collapse path parameters so label cardinality stays bounded. */
function normalizeRoute(req: Request): string {
  const matched: unknown = req.route?.path;
  if (typeof matched === 'string') return `${req.baseUrl}${matched}`;
  return req.path.replace(/\/\d+(?=\/|$)/g, '/:id');
}

export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.path === '/api/metrics') return next();

    const end = httpRequestDuration.startTimer();
    res.on('finish', () => {
      const labels = { method: req.method, route: normalizeRoute(req), status_code: String(res.statusCode) };
      end(labels);
      httpRequestsTotal.inc(labels);
    });

    next();
  };
}

/**
 * Metrics endpoint handler. Returns Prometheus text format.
 */
export async function metricsEndpoint(_req: Request, res: Response): Promise<void> {
  try {
    res.set('Content-Type', registry.contentType);
    res.end(await registry.metrics());
  } catch {
    res.status(500).end('Error collecting metrics');
  }
}
