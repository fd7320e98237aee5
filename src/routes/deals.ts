/**
 * routes/deals.ts — Deal aggregation and analytics endpoints
 *
 * POST /api/deals/aggregate    — ordered deals around an address
 * POST /api/deals/filter       — criteria filter
 * POST /api/deals/statistics   — descriptive statistics
 * POST /api/deals/analysis     — outlier-screened statistics + report
 * POST /api/deals/outliers     — outlier screening only
 * POST /api/deals/activity     — market activity score
 * POST /api/deals/liquidity    — liquidity metrics
 * POST /api/deals/investment   — investment potential
 * POST /api/deals/trends       — price bands per year and property type
 * GET  /api/address/analysis   — aggregate + every metric with enough data
 * GET  /api/address/trends     — aggregate + price bands
 * POST /api/address/compare    — several addresses ranked by average price
 * POST /api/address/comparables — aggregate + filter + statistics (+ estimate)
 */
import { Router, type Request, type Response, type NextFunction } from 'express';
import type { z } from 'zod';
import {
  AddressAnalysisQuerySchema, AddressQuerySchema, AggregateSchema, AnalysisBodySchema, ComparablesBodySchema,
  CompareBodySchema, DealsBodySchema, FilterBodySchema, OutlierBodySchema, WindowedBodySchema,
} from '../schemas.ts';
import type { DealService } from '../services/deal-service.ts';
import type { ApiResponse } from '../types.ts';

// ── Zod-validated handler ──

/**
 * Validates req[source] with the schema, then wraps the handler's result in
 * the { success, data } envelope. Errors go to the error middleware.
 */
function validated<T extends z.ZodTypeAny>(
  schema: T,
  source: 'query' | 'body',
  handler: (input: z.infer<T>) => unknown,
) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const result = schema.safeParse(req[source]);
    if (!result.success) {
      const errors = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      const body: ApiResponse = { success: false, error: 'Validation failed', code: 'VALIDATION_FAILED', details: errors };
      res.status(400).json(body);
      return;
    }
    try {
      const body: ApiResponse = { success: true, data: await handler(result.data) };
      res.json(body);
    } catch (err) { next(err); }
  };
}

export function dealRoutes(service: DealService): Router {
  const router = Router();

  router.post('/deals/aggregate',
    validated(AggregateSchema, 'body', input => service.aggregate(input)));

  router.post('/deals/filter',
    validated(FilterBodySchema, 'body', ({ deals, criteria }) => service.filter(deals, criteria)));

  router.post('/deals/statistics',
    validated(DealsBodySchema, 'body', ({ deals }) => service.statistics(deals)));

  router.post('/deals/analysis',
    validated(AnalysisBodySchema, 'body', ({ deals, metric }) => service.comprehensiveStatistics(deals, metric)));

  router.post('/deals/outliers',
    validated(OutlierBodySchema, 'body', ({ deals, method, metric, iqrMultiplier }) =>
      service.filterOutliers(deals, { method, metric, iqrMultiplier })));

  router.post('/deals/activity',
    validated(WindowedBodySchema, 'body', ({ deals, windowMonths }) => service.activityScore(deals, windowMonths)));

  router.post('/deals/liquidity',
    validated(WindowedBodySchema, 'body', ({ deals, windowMonths }) => service.liquidity(deals, windowMonths)));

  router.post('/deals/investment',
    validated(DealsBodySchema, 'body', ({ deals }) => service.investmentPotential(deals)));

  router.post('/deals/trends',
    validated(DealsBodySchema, 'body', ({ deals }) => service.marketTrends(deals)));

  router.get('/address/analysis',
    validated(AddressAnalysisQuerySchema, 'query', ({ metric, ...request }) => service.addressAnalysis(request, metric)));

  router.get('/address/trends',
    validated(AddressQuerySchema, 'query', request => service.addressTrends(request)));

  router.post('/address/compare',
    validated(CompareBodySchema, 'body', ({ addresses, ...options }) => service.compareAddresses(addresses, options)));

  router.post('/address/comparables',
    validated(ComparablesBodySchema, 'body', ({ criteria, area, ...request }) =>
      service.valuationComparables(request, criteria, area)));

  return router;
}
