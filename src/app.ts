/**
 * app.ts — Express application factory
 *
 * Kept separate from server.ts so tests can mount the app on an ephemeral
 * port with a stubbed deal source.
 */
import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import compression from 'compression';
import { randomUUID } from 'crypto';
import { env } from './config/env.ts';
import { AnalysisError } from './shared/errors.ts';
import { logger, requestLogger } from './shared/logger.ts';
import { metricsEndpoint, metricsMiddleware } from './shared/metrics.ts';
import { dealRoutes } from './routes/deals.ts';
import healthRoutes from './routes/health.ts';
import type { DealService } from './services/deal-service.ts';

/** Errors thrown by body-parser carry a 4xx status and an expose flag. */
function clientStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createApp(service: DealService): Express {
  const app = express();
  app.set('trust proxy', 1);

  // ─── Security & Performance ───

  const allowedOrigins = env.ALLOWED_ORIGINS.split(',').map(s => s.trim());
  app.use(cors({
    origin: allowedOrigins.includes('*') ? true : allowedOrigins,
    credentials: true,
  }));

  app.use(compression({ threshold: 1024 }));
  app.use(express.json({ limit: '5mb' }));

  // ─── Prometheus metrics ───

  app.use(metricsMiddleware());

  // ─── Structured request logging (Pino) ───

  app.use(requestLogger());

  // ─── Security headers ───

  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (env.NODE_ENV === 'production') {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  // ─── API Routes ───

  app.get('/api/metrics', metricsEndpoint);
  app.use('/api/health', healthRoutes);
  app.use('/api', dealRoutes(service));

  app.use('/api', (_req, res) => {
    res.status(404).json({ success: false, error: 'Not found', code: 'NOT_FOUND' });
  });

  // ─── Error handling: structured response ───

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = typeof res.locals.reqId === 'string' ? res.locals.reqId : randomUUID().slice(0, 8);

    if (err instanceof AnalysisError) {
      const level = err.status >= 500 ? 'error' : 'warn';
      logger[level]({ err, reqId: requestId, method: req.method, url: req.originalUrl }, err.message);
      res.status(err.status).json({ success: false, error: err.message, code: err.code, requestId });
      return;
    }

    const status = clientStatus(err);
    if (status !== null) {
      res.status(status).json({ success: false, error: 'Malformed request', code: 'BAD_REQUEST', requestId });
      return;
    }

    logger.error({ err, reqId: requestId, method: req.method, url: req.originalUrl }, `Unhandled error [${requestId}]`);
    res.status(500).json({
      success: false,
      error: env.NODE_ENV === 'production' || !(err instanceof Error) ? 'Internal server error' : err.message,
      code: 'INTERNAL',
      requestId,
    });
  });

  return app;
}
