/**
 * shared/logger.ts — Structured logging via Pino
 *
 * Development: pino-pretty (colorized, human-readable)
 * Production:  JSON lines
 * Test:        silent unless LOG_LEVEL says otherwise
 *
 * Child loggers carry a module binding; the request middleware adds a request ID.
 */
import pino, { type Logger } from 'pino';
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { env } from '../config/env.ts';

function defaultLevel(): string {
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export const logger = pino({
  level: env.LOG_LEVEL ?? defaultLevel(),
  transport: env.NODE_ENV === 'development'
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' } }
    : undefined,
  base: {
    service: 'deal-analytics-api',
    version: process.env.npm_package_version || '1.0.0',
    env: env.NODE_ENV,
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie'],
    censor: '[REDACTED]',
  },
});

export type { Logger };

/**
 * Express middleware: logs every API request with duration and status.
 * The request ID is echoed back in X-Request-Id and kept in res.locals.
 */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();
    const reqId = req.get('x-request-id') || randomUUID().slice(0, 8);
    const log = logger.child({ reqId });

    res.locals.reqId = reqId;
    res.setHeader('X-Request-Id', reqId);

    res.on('finish', () => {
      const duration = Date.now() - start;
      const msg = `${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`;
      const fields = { req: { method: req.method, url: req.originalUrl, ip: req.ip }, res: { statusCode: res.statusCode }, duration };
      if (res.statusCode >= 500) log.error(fields, msg);
      else if (res.statusCode >= 400) log.warn(fields, msg);
      else log.info(fields, msg);
    });

    next();
  };
}

/**
 * Create a child logger with additional context.
 * Usage: const log = childLogger({ module: 'aggregator' });
 */
export function childLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
