/**
 * routes/health.ts — Liveness check
 *
 * GET /api/health
 */
import { Router, type Request, type Response } from 'express';
import { env } from '../config/env.ts';

const router = Router();

router.get('/', (_req: Request, res: Response) => {
  const mem = process.memoryUsage();
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: Math.round(process.uptime()),
    version: process.env.npm_package_version || '1.0.0',
    env: env.NODE_ENV,
    memoryMB: Math.round(mem.heapUsed / 1048576),
  });
});

export default router;
