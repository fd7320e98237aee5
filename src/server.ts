/**
 * server.ts — HTTP entry point
 *
 * Loads .env, validates the environment, wires the registry client into the
 * deal service and starts listening. SIGTERM/SIGINT close the server cleanly.
 */
// Must stay first: populates process.env before config/env.ts parses it
import 'dotenv/config';
import { env } from './config/env.ts';
import { logger } from './shared/logger.ts';
import { RegistryClient } from './services/registry-client.ts';
import { DealService } from './services/deal-service.ts';
import { createApp } from './app.ts';

const BOOT_TIME = Date.now();

const client = new RegistryClient(env.registry);
const service = new DealService(client, env.analysis, env.registry);
const app = createApp(service);

// ─── Graceful shutdown ───

function gracefulShutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down...');
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });
  setTimeout(() => { logger.warn('Forced exit (10s timeout)'); process.exit(1); }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
});
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  setTimeout(() => process.exit(1), 1000).unref();
});

// ─── Start ───

const server = app.listen(env.PORT, () => {
  logger.info({
    port: env.PORT,
    env: env.NODE_ENV,
    registry: env.registry.baseUrl,
    outlierMethod: env.analysis.outlierMethod,
    bootMs: Date.now() - BOOT_TIME,
  }, 'Server started');
});
