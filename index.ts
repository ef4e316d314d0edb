import './server/logger.js';
import type { FastifyInstance } from 'fastify';
import { DB_POOL_MAX, HOST, PORT, validateStartupEnvironment } from './server/config.js';
import { openDatabase } from './server/db.js';
import { ensureAllTables } from './server/data/schema.js';
import { buildApp } from './server/app.js';
import { PlaywrightPageDriver } from './server/browser/pageDriver.js';
import { createDataApiClient } from './server/services/dataApi.js';
import { buildFreshnessPayload, buildHealthPayload, buildReadyPayload } from './server/services/healthService.js';
import { createMarketDataReader } from './server/services/marketDataService.js';
import { createDomainJobs } from './server/services/scrapeJobs.js';
import { ScraperScheduler, withCadences } from './server/services/schedulerService.js';

type RunMode = 'api' | 'scraper' | 'both';

function parseRunMode(argv: readonly string[]): RunMode {
  const flag = argv.find((arg) => arg.startsWith('--mode='));
  const value = flag ? flag.slice('--mode='.length).trim() : 'both';
  if (value === 'api' || value === 'scraper' || value === 'both') return value;
  throw new Error(`Unknown --mode "${value}" (expected api, scraper or both)`);
}

const startedAtMs = Date.now();
let isShuttingDown = false;

async function main(): Promise<void> {
  const mode = parseRunMode(process.argv.slice(2));
  validateStartupEnvironment();

  const { pool, db } = openDatabase();
  await ensureAllTables(db);

  const jobs = withCadences(
    createDomainJobs({
      db,
      driver: new PlaywrightPageDriver(),
      dataApi: createDataApiClient(),
    }),
  );
  const scheduler = new ScraperScheduler(jobs);

  if (mode === 'scraper') {
    const results = await scheduler.triggerAll();
    console.log('[main] Scrape run finished:', results);
    await db.destroy();
    return;
  }

  const app: FastifyInstance = await buildApp({
    reader: createMarketDataReader(db),
    scheduler,
    getHealthPayload: () =>
      buildHealthPayload({
        isShuttingDown,
        nowIso: new Date().toISOString(),
        uptimeSeconds: Math.floor((Date.now() - startedAtMs) / 1000),
      }),
    getReadyPayload: () =>
      buildReadyPayload({
        pool,
        isShuttingDown,
        schedulerState: scheduler.getState(),
        getPoolStats: () => ({
          total: pool.totalCount,
          idle: pool.idleCount,
          waiting: pool.waitingCount,
          max: DB_POOL_MAX,
        }),
      }),
    getFreshnessPayload: () => buildFreshnessPayload(scheduler.getState(), Date.now()),
  });

  await app.listen({ port: PORT, host: HOST });
  console.log(`Server running on ${HOST}:${PORT} (mode=${mode})`);
  if (mode === 'both') scheduler.start();

  async function shutdownServer(signal: string): Promise<void> {
    if (isShuttingDown) return;
    isShuttingDown = true;
    console.log(`Received ${signal}; shutting down gracefully...`);
    scheduler.stop();

    const forceExitTimer = setTimeout(() => {
      console.error('Graceful shutdown timed out; forcing exit');
      process.exit(1);
    }, 15000);
    if (typeof forceExitTimer.unref === 'function') {
      forceExitTimer.unref();
    }

    try {
      await app.close();
      console.log('HTTP server closed; draining database pool...');
      await db.destroy();
      console.log('Shutdown complete');
      clearTimeout(forceExitTimer);
      process.exit(0);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Graceful shutdown failed: ${message}`);
      clearTimeout(forceExitTimer);
      process.exit(1);
    }
  }

  process.on('SIGINT', () => {
    void shutdownServer('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdownServer('SIGTERM');
  });
}

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled promise rejection:', reason);
});

main().catch((err: unknown) => {
  console.error('Fatal: startup failed, exiting.', err);
  process.exit(1);
});
