import test from 'node:test';
import assert from 'node:assert/strict';

import type { PremarketMover, SchedulerJobState, SchedulerState } from '../shared/api-types.js';
import { buildApp } from '../server/app.js';
import type { SchedulerControl } from '../server/routes/scraperRoutes.js';
import { buildFreshnessPayload, buildHealthPayload, buildReadyPayload } from '../server/services/healthService.js';
import type { MarketDataReader } from '../server/services/marketDataService.js';
import { quiet } from './helpers/quiet.js';

function mover(symbol: string, changePercent: number): PremarketMover {
  return {
    symbol,
    price: 10,
    change: changePercent / 10,
    changePercent,
    volume: 1000,
    direction: changePercent >= 0 ? 'gainer' : 'loser',
    asOfDate: '2026-03-02',
  };
}

function fakeReader(limits: Array<[string, number]>, overrides: Partial<MarketDataReader> = {}): MarketDataReader {
  return {
    latestEarnings: async (limit) => {
      limits.push(['earnings', limit]);
      return [];
    },
    nextWeekEarnings: async (limit) => {
      limits.push(['nextWeek', limit]);
      return [];
    },
    latestEconomicEvents: async (limit) => {
      limits.push(['economic', limit]);
      return [];
    },
    latestSentiment: async (limit) => {
      limits.push(['sentiment', limit]);
      return [{ capturedAt: new Date('2026-03-02T14:00:00Z'), value: 62, category: 'Greed' }];
    },
    upcomingHolidays: async (limit) => {
      limits.push(['holidays', limit]);
      return [];
    },
    latestPremarketMovers: async (limit) => {
      limits.push(['movers', limit]);
      return { gainers: [mover('UP', 12.5)], losers: [mover('DOWN', -8)] };
    },
    ...overrides,
  };
}

const idleState: SchedulerState = { enabledByConfig: true, enabled: true, jobs: [] };

function fakeScheduler(overrides: Partial<SchedulerControl> = {}): SchedulerControl {
  return {
    triggerAll: async () => ({ earnings: 'success', economic_data: 'failed: Source unavailable (x): boom' }),
    getState: () => idleState,
    ...overrides,
  };
}

async function appWith(
  reader: MarketDataReader,
  scheduler: SchedulerControl = fakeScheduler(),
  schedulerState: SchedulerState = idleState,
) {
  return buildApp({
    reader,
    scheduler,
    getHealthPayload: () => buildHealthPayload({ isShuttingDown: false, nowIso: '2026-03-02T14:00:00.000Z', uptimeSeconds: 5 }),
    getReadyPayload: () => buildReadyPayload({ pool: { query: async () => ({}) }, isShuttingDown: false, schedulerState: idleState }),
    getFreshnessPayload: () => buildFreshnessPayload(schedulerState, Date.parse('2026-03-02T14:00:00.000Z')),
    corsOrigin: '*',
    requestLogEnabled: false,
  });
}

test('read routes apply their default limits', async (t) => {
  quiet(t);
  const limits: Array<[string, number]> = [];
  const app = await appWith(fakeReader(limits));
  t.after(() => app.close());

  for (const url of [
    '/api/earnings',
    '/api/earnings/next-week',
    '/api/economic-events',
    '/api/fear-greed',
    '/api/premarket',
    '/api/market-holidays',
  ]) {
    const res = await app.inject({ method: 'GET', url });
    assert.equal(res.statusCode, 200, url);
  }

  assert.deepEqual(limits, [
    ['earnings', 10],
    ['nextWeek', 50],
    ['economic', 10],
    ['sentiment', 1],
    ['movers', 20],
    ['holidays', 10],
  ]);
});

test('the limit query parameter is coerced and bounded', async (t) => {
  quiet(t);
  const limits: Array<[string, number]> = [];
  const app = await appWith(fakeReader(limits));
  t.after(() => app.close());

  const ok = await app.inject({ method: 'GET', url: '/api/earnings?limit=25' });
  assert.equal(ok.statusCode, 200);
  assert.deepEqual(limits, [['earnings', 25]]);

  for (const bad of ['0', '501', 'abc', '2.5']) {
    const res = await app.inject({ method: 'GET', url: `/api/earnings?limit=${bad}` });
    assert.equal(res.statusCode, 400, bad);
    assert.equal(res.json().status, 'error');
  }
  assert.equal(limits.length, 1);
});

test('reads are wrapped in a success envelope', async (t) => {
  quiet(t);
  const app = await appWith(fakeReader([]));
  t.after(() => app.close());

  const sentiment = await app.inject({ method: 'GET', url: '/api/fear-greed' });
  assert.deepEqual(sentiment.json(), {
    status: 'success',
    data: [{ capturedAt: '2026-03-02T14:00:00.000Z', value: 62, category: 'Greed' }],
  });

  const gainers = await app.inject({ method: 'GET', url: '/api/premarket/gainers' });
  assert.deepEqual(gainers.json(), { status: 'success', data: [mover('UP', 12.5)] });

  const losers = await app.inject({ method: 'GET', url: '/api/premarket/losers' });
  assert.deepEqual(losers.json(), { status: 'success', data: [mover('DOWN', -8)] });
});

test('a failing read becomes a 500 error envelope', async (t) => {
  quiet(t);
  const app = await appWith(
    fakeReader([], {
      latestEconomicEvents: async () => {
        throw new Error('connection refused');
      },
    }),
  );
  t.after(() => app.close());

  const res = await app.inject({ method: 'GET', url: '/api/economic-events' });

  assert.equal(res.statusCode, 500);
  assert.deepEqual(res.json(), { status: 'error', error: 'connection refused' });
});

test('trigger runs every job and reports per-domain results', async (t) => {
  quiet(t);
  let calls = 0;
  const app = await appWith(
    fakeReader([]),
    fakeScheduler({
      triggerAll: async () => {
        calls += 1;
        return { earnings: 'success', economic_data: 'failed: Source unavailable (x): boom' };
      },
    }),
  );
  t.after(() => app.close());

  const res = await app.inject({ method: 'POST', url: '/api/scrapers/trigger' });

  assert.equal(res.statusCode, 200);
  assert.equal(calls, 1);
  assert.deepEqual(res.json(), {
    status: 'completed',
    results: { earnings: 'success', economic_data: 'failed: Source unavailable (x): boom' },
  });
});

test('status returns the scheduler state', async (t) => {
  quiet(t);
  const app = await appWith(fakeReader([]));
  t.after(() => app.close());

  const res = await app.inject({ method: 'GET', url: '/api/scrapers/status' });

  assert.deepEqual(res.json(), { status: 'success', data: idleState });
});

test('health and readiness endpoints', async (t) => {
  quiet(t);
  const app = await appWith(fakeReader([]));
  t.after(() => app.close());

  const health = await app.inject({ method: 'GET', url: '/healthz' });
  assert.deepEqual(health.json(), {
    status: 'ok',
    timestamp: '2026-03-02T14:00:00.000Z',
    uptimeSeconds: 5,
    shuttingDown: false,
  });

  const ready = await app.inject({ method: 'GET', url: '/readyz' });
  assert.equal(ready.statusCode, 200);
  assert.deepEqual(ready.json(), {
    ready: true,
    degraded: false,
    shuttingDown: false,
    database: true,
    schedulerEnabled: true,
    errors: { database: null },
  });
});

test('readiness reports failed jobs and an unreachable database', async () => {
  const payload = await buildReadyPayload({
    pool: {
      query: async () => {
        throw new Error('ECONNREFUSED');
      },
    },
    isShuttingDown: false,
    schedulerState: {
      enabledByConfig: true,
      enabled: false,
      jobs: [
        {
          id: 'fear_index',
          name: 'Fear & Greed index',
          cadence: 'hourly at :00',
          intervalMs: 3_600_000,
          running: false,
          nextRunUtc: null,
          lastRun: {
            status: 'failed',
            startedAt: '2026-03-02T14:00:00.000Z',
            finishedAt: '2026-03-02T14:00:03.000Z',
            durationMs: 3000,
            recordCount: 0,
            skippedCount: 0,
            error: 'gauge not found',
          },
          lastSuccessAt: null,
        },
      ],
    },
  });

  assert.equal(payload.statusCode, 503);
  assert.equal(payload.body.ready, false);
  assert.equal(payload.body.database, false);
  assert.equal(payload.body.schedulerEnabled, false);
  assert.deepEqual(payload.body.warnings, ['fear_index last run failed at 2026-03-02T14:00:03.000Z: gauge not found']);
  assert.deepEqual(payload.body.errors, { database: 'ECONNREFUSED' });
});

function jobState(overrides: Partial<SchedulerJobState> & Pick<SchedulerJobState, 'id'>): SchedulerJobState {
  return {
    name: overrides.id,
    cadence: 'hourly at :00',
    intervalMs: 3_600_000,
    running: false,
    nextRunUtc: null,
    lastRun: null,
    lastSuccessAt: null,
    ...overrides,
  };
}

const NOW_MS = Date.parse('2026-03-02T14:00:00.000Z');

test('freshness compares each last success with twice the cadence interval', () => {
  const { statusCode, body } = buildFreshnessPayload(
    {
      enabledByConfig: true,
      enabled: true,
      jobs: [
        jobState({ id: 'fear_index', lastSuccessAt: '2026-03-02T13:00:00.000Z' }),
        jobState({ id: 'premarket_movers', intervalMs: 3 * 86_400_000, lastSuccessAt: '2026-02-27T14:00:00.000Z' }),
        jobState({ id: 'earnings', intervalMs: 86_400_000, lastSuccessAt: '2026-02-28T13:59:59.000Z' }),
      ],
    },
    NOW_MS,
  );

  assert.equal(statusCode, 503);
  assert.deepEqual(body, {
    status: 'stale',
    jobs: [
      { id: 'fear_index', lastSuccessAt: '2026-03-02T13:00:00.000Z', ageSeconds: 3600, stale: false },
      { id: 'premarket_movers', lastSuccessAt: '2026-02-27T14:00:00.000Z', ageSeconds: 259_200, stale: false },
      { id: 'earnings', lastSuccessAt: '2026-02-28T13:59:59.000Z', ageSeconds: 172_801, stale: true },
    ],
  });
});

test('a job that has not succeeded since startup is stale only after a failed run', () => {
  const failedRun = {
    status: 'failed' as const,
    startedAt: '2026-03-02T13:59:58.000Z',
    finishedAt: '2026-03-02T14:00:00.000Z',
    durationMs: 2000,
    recordCount: 0,
    skippedCount: 0,
    error: 'gauge not found',
  };
  const { body } = buildFreshnessPayload(
    {
      enabledByConfig: true,
      enabled: true,
      jobs: [jobState({ id: 'market_holidays' }), jobState({ id: 'fear_index', lastRun: failedRun })],
    },
    NOW_MS,
  );

  assert.deepEqual(body.jobs, [
    { id: 'market_holidays', lastSuccessAt: null, ageSeconds: null, stale: false },
    { id: 'fear_index', lastSuccessAt: null, ageSeconds: null, stale: true },
  ]);
});

test('the job freshness endpoint reports 200 when every job is fresh', async (t) => {
  quiet(t);
  const state: SchedulerState = {
    enabledByConfig: true,
    enabled: true,
    jobs: [jobState({ id: 'fear_index', lastSuccessAt: '2026-03-02T13:30:00.000Z' })],
  };
  const app = await appWith(fakeReader([]), fakeScheduler(), state);
  t.after(() => app.close());

  const res = await app.inject({ method: 'GET', url: '/healthz/jobs' });

  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), {
    status: 'fresh',
    jobs: [{ id: 'fear_index', lastSuccessAt: '2026-03-02T13:30:00.000Z', ageSeconds: 1800, stale: false }],
  });
});

test('a throwing readiness check answers 503', async (t) => {
  quiet(t);
  const app = await buildApp({
    reader: fakeReader([]),
    scheduler: fakeScheduler(),
    getHealthPayload: () => ({}),
    getReadyPayload: async () => {
      throw new Error('pool closed');
    },
    corsOrigin: '*',
    requestLogEnabled: false,
  });
  t.after(() => app.close());

  const ready = await app.inject({ method: 'GET', url: '/readyz' });
  assert.equal(ready.statusCode, 503);
  assert.deepEqual(ready.json(), { ready: false, error: 'Ready check failed' });

  const jobs = await app.inject({ method: 'GET', url: '/healthz/jobs' });
  assert.equal(jobs.statusCode, 404);
});
