import type { FreshnessPayload, JobFreshness, SchedulerState } from '../../shared/api-types.js';

type Queryable = { query: (sql: string) => Promise<unknown> };

async function checkDatabaseReady(poolInstance: Queryable | null): Promise<{ ok: boolean | null; error?: string }> {
  if (!poolInstance) return { ok: null };
  try {
    await poolInstance.query('SELECT 1');
    return { ok: true };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  }
}

interface HealthPayloadOptions {
  isShuttingDown: boolean;
  nowIso: string;
  uptimeSeconds: number;
}

function buildHealthPayload(options: HealthPayloadOptions) {
  const { isShuttingDown, nowIso, uptimeSeconds } = options;
  return {
    status: 'ok',
    timestamp: nowIso,
    uptimeSeconds,
    shuttingDown: isShuttingDown,
  };
}

interface ReadyPayloadOptions {
  pool: Queryable | null;
  isShuttingDown: boolean;
  schedulerState?: SchedulerState | null;
  getPoolStats?: () => { total: number; idle: number; waiting: number; max: number } | null;
}

async function buildReadyPayload(options: ReadyPayloadOptions) {
  const { pool, isShuttingDown, schedulerState, getPoolStats } = options;

  const database = await checkDatabaseReady(pool);
  const ready = !isShuttingDown && database.ok === true;

  // Degraded checks: app is up but some collectors are failing.
  const warnings: string[] = [];
  for (const job of schedulerState?.jobs ?? []) {
    if (job.lastRun?.status === 'failed') {
      warnings.push(`${job.id} last run failed at ${job.lastRun.finishedAt}: ${job.lastRun.error ?? 'unknown error'}`);
    }
  }
  const poolStats = typeof getPoolStats === 'function' ? getPoolStats() : null;
  if (poolStats && poolStats.max > 0) {
    const utilization = poolStats.total / poolStats.max;
    if (poolStats.waiting > 0) warnings.push(`DB pool has ${poolStats.waiting} waiting connection(s)`);
    else if (utilization >= 0.9) warnings.push(`DB pool near capacity (${poolStats.total}/${poolStats.max} connections)`);
  }

  const degraded = warnings.length > 0;
  const statusCode = !ready ? 503 : 200;

  return {
    statusCode,
    body: {
      ready,
      degraded,
      shuttingDown: isShuttingDown,
      database: database.ok,
      schedulerEnabled: schedulerState?.enabled ?? null,
      dbPool: poolStats ?? undefined,
      warnings: degraded ? warnings : undefined,
      errors: {
        database: database.error || null,
      },
    },
  };
}

/** A job is stale once its last success is older than this many cadence intervals. */
const STALE_AFTER_INTERVALS = 2;

/**
 * Per-job freshness from the scheduler's run history. A job that has not
 * succeeded since startup is stale only once it has run and failed.
 */
function buildFreshnessPayload(schedulerState: SchedulerState, nowMs: number) {
  const jobs = schedulerState.jobs.map((job): JobFreshness => {
    if (job.lastSuccessAt === null) {
      return { id: job.id, lastSuccessAt: null, ageSeconds: null, stale: job.lastRun?.status === 'failed' };
    }
    const ageMs = nowMs - Date.parse(job.lastSuccessAt);
    return {
      id: job.id,
      lastSuccessAt: job.lastSuccessAt,
      ageSeconds: Math.floor(ageMs / 1000),
      stale: ageMs > job.intervalMs * STALE_AFTER_INTERVALS,
    };
  });
  const body: FreshnessPayload = { status: jobs.some((j) => j.stale) ? 'stale' : 'fresh', jobs };
  return { statusCode: body.status === 'stale' ? 503 : 200, body };
}

export { checkDatabaseReady, buildHealthPayload, buildReadyPayload, buildFreshnessPayload };
