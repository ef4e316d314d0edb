/**
 * Database query monitoring. Times every Kysely query and logs slow or failing
 * ones via console.warn / console.error (captured by Pino as structured JSON).
 */

import type { LogEvent } from 'kysely';

const DEFAULT_SLOW_QUERY_THRESHOLD_MS = Math.max(0, Number(process.env.SLOW_QUERY_THRESHOLD_MS) || 500);

function compactSql(sql: string): string {
  return String(sql).replace(/\s+/g, ' ').trim().slice(0, 200);
}

/** Builds a Kysely `log` callback for one pool. */
export function createQueryMonitor(
  poolName = 'primary',
  slowQueryThresholdMs = DEFAULT_SLOW_QUERY_THRESHOLD_MS,
): (event: LogEvent) => void {
  return (event: LogEvent) => {
    const durationMs = Math.round(event.queryDurationMillis);
    const sql = compactSql(event.query.sql);
    if (event.level === 'error') {
      const message = event.error instanceof Error ? event.error.message : String(event.error);
      console.error(`[query-error] pool=${poolName} duration=${durationMs}ms sql=${sql} error=${message}`);
      return;
    }
    if (durationMs >= slowQueryThresholdMs) {
      console.warn(`[slow-query] pool=${poolName} duration=${durationMs}ms sql=${sql}`);
    }
  };
}
