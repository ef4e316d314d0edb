import type { JobRunSummary, ScrapeDomain, SchedulerJobState, SchedulerState, TriggerResult } from '../../shared/api-types.js';
import {
  EARNINGS_HOUR,
  EARNINGS_MINUTE,
  ECONOMIC_DATA_HOUR,
  ECONOMIC_DATA_MINUTE,
  FEAR_INDEX_MINUTE,
  MARKET_HOLIDAYS_DAY,
  MARKET_HOLIDAYS_HOUR,
  MARKET_HOLIDAYS_MINUTE,
  NEXT_WEEK_EARNINGS_DAY,
  NEXT_WEEK_EARNINGS_HOUR,
  NEXT_WEEK_EARNINGS_MINUTE,
  PREMARKET_HOUR,
  PREMARKET_MINUTE,
  SCHEDULER_ENABLED,
} from '../config.js';
import { addDaysToDateKey, currentEtDateString, easternLocalToUtcMs, weekdayOfDateKey } from '../lib/dateUtils.js';
import { describeError } from '../lib/errors.js';
import { toTriggerResult, type DomainJob } from './scrapeJobs.js';

// All cadence times are America/New_York wall-clock.
export type JobCadence =
  | { kind: 'hourly'; minute: number }
  | { kind: 'daily'; hour: number; minute: number; weekdaysOnly?: boolean }
  | { kind: 'weekly'; dayOfWeek: number; hour: number; minute: number };

export interface ScheduledJob extends DomainJob {
  cadence: JobCadence;
}

const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

export function defaultJobCadences(): Record<ScrapeDomain, JobCadence> {
  return {
    economic_data: { kind: 'daily', hour: ECONOMIC_DATA_HOUR, minute: ECONOMIC_DATA_MINUTE },
    fear_index: { kind: 'hourly', minute: FEAR_INDEX_MINUTE },
    earnings: { kind: 'daily', hour: EARNINGS_HOUR, minute: EARNINGS_MINUTE },
    next_week_earnings: {
      kind: 'weekly',
      dayOfWeek: NEXT_WEEK_EARNINGS_DAY,
      hour: NEXT_WEEK_EARNINGS_HOUR,
      minute: NEXT_WEEK_EARNINGS_MINUTE,
    },
    market_holidays: {
      kind: 'weekly',
      dayOfWeek: MARKET_HOLIDAYS_DAY,
      hour: MARKET_HOLIDAYS_HOUR,
      minute: MARKET_HOLIDAYS_MINUTE,
    },
    premarket_movers: { kind: 'daily', hour: PREMARKET_HOUR, minute: PREMARKET_MINUTE, weekdaysOnly: true },
  };
}

export function withCadences(
  jobs: readonly DomainJob[],
  cadences: Record<ScrapeDomain, JobCadence> = defaultJobCadences(),
): ScheduledJob[] {
  return jobs.map((job) => ({ ...job, cadence: cadences[job.id] }));
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function describeCadence(cadence: JobCadence): string {
  switch (cadence.kind) {
    case 'hourly':
      return `hourly at :${pad2(cadence.minute)}`;
    case 'daily':
      return `${cadence.weekdaysOnly ? 'weekdays' : 'daily'} at ${pad2(cadence.hour)}:${pad2(cadence.minute)} ET`;
    case 'weekly':
      return `weekly on ${DAY_NAMES[cadence.dayOfWeek] ?? `day ${cadence.dayOfWeek}`} at ${pad2(cadence.hour)}:${pad2(cadence.minute)} ET`;
  }
}

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/** Longest gap between two runs; a weekday cadence spans the weekend. */
export function cadenceIntervalMs(cadence: JobCadence): number {
  switch (cadence.kind) {
    case 'hourly':
      return HOUR_MS;
    case 'daily':
      return cadence.weekdaysOnly ? 3 * DAY_MS : DAY_MS;
    case 'weekly':
      return 7 * DAY_MS;
  }
}

function etLocalToUtcMs(dateKey: string, hour: number, minute: number): number {
  const [year, month, day] = dateKey.split('-').map(Number);
  return easternLocalToUtcMs(year, month, day, hour, minute);
}

/** First cadence time strictly after `nowUtc`. */
export function getNextRunUtcMs(cadence: JobCadence, nowUtc: Date = new Date()): number {
  const nowMs = nowUtc.getTime();
  const todayEt = currentEtDateString(nowUtc);

  // Eight days covers a weekly cadence whose slot today has already passed.
  for (let offset = 0; offset <= 8; offset += 1) {
    const dateKey = addDaysToDateKey(todayEt, offset);
    const weekday = weekdayOfDateKey(dateKey);

    if (cadence.kind === 'hourly') {
      for (let hour = 0; hour < 24; hour += 1) {
        const candidate = etLocalToUtcMs(dateKey, hour, cadence.minute);
        if (candidate > nowMs) return candidate;
      }
      continue;
    }
    if (cadence.kind === 'daily' && cadence.weekdaysOnly && (weekday === 0 || weekday === 6)) continue;
    if (cadence.kind === 'weekly' && weekday !== cadence.dayOfWeek) continue;

    const candidate = etLocalToUtcMs(dateKey, cadence.hour, cadence.minute);
    if (candidate > nowMs) return candidate;
  }
  throw new Error(`No run time found for cadence "${describeCadence(cadence)}"`);
}

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

export interface ScraperSchedulerOptions {
  enabledByConfig?: boolean;
  now?: () => Date;
}

interface JobEntry {
  job: ScheduledJob;
  timer: ReturnType<typeof setTimeout> | null;
  nextRunUtcMs: number | null;
  running: boolean;
  lastRun: JobRunSummary | null;
  lastSuccessAt: string | null;
}

export class ScraperScheduler {
  private readonly entries: JobEntry[];
  private readonly enabledByConfig: boolean;
  private readonly now: () => Date;
  private enabled: boolean;
  private started = false;

  constructor(jobs: readonly ScheduledJob[], options: ScraperSchedulerOptions = {}) {
    this.entries = jobs.map((job) => ({
      job,
      timer: null,
      nextRunUtcMs: null,
      running: false,
      lastRun: null,
      lastSuccessAt: null,
    }));
    this.enabledByConfig = options.enabledByConfig ?? SCHEDULER_ENABLED;
    this.enabled = this.enabledByConfig;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    this.started = true;
    if (!this.enabled) {
      console.warn('[scheduler] Scheduler disabled; no jobs armed');
      return;
    }
    for (const entry of this.entries) this.arm(entry);
    console.log(`[scheduler] Started with ${this.entries.length} job(s)`);
  }

  stop(): void {
    this.started = false;
    for (const entry of this.entries) this.disarm(entry);
    console.log('[scheduler] Stopped');
  }

  setEnabled(enabled: boolean): SchedulerState {
    this.enabled = enabled;
    if (!enabled) {
      for (const entry of this.entries) this.disarm(entry);
    } else if (this.started) {
      for (const entry of this.entries) this.arm(entry);
    }
    console.log(`[scheduler] ${enabled ? 'Enabled' : 'Disabled'} at runtime`);
    return this.getState();
  }

  getState(): SchedulerState {
    const jobs: SchedulerJobState[] = this.entries.map((entry) => ({
      id: entry.job.id,
      name: entry.job.name,
      cadence: describeCadence(entry.job.cadence),
      intervalMs: cadenceIntervalMs(entry.job.cadence),
      running: entry.running,
      nextRunUtc: entry.nextRunUtcMs === null ? null : new Date(entry.nextRunUtcMs).toISOString(),
      lastRun: entry.lastRun,
      lastSuccessAt: entry.lastSuccessAt,
    }));
    return { enabledByConfig: this.enabledByConfig, enabled: this.enabled, jobs };
  }

  /** Runs every job once, one after another, regardless of the enabled flag. */
  async triggerAll(): Promise<Partial<Record<ScrapeDomain, TriggerResult>>> {
    const results: Partial<Record<ScrapeDomain, TriggerResult>> = {};
    console.log(`[scheduler] Manual trigger of ${this.entries.length} job(s)`);
    for (const entry of this.entries) {
      const summary = await this.runEntry(entry, 'manual');
      results[entry.job.id] = summary ? toTriggerResult(summary) : 'failed: already running';
    }
    return results;
  }

  /** `null` when the job was still running from an earlier trigger. */
  private async runEntry(entry: JobEntry, trigger: 'manual' | 'schedule'): Promise<JobRunSummary | null> {
    const { job } = entry;
    if (entry.running) {
      console.warn(`[scheduler:${job.id}] Still running; skipping ${trigger} run`);
      return null;
    }
    entry.running = true;
    const startedAt = this.now();
    console.log(`[scheduler:${job.id}] Started (${trigger})`);
    try {
      const summary = await job.run();
      entry.lastRun = summary;
      if (summary.status === 'success') entry.lastSuccessAt = summary.finishedAt;
      console.log(`[scheduler:${job.id}] Finished with status=${summary.status}`);
      return summary;
    } catch (err: unknown) {
      const finishedAt = this.now();
      const summary: JobRunSummary = {
        status: 'failed',
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        recordCount: 0,
        skippedCount: 0,
        error: describeError(err),
      };
      entry.lastRun = summary;
      console.error(`[scheduler:${job.id}] Crashed: ${summary.error}`);
      return summary;
    } finally {
      entry.running = false;
    }
  }

  private arm(entry: JobEntry): void {
    this.disarm(entry);
    const nextRunMs = getNextRunUtcMs(entry.job.cadence, this.now());
    entry.nextRunUtcMs = nextRunMs;
    const delayMs = Math.max(1000, nextRunMs - this.now().getTime());

    const timer = setTimeout(async () => {
      entry.timer = null;
      entry.nextRunUtcMs = null;
      try {
        await this.runEntry(entry, 'schedule');
      } finally {
        if (this.enabled && this.started) this.arm(entry);
      }
    }, delayMs);
    if (typeof timer.unref === 'function') timer.unref();
    entry.timer = timer;
    console.log(`[scheduler:${entry.job.id}] Next run scheduled in ${Math.round(delayMs / 1000)}s`);
  }

  private disarm(entry: JobEntry): void {
    if (entry.timer) clearTimeout(entry.timer);
    entry.timer = null;
    entry.nextRunUtcMs = null;
  }
}
