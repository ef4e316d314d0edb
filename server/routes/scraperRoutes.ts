import type { FastifyInstance } from 'fastify';
import type { ErrorPayload, SchedulerState, ScrapeDomain, TriggerPayload, TriggerResult } from '../../shared/api-types.js';
import { describeError } from '../lib/errors.js';

export interface SchedulerControl {
  triggerAll(): Promise<Partial<Record<ScrapeDomain, TriggerResult>>>;
  getState(): SchedulerState;
}

export function registerScraperRoutes(app: FastifyInstance, scheduler: SchedulerControl): void {
  // Runs every job in sequence; the request stays open until the last one finishes.
  app.post('/api/scrapers/trigger', async (_request, reply) => {
    try {
      const payload: TriggerPayload = { status: 'completed', results: await scheduler.triggerAll() };
      return reply.send(payload);
    } catch (err: unknown) {
      const error = describeError(err);
      console.error(`[api] scraper trigger failed: ${error}`);
      const payload: ErrorPayload = { status: 'error', error };
      return reply.code(500).send(payload);
    }
  });

  app.get('/api/scrapers/status', async (_request, reply) => {
    return reply.send({ status: 'success', data: scheduler.getState() });
  });
}
