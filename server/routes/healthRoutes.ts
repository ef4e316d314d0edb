import type { FastifyInstance } from 'fastify';
import type { FreshnessPayload } from '../../shared/api-types.js';
import { describeError } from '../lib/errors.js';

export interface StatusPayload<T> {
  statusCode: number;
  body: T;
}

export interface HealthRoutesOptions {
  getHealthPayload: () => Record<string, unknown>;
  getReadyPayload: () => Promise<StatusPayload<Record<string, unknown>>>;
  /** Scheduler staleness; `/healthz/jobs` is not registered without it. */
  getFreshnessPayload?: () => StatusPayload<FreshnessPayload>;
}

export function registerHealthRoutes(app: FastifyInstance, options: HealthRoutesOptions): void {
  const { getHealthPayload, getReadyPayload, getFreshnessPayload } = options;

  app.get('/healthz', async (_request, reply) => reply.code(200).send(getHealthPayload()));

  app.get('/readyz', async (_request, reply) => {
    try {
      const { statusCode, body } = await getReadyPayload();
      return reply.code(statusCode).send(body);
    } catch (err: unknown) {
      console.error(`[health] Ready check failed: ${describeError(err)}`);
      return reply.code(503).send({ ready: false, error: 'Ready check failed' });
    }
  });

  if (getFreshnessPayload) {
    app.get('/healthz/jobs', async (_request, reply) => {
      const { statusCode, body } = getFreshnessPayload();
      return reply.code(statusCode).send(body);
    });
  }
}
