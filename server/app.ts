import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import type { ErrorPayload } from '../shared/api-types.js';
import { CORS_ORIGIN, REQUEST_LOG_ENABLED } from './config.js';
import { registerHealthRoutes, type HealthRoutesOptions } from './routes/healthRoutes.js';
import { registerMarketDataRoutes } from './routes/marketDataRoutes.js';
import { registerScraperRoutes, type SchedulerControl } from './routes/scraperRoutes.js';
import type { MarketDataReader } from './services/marketDataService.js';

export interface BuildAppOptions extends HealthRoutesOptions {
  reader: MarketDataReader;
  scheduler: SchedulerControl;
  corsOrigin?: string;
  requestLogEnabled?: boolean;
}

function parseCorsOrigin(value: string): boolean | string[] {
  if (!value || value === '*') return true;
  return value
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { reader, scheduler, corsOrigin = CORS_ORIGIN, requestLogEnabled = REQUEST_LOG_ENABLED } = options;

  const app = Fastify({ logger: false });
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  await app.register(cors, { origin: parseCorsOrigin(corsOrigin) });

  if (requestLogEnabled) {
    app.addHook('onResponse', async (request, reply) => {
      console.log(`[http] ${request.method} ${request.url} ${reply.statusCode} ${Math.round(reply.elapsedTime)}ms`);
    });
  }

  app.setErrorHandler<FastifyError>((err, request, reply) => {
    const statusCode = err.validation ? 400 : (err.statusCode ?? 500);
    if (statusCode >= 500) {
      console.error(`[http] ${request.method} ${request.url} failed: ${err.message}`);
    }
    const payload: ErrorPayload = { status: 'error', error: err.message };
    return reply.code(statusCode).send(payload);
  });

  registerHealthRoutes(app, {
    getHealthPayload: options.getHealthPayload,
    getReadyPayload: options.getReadyPayload,
    getFreshnessPayload: options.getFreshnessPayload,
  });
  registerMarketDataRoutes(app, reader);
  registerScraperRoutes(app, scheduler);

  return app;
}
