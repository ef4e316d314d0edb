import type { FastifyInstance, FastifyReply } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod';
import type { ErrorPayload, SuccessPayload } from '../../shared/api-types.js';
import { describeError } from '../lib/errors.js';
import type { MarketDataReader } from '../services/marketDataService.js';

const MAX_LIMIT = 500;

function limitQuery(defaultLimit: number) {
  return z.object({
    limit: z.coerce.number().int().min(1).max(MAX_LIMIT).default(defaultLimit),
  });
}

/** Wraps a read in the `{ status, data }` envelope; any failure becomes a 500 `{ status: 'error' }`. */
async function sendRead<T>(reply: FastifyReply, label: string, read: () => Promise<T>) {
  try {
    const payload: SuccessPayload<T> = { status: 'success', data: await read() };
    return reply.send(payload);
  } catch (err: unknown) {
    const error = describeError(err);
    console.error(`[api] ${label} failed: ${error}`);
    const payload: ErrorPayload = { status: 'error', error };
    return reply.code(500).send(payload);
  }
}

export function registerMarketDataRoutes(app: FastifyInstance, reader: MarketDataReader): void {
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.get(
    '/api/earnings',
    { schema: { querystring: limitQuery(10) } },
    (request, reply) => sendRead(reply, 'earnings', () => reader.latestEarnings(request.query.limit)),
  );

  typedApp.get(
    '/api/earnings/next-week',
    { schema: { querystring: limitQuery(50) } },
    (request, reply) => sendRead(reply, 'next-week earnings', () => reader.nextWeekEarnings(request.query.limit)),
  );

  typedApp.get(
    '/api/economic-events',
    { schema: { querystring: limitQuery(10) } },
    (request, reply) => sendRead(reply, 'economic events', () => reader.latestEconomicEvents(request.query.limit)),
  );

  typedApp.get(
    '/api/fear-greed',
    { schema: { querystring: limitQuery(1) } },
    (request, reply) => sendRead(reply, 'fear & greed', () => reader.latestSentiment(request.query.limit)),
  );

  typedApp.get(
    '/api/premarket',
    { schema: { querystring: limitQuery(20) } },
    (request, reply) => sendRead(reply, 'premarket', () => reader.latestPremarketMovers(request.query.limit)),
  );

  typedApp.get(
    '/api/premarket/gainers',
    { schema: { querystring: limitQuery(20) } },
    (request, reply) =>
      sendRead(reply, 'premarket gainers', async () => (await reader.latestPremarketMovers(request.query.limit)).gainers),
  );

  typedApp.get(
    '/api/premarket/losers',
    { schema: { querystring: limitQuery(20) } },
    (request, reply) =>
      sendRead(reply, 'premarket losers', async () => (await reader.latestPremarketMovers(request.query.limit)).losers),
  );

  typedApp.get(
    '/api/market-holidays',
    { schema: { querystring: limitQuery(10) } },
    (request, reply) => sendRead(reply, 'market holidays', () => reader.upcomingHolidays(request.query.limit)),
  );
}
