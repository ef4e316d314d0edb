import test from 'node:test';
import assert from 'node:assert/strict';

import { MARKET_HOLIDAYS_PATH, createMarketHolidaysFetcher, toMarketHoliday } from '../server/scrapers/marketHolidays.js';
import type { DataApiClient } from '../server/services/dataApi.js';
import { DataApiError } from '../server/lib/errors.js';
import { quiet } from './helpers/quiet.js';

function clientReturning(payload: unknown, paths: string[] = []): DataApiClient {
  return {
    getJson: async (path) => {
      paths.push(path);
      return payload;
    },
  };
}

const clock = () => new Date('2026-11-20T15:00:00Z');

test('holidays are tagged with the current year and keep early-close times', async (t) => {
  quiet(t);
  const paths: string[] = [];
  const client = clientReturning(
    [
      { date: '2026-11-26', exchange: 'NYSE', name: 'Thanksgiving', status: 'closed' },
      { date: '2026-11-27', exchange: 'NASDAQ', name: 'Thanksgiving', status: 'early-close', open: '2026-11-27T14:30:00.000Z', close: '2026-11-27T18:00:00.000Z' },
      { date: '2026-12-25', exchange: 'NYSE', status: 'closed' },
      { exchange: 'NYSE', name: 'Christmas', status: 'closed' },
    ],
    paths,
  );

  const outcome = await createMarketHolidaysFetcher({ client, clock }).scrape();

  assert.equal(outcome.ok, true);
  assert.deepEqual(paths, [MARKET_HOLIDAYS_PATH]);
  assert.deepEqual(outcome.records, [
    {
      name: 'Thanksgiving',
      date: '2026-11-26',
      status: 'closed',
      exchange: 'NYSE',
      year: 2026,
      openTime: null,
      closeTime: null,
    },
    {
      name: 'Thanksgiving',
      date: '2026-11-27',
      status: 'early-close',
      exchange: 'NASDAQ',
      year: 2026,
      openTime: '2026-11-27T14:30:00.000Z',
      closeTime: '2026-11-27T18:00:00.000Z',
    },
  ]);
  assert.deepEqual(outcome.skipped, [
    { index: 2, reason: 'missing name' },
    { index: 3, reason: 'missing or malformed date "" for Christmas' },
  ]);
});

test('an unexpected payload shape fails the fetch', async (t) => {
  quiet(t);
  const outcome = await createMarketHolidaysFetcher({ client: clientReturning({ holidays: [] }), clock }).scrape();

  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.phase, 'fetching');
  assert.equal(outcome.error, 'Unexpected market holidays payload');
});

test('client errors surface as a failed outcome', async (t) => {
  quiet(t);
  const client: DataApiClient = {
    getJson: async () => {
      throw new DataApiError('Data API request failed (500): x', { httpStatus: 500 });
    },
  };

  const job = createMarketHolidaysFetcher({ client, clock });
  const outcome = await job.scrape();

  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.error, 'Data API request failed (500): x');
  assert.deepEqual(await job.run(), []);
});

test('entries without a status or exchange default to a full NYSE closure', () => {
  assert.deepEqual(toMarketHoliday({ date: '2026-07-03', name: 'Independence Day' }, 2026), {
    name: 'Independence Day',
    date: '2026-07-03',
    status: 'closed',
    exchange: 'NYSE',
    year: 2026,
    openTime: null,
    closeTime: null,
  });
});
