import test from 'node:test';
import assert from 'node:assert/strict';

import { EARNINGS_SELECTORS, createEarningsScraper } from '../server/scrapers/earningsScraper.js';
import { FakePageDriver, type FakeRowSpec } from './helpers/fakeBrowser.js';
import { quiet } from './helpers/quiet.js';

const PAGE_URL = 'https://calendar.test/earnings';
const S = EARNINGS_SELECTORS;

const rows: FakeRowSpec[] = [
  {
    text: {
      [S.ticker]: 'AAPLD\nApple Inc.',
      [S.date]: 'Jan 29, 2026',
      [S.epsEstimate]: '2.35 USD',
      [S.revenueForecast]: '124.1B USD',
      [S.marketCap]: '3.4T USD',
    },
    attributes: { [S.time]: { title: 'After Close' } },
  },
  { text: { [S.ticker]: 'MSFT', [S.date]: '2026-01-28', [S.reportedEps]: '3.10' } },
  { text: { [S.ticker]: 'XYZ', [S.date]: 'TBD' } },
  { text: { [S.date]: '2026-01-28' } },
];

test('earnings scraper normalizes rows and skips those it cannot key', async (t) => {
  quiet(t);
  const driver = new FakePageDriver({ [PAGE_URL]: { rows: { [S.row]: rows }, present: [S.table], loadMoreClicks: 2 } });

  const outcome = await createEarningsScraper({ driver, week: 'this_week', url: PAGE_URL }).scrape();

  assert.equal(outcome.ok, true);
  assert.deepEqual(outcome.records, [
    {
      ticker: 'AAPL',
      reportDate: '2026-01-29',
      timeOfDay: 'After Close',
      epsEstimate: '2.35',
      reportedEps: 'N/A',
      revenueForecast: '124.1B',
      reportedRevenue: 'N/A',
      marketCap: '3.4T',
    },
    {
      ticker: 'MSFT',
      reportDate: '2026-01-28',
      timeOfDay: 'Unknown',
      epsEstimate: 'N/A',
      reportedEps: '3.10',
      revenueForecast: 'N/A',
      reportedRevenue: 'N/A',
      marketCap: 'N/A',
    },
  ]);
  assert.deepEqual(outcome.skipped, [
    { index: 2, reason: 'unreadable report date "TBD" for XYZ' },
    { index: 3, reason: 'missing ticker' },
  ]);
  assert.deepEqual(driver.sessions[0].filtersApplied, ['This Week']);
  assert.equal(driver.sessions[0].closed, true);
  assert.equal(driver.targets[0].readySelector, S.table);
});

test('next-week scraper selects the Next Week tab', async (t) => {
  quiet(t);
  const driver = new FakePageDriver({ [PAGE_URL]: { rows: { [S.row]: rows.slice(0, 1) }, present: [S.table] } });

  const job = createEarningsScraper({ driver, week: 'next_week', url: PAGE_URL });
  const records = await job.run();

  assert.equal(job.label, 'next-week-earnings');
  assert.equal(records.length, 1);
  assert.deepEqual(driver.sessions[0].filtersApplied, ['Next Week']);
});

test('a failed tab click does not stop extraction', async (t) => {
  quiet(t);
  const driver = new FakePageDriver({
    [PAGE_URL]: { rows: { [S.row]: rows.slice(1, 2) }, present: [S.table], failFilters: ['This Week'] },
  });

  const outcome = await createEarningsScraper({ driver, week: 'this_week', url: PAGE_URL }).scrape();

  assert.equal(outcome.ok, true);
  assert.equal(outcome.records.length, 1);
});

test('an unreachable page yields a failed outcome from the opening phase', async (t) => {
  quiet(t);
  const driver = new FakePageDriver({ [PAGE_URL]: new Error('Timeout 60000ms exceeded') });

  const job = createEarningsScraper({ driver, week: 'this_week', url: PAGE_URL });
  const outcome = await job.scrape();

  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.phase, 'opening');
  assert.equal(outcome.error, `Source unavailable (${PAGE_URL}): Timeout 60000ms exceeded`);
  assert.deepEqual(await job.run(), []);
});

test('the session is closed when extraction breaks', async (t) => {
  quiet(t);
  const driver = new FakePageDriver({ [PAGE_URL]: { present: [S.table], failRows: true } });

  const outcome = await createEarningsScraper({ driver, week: 'this_week', url: PAGE_URL }).scrape();

  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.phase, 'extracting');
  assert.equal(outcome.error, 'page crashed');
  assert.equal(driver.sessions[0].closed, true);
});
