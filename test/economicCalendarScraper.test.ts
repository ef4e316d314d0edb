import test from 'node:test';
import assert from 'node:assert/strict';

import { ECONOMIC_SELECTORS, createEconomicCalendarScraper } from '../server/scrapers/economicCalendarScraper.js';
import { FakePageDriver } from './helpers/fakeBrowser.js';
import { quiet } from './helpers/quiet.js';

const PAGE_URL = 'https://calendar.test/economic';
const S = ECONOMIC_SELECTORS;

test('economic events are extracted with formatted timestamps and positional values', async (t) => {
  quiet(t);
  const driver = new FakePageDriver({
    [PAGE_URL]: {
      rows: {
        [S.row]: [
          {
            attributes: { [S.timestamp]: { datetime: '2026-03-06T13:30:00.000Z' } },
            text: { [S.timeLabel]: '08:30', [S.country]: 'United States', [S.title]: 'Non Farm Payrolls' },
            texts: { [S.values]: ['151K', '160K', '143K'] },
          },
          {
            attributes: { [S.timestamp]: { datetime: 'Mar 6' } },
            text: { [S.country]: 'Canada', [S.title]: 'Unemployment Rate' },
            texts: { [S.values]: ['6.6%'] },
          },
        ],
      },
    },
  });

  const outcome = await createEconomicCalendarScraper({ driver, url: PAGE_URL, settleAfterFiltersMs: 0 }).scrape();

  assert.equal(outcome.ok, true);
  assert.deepEqual(outcome.records, [
    {
      eventTimestamp: '2026-03-06 13:30:00',
      eventTimeLabel: '08:30',
      country: 'United States',
      eventName: 'Non Farm Payrolls',
      actual: '151K',
      forecast: '160K',
      prior: '143K',
    },
    {
      eventTimestamp: 'Mar 6',
      eventTimeLabel: 'N/A',
      country: 'Canada',
      eventName: 'Unemployment Rate',
      actual: '6.6%',
      forecast: 'N/A',
      prior: 'N/A',
    },
  ]);
  assert.deepEqual(driver.sessions[0].filtersApplied, ['High Importance', 'This Week']);
});

test('no rows after filtering is an empty success', async (t) => {
  quiet(t);
  const driver = new FakePageDriver({ [PAGE_URL]: {} });

  const outcome = await createEconomicCalendarScraper({
    driver,
    url: PAGE_URL,
    settleAfterFiltersMs: 0,
    rowWaitTimeoutMs: 10,
  }).scrape();

  assert.equal(outcome.ok, true);
  assert.deepEqual(outcome.records, []);
  assert.equal(driver.sessions[0].closed, true);
});

test('a navigation timeout fails the scrape without throwing', async (t) => {
  quiet(t);
  const driver = new FakePageDriver({ [PAGE_URL]: new Error('page.goto: Timeout 60000ms exceeded.') });

  const outcome = await createEconomicCalendarScraper({ driver, url: PAGE_URL, settleAfterFiltersMs: 0 }).scrape();

  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.phase, 'opening');
  assert.match(outcome.error, /^Source unavailable/);
});
