import test from 'node:test';
import assert from 'node:assert/strict';

import {
  DEFAULT_SENTIMENT_SELECTORS,
  categorizeSentiment,
  createSentimentScraper,
  readSentimentValue,
  selectorStrategy,
} from '../server/scrapers/sentimentScraper.js';
import { FakePageDriver, FakeSession } from './helpers/fakeBrowser.js';
import { quiet } from './helpers/quiet.js';

const PAGE_URL = 'https://gauge.test/fear-and-greed';

test('categorizeSentiment maps band edges to their categories', () => {
  assert.equal(categorizeSentiment(0), 'Extreme Fear');
  assert.equal(categorizeSentiment(25), 'Extreme Fear');
  assert.equal(categorizeSentiment(26), 'Fear');
  assert.equal(categorizeSentiment(44), 'Fear');
  assert.equal(categorizeSentiment(45), 'Neutral');
  assert.equal(categorizeSentiment(55), 'Neutral');
  assert.equal(categorizeSentiment(56), 'Greed');
  assert.equal(categorizeSentiment(74), 'Greed');
  assert.equal(categorizeSentiment(75), 'Extreme Greed');
  assert.equal(categorizeSentiment(100), 'Extreme Greed');
});

test('categorizeSentiment returns Unknown for anything outside 0-100 integers', () => {
  assert.equal(categorizeSentiment(101), 'Unknown');
  assert.equal(categorizeSentiment(-1), 'Unknown');
  assert.equal(categorizeSentiment(50.5), 'Unknown');
  assert.equal(categorizeSentiment('abc'), 'Unknown');
  assert.equal(categorizeSentiment(null), 'Unknown');
  assert.equal(categorizeSentiment('63'), 'Greed');
});

test('readSentimentValue falls through strategies until one yields digits', async (t) => {
  quiet(t);
  const session = new FakeSession(PAGE_URL, {
    texts: { '.empty': '  ', '.digits': ' 63 ' },
    throwOnRead: ['.broken'],
  });

  const reading = await readSentimentValue(session, [
    selectorStrategy('.missing'),
    selectorStrategy('.broken'),
    selectorStrategy('.empty'),
    selectorStrategy('.digits'),
  ]);

  assert.deepEqual(reading, { value: 63, strategy: '.digits' });
});

test('sentiment scraper stores the reading at the start of the captured hour', async (t) => {
  quiet(t);
  const driver = new FakePageDriver({ [PAGE_URL]: { texts: { [DEFAULT_SENTIMENT_SELECTORS[1]]: '22' } } });

  const outcome = await createSentimentScraper({
    driver,
    url: PAGE_URL,
    clock: () => new Date('2026-03-02T14:47:12.345Z'),
  }).scrape();

  assert.equal(outcome.ok, true);
  assert.deepEqual(outcome.records, [
    { capturedAt: new Date('2026-03-02T14:00:00.000Z'), value: 22, category: 'Extreme Fear' },
  ]);
  assert.equal(driver.targets[0].readySelector, DEFAULT_SENTIMENT_SELECTORS.join(', '));
});

test('a gauge with no numeric value fails the scrape', async (t) => {
  quiet(t);
  const driver = new FakePageDriver({ [PAGE_URL]: { texts: { [DEFAULT_SENTIMENT_SELECTORS[0]]: 'n/a' } } });

  const outcome = await createSentimentScraper({ driver, url: PAGE_URL }).scrape();

  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.phase, 'extracting');
  assert.equal(outcome.error, 'Unable to locate a numeric gauge value (4 strategies tried)');
  assert.equal(driver.sessions[0].closed, true);
});
