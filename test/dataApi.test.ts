import test from 'node:test';
import assert from 'node:assert/strict';

import {
  buildDataApiUrl,
  createDataApiClient,
  extractDataApiError,
  sanitizeDataApiUrl,
  type FetchLike,
} from '../server/services/dataApi.js';
import { DataApiError } from '../server/lib/errors.js';
import { quiet } from './helpers/quiet.js';

function respond(status: number, body: string): FetchLike {
  return async () => ({ ok: status >= 200 && status < 300, status, text: async () => body });
}

test('buildDataApiUrl joins base and path and skips empty params', () => {
  assert.equal(
    buildDataApiUrl('https://api.example.test/', '/v1/marketstatus/upcoming', { a: 1, b: '', c: null, d: false }),
    'https://api.example.test/v1/marketstatus/upcoming?a=1&d=false',
  );
});

test('sanitizeDataApiUrl redacts the api key', () => {
  assert.equal(
    sanitizeDataApiUrl('https://api.example.test/v1/x?apiKey=test-secret&include_otc=false'),
    'https://api.example.test/v1/x?apiKey=***&include_otc=false',
  );
  assert.equal(sanitizeDataApiUrl('not a url'), 'not a url');
});

test('extractDataApiError reads ERROR payloads', () => {
  assert.equal(extractDataApiError({ status: 'ERROR', error: 'Unknown API Key' }), 'Unknown API Key');
  assert.equal(extractDataApiError({ message: 'rate limited' }), 'rate limited');
  assert.equal(extractDataApiError([1, 2]), null);
});

test('getJson returns the parsed payload and sends the key', async (t) => {
  quiet(t);
  const urls: string[] = [];
  const client = createDataApiClient({
    apiKey: 'test-secret',
    baseUrl: 'https://api.example.test',
    fetchImpl: async (input) => {
      urls.push(input);
      return { ok: true, status: 200, text: async () => '[{"name":"Christmas"}]' };
    },
  });

  const payload = await client.getJson('/v1/marketstatus/upcoming');

  assert.deepEqual(payload, [{ name: 'Christmas' }]);
  assert.deepEqual(urls, ['https://api.example.test/v1/marketstatus/upcoming?apiKey=test-secret']);
});

test('getJson raises DataApiError with the HTTP status on non-2xx', async (t) => {
  quiet(t);
  const client = createDataApiClient({
    apiKey: 'test-secret',
    baseUrl: 'https://api.example.test',
    fetchImpl: respond(403, '{"status":"ERROR","error":"Not entitled"}'),
  });

  await assert.rejects(
    () => client.getJson('/v2/snapshot/locale/us/markets/stocks/gainers'),
    (err: unknown) => {
      assert.ok(err instanceof DataApiError);
      assert.equal(err.httpStatus, 403);
      assert.equal(err.isTimeout, false);
      assert.equal(
        err.message,
        'Data API request failed (403): https://api.example.test/v2/snapshot/locale/us/markets/stocks/gainers?apiKey=*** (Not entitled)',
      );
      return true;
    },
  );
});

test('getJson marks timeouts', async (t) => {
  quiet(t);
  const timeout = new Error('The operation was aborted due to timeout');
  timeout.name = 'TimeoutError';
  const client = createDataApiClient({
    apiKey: 'test-secret',
    baseUrl: 'https://api.example.test',
    timeoutMs: 50,
    fetchImpl: async () => {
      throw timeout;
    },
  });

  await assert.rejects(
    () => client.getJson('/v1/marketstatus/upcoming'),
    (err: unknown) => err instanceof DataApiError && err.isTimeout && err.httpStatus === null,
  );
});

test('getJson refuses to run without an api key', async () => {
  const client = createDataApiClient({ apiKey: '', fetchImpl: respond(200, '[]') });
  await assert.rejects(() => client.getJson('/v1/marketstatus/upcoming'), { message: 'DATA_API_KEY is not configured' });
});

test('getJson rejects a non-JSON body', async (t) => {
  quiet(t);
  const client = createDataApiClient({
    apiKey: 'test-secret',
    baseUrl: 'https://api.example.test',
    fetchImpl: respond(200, '<html>'),
  });
  await assert.rejects(() => client.getJson('/v1/x'), DataApiError);
});
