import type { TestContext } from 'node:test';

/** Silences console output for one test; the mocks are restored when the test ends. */
export function quiet(t: TestContext): void {
  for (const method of ['log', 'warn', 'error', 'debug'] as const) {
    t.mock.method(console, method, () => {});
  }
}
