import { expect, test } from 'vitest';
import { AdapterError } from '../../src/adapters/errors';
import { fail, reply } from '../mocks/mockAdapter';
import { createHarness } from '../fixtures/harness';

const body = { messages: [{ role: 'user', content: 'Please refactor this' }] };

test('transient upstream failures are retried with backoff', async () => {
  const { post, adapter, sleep, budget } = createHarness();
  adapter.queue('openrouter', fail(new AdapterError('TRANSIENT', 'upstream 503', { status: 503 })));
  adapter.queue('openrouter', fail(new AdapterError('TRANSIENT', 'upstream 503', { status: 503 })));
  adapter.queue('openrouter', reply('third time', { usage: { inputTokens: 5, outputTokens: 20 } }));

  const res = await post(body);

  expect(res.status).toBe(200);
  expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  expect(adapter.getCalls()).toHaveLength(3);
  const snapshot = budget.snapshot().openrouter;
  expect(snapshot.callsToday).toBe(1);
  expect(snapshot.dailyCostEstimate).toBeCloseTo(0.05);
});

test('persistent rate limiting surfaces as a router error', async () => {
  const { post, adapter, sleep, budget } = createHarness();
  for (let i = 0; i < 3; i += 1) {
    adapter.queue('openrouter', fail(new AdapterError('RATE_LIMIT', 'slow down', { status: 429 })));
  }

  const res = await post(body);

  expect(res.status).toBe(500);
  expect(await res.json()).toEqual({ error: { code: 'router_error', message: 'Internal router error' } });
  expect(sleep).toHaveBeenCalledTimes(2);
  expect(budget.snapshot().openrouter.callsToday).toBe(0);
});
