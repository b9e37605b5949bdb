import { expect, test, vi } from 'vitest';
import { BudgetManager } from '../../src/core/budgetManager';
import { BudgetStoreMemory } from '../../src/core/budgetStore';
import type { RouterConfig } from '../../src/core/config';
import { ProviderError } from '../../src/core/errors';
import { decideRoute } from '../../src/core/routing';
import type { ChatRequest, RequestMetadata } from '../../src/core/types';
import { AdapterError } from '../../src/adapters/errors';
import { backoffMs } from '../../src/providers/aggregator';
import { PLACEHOLDER_TEXT } from '../../src/providers/placeholder';
import { buildDispatchers, dispatcherFor, type DispatcherDeps } from '../../src/providers';
import { InMemoryMetrics } from '../../src/util/metrics';
import { MockAdapter, fail, reply } from '../mocks/mockAdapter';
import { createFakeFetch, json, type FakeFetch } from '../mocks/fakeFetch';
import { chatRequest, contextInfo, makeConfig } from '../fixtures/config';

function setup(options: { config?: RouterConfig; fetch?: FakeFetch; env?: DispatcherDeps['env'] } = {}) {
  const config = options.config ?? makeConfig();
  const budget = new BudgetManager(config, { store: new BudgetStoreMemory() });
  const adapter = new MockAdapter();
  const sleep = vi.fn(async (_ms: number) => {});
  const metrics = new InMemoryMetrics();
  const deps: DispatcherDeps = {
    adapter,
    fetch: options.fetch ?? createFakeFetch({}),
    sleep,
    env: options.env ?? { OPENROUTER_API_KEY: 'test-secret' },
    metrics,
    now: () => 1_700_000_000_000,
  };
  const dispatchers = buildDispatchers(config, deps);

  function dispatch(request: ChatRequest) {
    const decision = decideRoute(request, config, budget);
    const reservation = budget.admit(decision.provider, decision.model, 100, 512);
    if (!reservation) throw new Error('test setup: reservation rejected');
    const pending = dispatcherFor(dispatchers, decision.provider).dispatch({
      request,
      messages: request.messages,
      decision,
      reservation,
      contextInfo: contextInfo(100),
    });
    return { pending, reservation, decision };
  }

  return { config, budget, adapter, sleep, metrics, dispatchers, dispatch };
}

const codeRequest = (metadata: RequestMetadata = {}) =>
  chatRequest('please refactor', { intent: 'code', ...metadata });

test('backoff doubles per attempt and caps at five seconds', () => {
  expect([0, 1, 2, 3, 4].map(backoffMs)).toEqual([1000, 2000, 4000, 5000, 5000]);
});

test('aggregator retries 5xx with backoff and settles once', async () => {
  const { adapter, sleep, budget, metrics, dispatch } = setup();
  const recordSpend = vi.spyOn(budget, 'recordSpend');
  const unavailable = () => new AdapterError('TRANSIENT', 'upstream 503', { status: 503 });
  adapter.queue('openrouter', fail(unavailable()));
  adapter.queue('openrouter', fail(unavailable()));
  adapter.queue(
    'openrouter',
    reply('done', { id: 'up-1', model: 'deep-model-2026', usage: { inputTokens: 120, outputTokens: 30 } })
  );

  const { pending, reservation } = dispatch(codeRequest());
  const response = await pending;

  expect(response).toMatchObject({
    id: 'up-1',
    model: 'deep-model-2026',
    text: 'done',
    usage: { promptTokens: 120, completionTokens: 30 },
  });
  expect(response.costUsd).toBeCloseTo(0.3);
  expect(adapter.getCalls()).toEqual(['openrouter', 'openrouter', 'openrouter']);
  expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  expect(recordSpend).toHaveBeenCalledTimes(1);
  expect(recordSpend).toHaveBeenCalledWith('openrouter', 'deep-model', 120, 30);
  expect(reservation.isOpen).toBe(false);
  expect(metrics.counterValue('upstream_attempts_total', { provider: 'openrouter', outcome: 'transient' })).toBe(2);
  expect(metrics.counterValue('upstream_attempts_total', { provider: 'openrouter', outcome: 'success' })).toBe(1);
});

test('aggregator passes credentials, model and limits to the adapter', async () => {
  const { adapter, dispatch } = setup();
  adapter.queue('openrouter', reply('ok'));

  const request = { ...codeRequest(), maxTokens: 64 };
  const response = await dispatch(request).pending;

  const [params] = adapter.getRequests();
  expect(params.endpoint).toEqual({
    provider: 'openrouter',
    baseUrl: 'https://aggregator.test/api/v1',
    apiKey: 'test-secret',
    headers: {},
  });
  expect(params.model).toBe('deep-model');
  expect(params.maxTokens).toBe(64);
  expect(params.timeoutMs).toBe(60_000);
  expect(response.id).toBe('chatcmpl-req_test');
  expect(response.model).toBe('deep-model');
  expect(response.usage).toEqual({ promptTokens: 100, completionTokens: 0 });
});

test('client errors are terminal and leave the reservation to the caller', async () => {
  const { adapter, sleep, budget, dispatch } = setup();
  const recordSpend = vi.spyOn(budget, 'recordSpend');
  adapter.queue('openrouter', fail(new AdapterError('PERMANENT', 'bad request', { status: 400 })));

  const { pending, reservation } = dispatch(codeRequest());
  await expect(pending).rejects.toMatchObject({ type: 'PERMANENT', status: 400 });

  expect(adapter.getCalls()).toEqual(['openrouter']);
  expect(sleep).not.toHaveBeenCalled();
  expect(recordSpend).not.toHaveBeenCalled();
  expect(reservation.isOpen).toBe(true);
});

test('retries stop after three attempts', async () => {
  const { adapter, sleep, dispatch } = setup();
  for (let i = 0; i < 3; i += 1) {
    adapter.queue('openrouter', fail(new AdapterError('RATE_LIMIT', 'slow down', { status: 429 })));
  }

  await expect(dispatch(codeRequest()).pending).rejects.toThrow('slow down');
  expect(adapter.getCalls()).toHaveLength(3);
  expect(sleep.mock.calls).toEqual([[1000], [2000]]);
});

test('missing API key fails before any upstream call', async () => {
  const { adapter, dispatch } = setup({ env: {} });

  const { pending } = dispatch(codeRequest());
  await expect(pending).rejects.toThrow(ProviderError);
  await expect(pending).rejects.toThrow('OPENROUTER_API_KEY is not set in the environment');
  expect(adapter.getCalls()).toEqual([]);
});

test('local dispatcher discovers the loaded LM Studio model at zero cost', async () => {
  const fetch = createFakeFetch({
    'http://local.test:1234/api/v0/models': json({
      data: [
        { id: 'idle-model', state: 'not-loaded' },
        { id: 'qwen-7b', state: 'loaded' },
      ],
    }),
  });
  const { adapter, budget, dispatch } = setup({ fetch });
  adapter.queue('local', reply('hi', { usage: { inputTokens: 10, outputTokens: 5 } }));

  const response = await dispatch(chatRequest('hello')).pending;

  const [params] = adapter.getRequests();
  expect(params.model).toBe('qwen-7b');
  expect(params.endpoint.baseUrl).toBe('http://local.test:1234/v1');
  expect(params.timeoutMs).toBe(120_000);
  expect(response.model).toBe('qwen-7b');
  expect(response.costUsd).toBe(0);
  expect(budget.snapshot().local).toMatchObject({ dailyCostEstimate: 0, callsToday: 1 });
});

test('local dispatcher reads running Ollama models', async () => {
  const config = makeConfig((input) => {
    input.providers.local.discovery = 'ollama';
  });
  const fetch = createFakeFetch({
    'http://local.test:1234/api/ps': json({ models: [{ name: 'llama3:8b' }] }),
  });
  const { adapter, dispatch } = setup({ config, fetch });
  adapter.queue('local', reply('hi'));

  await dispatch(chatRequest('hello')).pending;
  expect(adapter.getRequests()[0].model).toBe('llama3:8b');
});

test('local dispatcher fails clearly when no model is loaded', async () => {
  const fetch = createFakeFetch({
    'http://local.test:1234/api/v0/models': json({ data: [{ id: 'idle', state: 'not-loaded' }] }),
  });
  const { adapter, dispatch } = setup({ fetch });

  await expect(dispatch(chatRequest('hello')).pending).rejects.toThrow('local: no model loaded');
  expect(adapter.getCalls()).toEqual([]);
});

test('forced local model skips discovery', async () => {
  const fetch = createFakeFetch({});
  const { adapter, dispatch } = setup({ fetch });
  adapter.queue('local', reply('hi'));

  await dispatch(chatRequest('hello', { model: 'mistral-7b' })).pending;
  expect(fetch.calls).toEqual([]);
  expect(adapter.getRequests()[0].model).toBe('mistral-7b');
});

test('local failures are not retried', async () => {
  const { adapter, sleep, dispatch } = setup();
  adapter.queue('local', fail(new TypeError('fetch failed')));

  await expect(
    dispatch(chatRequest('hello', { model: 'mistral-7b' })).pending
  ).rejects.toMatchObject({ type: 'TRANSIENT', message: 'Cannot connect to upstream' });
  expect(adapter.getCalls()).toEqual(['local']);
  expect(sleep).not.toHaveBeenCalled();
});

test('placeholder providers return the stub reply and record spend', async () => {
  const { adapter, budget, dispatch } = setup();

  const response = await dispatch(chatRequest('hello', { intent: 'verify' })).pending;

  expect(response).toEqual({
    id: 'chatcmpl-local-1700000000',
    model: 'stub-fast',
    text: PLACEHOLDER_TEXT,
    usage: { promptTokens: 100, completionTokens: 0 },
    costUsd: 0.1,
  });
  expect(adapter.getCalls()).toEqual([]);
  expect(budget.snapshot().stub.callsToday).toBe(1);
});

test('dispatcher table follows provider kinds', () => {
  const { dispatchers } = setup();
  expect([...dispatchers.entries()].map(([name, d]) => [name, d.kind])).toEqual([
    ['openrouter', 'aggregator'],
    ['local', 'local'],
    ['stub', 'placeholder'],
  ]);
  expect(() => dispatcherFor(dispatchers, 'missing')).toThrow(ProviderError);
});
