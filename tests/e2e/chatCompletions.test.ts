import { expect, test } from 'vitest';
import type { TelemetrySink } from '../../src/telemetry/types';
import { fail, reply } from '../mocks/mockAdapter';
import { createHarness } from '../fixtures/harness';
import { makeConfig } from '../fixtures/config';

test('returns an OpenAI-shaped completion and records the call', async () => {
  const { adapter, post, sink, telemetry, logs, metrics } = createHarness();
  adapter.queue(
    'openrouter',
    reply('Refactored.', { id: 'gen-1', model: 'deep-model', usage: { inputTokens: 10, outputTokens: 5 } })
  );

  const res = await post({ model: 'auto', messages: [{ role: 'user', content: 'Please refactor this' }] });

  expect(res.status).toBe(200);
  expect(await res.json()).toEqual({
    id: 'gen-1',
    object: 'chat.completion',
    created: expect.any(Number),
    model: 'deep-model',
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content: 'Refactored.' },
        finish_reason: 'stop',
      },
    ],
    usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
  });

  await telemetry.flush();
  expect(sink.records).toHaveLength(1);
  expect(sink.records[0]).toMatchObject({
    provider: 'openrouter',
    modelName: 'deep-model',
    actualModel: 'deep-model',
    agentName: 'router',
    tokensIn: 10,
    tokensOut: 5,
  });
  expect(sink.records[0].costUsd).toBeCloseTo(0.03);

  const [line] = logs.tail('requests', 1);
  expect(JSON.parse(line)).toMatchObject({
    provider: 'openrouter',
    model: 'deep-model',
    actual_model: 'deep-model',
    intent: 'code',
    priority: 'normal',
    forced_route: false,
    estimated_tokens_in: 5,
    reason: 'intent=code, priority=normal, tier=deep',
    execution_mode: 'remote',
    execution_host: 'https://aggregator.test',
  });
  expect(metrics.counterValue('router_requests_total', { status: '200' })).toBe(1);
});

test('forced route and model reach the upstream call', async () => {
  const { adapter, post } = createHarness();
  adapter.queue('openrouter', reply('ok'));

  const res = await post({
    messages: [{ role: 'user', content: 'hello' }],
    metadata: { route: 'openrouter', model: 'custom/model' },
  });

  expect(res.status).toBe(200);
  expect(adapter.getRequests()[0].model).toBe('custom/model');
});

test('content parts are flattened and images route to vision', async () => {
  const { adapter, post } = createHarness();
  adapter.queue('openrouter', reply('a cat'));

  const res = await post({
    messages: [
      {
        role: 'user',
        content: [
          { type: 'text', text: 'What is' },
          { type: 'image_url', image_url: { url: 'data:image/png;base64,AAAA' } },
          { type: 'text', text: 'shown here?' },
        ],
      },
    ],
  });

  expect(res.status).toBe(200);
  const [params] = adapter.getRequests();
  expect(params.model).toBe('vision-model');
  expect(params.messages).toEqual([{ role: 'user', content: 'What is shown here?', hasImage: true }]);
});

test('rejects malformed requests', async () => {
  const { post, get, adapter } = createHarness();

  const badJson = await post('{not json');
  expect(badJson.status).toBe(400);
  expect(await badJson.json()).toEqual({ error: { code: 'invalid_json', message: 'Invalid JSON' } });

  for (const body of [{ messages: [] }, { messages: 'hello' }, { model: 'auto' }]) {
    const res = await post(body);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: 'invalid_request', message: 'messages must be a non-empty array' },
    });
  }

  expect((await get('/v1/chat/completions')).status).toBe(404);
  expect(adapter.getCalls()).toEqual([]);
});

test('no viable route answers 503 without calling upstream', async () => {
  const config = makeConfig((input) => {
    input.providers.local.enabled = false;
    input.providers.openrouter.enabled = false;
  });
  const { post, adapter, metrics } = createHarness({ config });

  const res = await post({ messages: [{ role: 'user', content: 'hello' }] });

  expect(res.status).toBe(503);
  expect(await res.json()).toEqual({
    error: { code: 'no_viable_route', message: 'No viable route for request' },
  });
  expect(adapter.getCalls()).toEqual([]);
  expect(metrics.counterValue('router_requests_total', { status: '503' })).toBe(1);
});

test('internal failures return a generic 500 and free the reserved budget', async () => {
  const { post, adapter, budget, logs } = createHarness();
  adapter.queue('openrouter', fail(new Error('secret upstream detail 42')));

  const res = await post(
    { messages: [{ role: 'user', content: 'Please refactor this' }] },
    { 'x-router-request-id': 'req_fixed' }
  );

  expect(res.status).toBe(500);
  expect(await res.text()).toBe(
    JSON.stringify({ error: { code: 'router_error', message: 'Internal router error' } })
  );
  expect(budget.snapshot().openrouter.dailyCostEstimate).toBe(0);
  expect(budget.canSpend('openrouter', 'fast-model', 4000, 0)).toBe(true);

  const lines = logs.tail('errors', 10).map((line) => JSON.parse(line));
  expect(lines).toHaveLength(2);
  expect(lines[0]).toMatchObject({ requestId: 'req_fixed', provider: 'openrouter', type: 'PERMANENT' });
  expect(lines[1]).toMatchObject({
    requestId: 'req_fixed',
    error: 'secret upstream detail 42',
    name: 'AdapterError',
  });
});

test('telemetry failures do not change the response', async () => {
  const broken: TelemetrySink = {
    name: 'broken',
    write: async () => {
      throw new Error('monitor offline');
    },
  };
  const { post, adapter, telemetry } = createHarness({ sinks: [broken] });
  adapter.queue('openrouter', reply('still fine'));

  const res = await post({ messages: [{ role: 'user', content: 'Please refactor this' }] });
  await telemetry.flush();

  expect(res.status).toBe(200);
  expect(await res.json()).toMatchObject({
    choices: [{ message: { role: 'assistant', content: 'still fine' } }],
  });
});

test('telemetry prefers the cost reported by the upstream', async () => {
  const { adapter, post, sink, telemetry } = createHarness();
  adapter.queue(
    'openrouter',
    reply('ok', { usage: { inputTokens: 10, outputTokens: 5 }, costUsd: 0.0042 })
  );

  await post({ messages: [{ role: 'user', content: 'Please refactor this' }] });
  await telemetry.flush();

  expect(sink.records[0].costUsd).toBe(0.0042);
});
