import { createHash } from 'node:crypto';
import { z } from 'zod';
import { handleChatCompletion, type RouterDeps } from '../core/router';
import { BudgetExceededError, NoViableRouteError } from '../core/errors';
import type { ExecutionTracker } from '../core/execution';
import {
  isIntent,
  isPriority,
  type ChatCompletionResult,
  type ChatMessage,
  type ChatRequest,
  type FetchLike,
  type MessageRole,
  type RequestMetadata,
} from '../core/types';
import { probeBackend, type BackendStatus } from '../adapters/localBackends';
import { errorMessage, logError } from '../util/logger';
import { isLogType } from '../util/routerLogs';

type HandlerParams = {
  routerDeps: RouterDeps;
  execution: ExecutionTracker;
  fetch: FetchLike;
  startedAt?: number;
};

const contentPartSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

const messageSchema = z.object({
  role: z.string().optional(),
  content: z.union([z.string(), z.array(contentPartSchema), z.null()]).optional(),
});

const chatBodySchema = z.object({
  model: z.string().default('auto'),
  messages: z.array(messageSchema),
  max_tokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  metadata: z
    .object({
      intent: z.string().optional(),
      priority: z.string().optional(),
      route: z.string().optional(),
      model: z.string().optional(),
    })
    .nullish(),
});

const DEFAULT_LOG_LIMIT = 50;
const MAX_LOG_LIMIT = 200;

export function createHandler({ routerDeps, execution, fetch, startedAt = Date.now() }: HandlerParams) {
  return async (req: Request): Promise<Response> => {
    const url = new URL(req.url);

    if (req.method === 'GET' && url.pathname === '/metrics') {
      return new Response(routerDeps.metrics?.render() ?? '', {
        status: 200,
        headers: { 'Content-Type': 'text/plain; version=0.0.4' },
      });
    }

    if (req.method === 'GET' && (url.pathname === '/health' || url.pathname === '/ui/health')) {
      return jsonResponse(await healthPayload(routerDeps, execution, fetch, startedAt));
    }

    if (req.method === 'GET' && url.pathname === '/ui/logs') {
      return logsResponse(routerDeps, url);
    }

    if (req.method !== 'POST' || url.pathname !== '/v1/chat/completions') {
      return new Response('Not Found', { status: 404 });
    }

    let raw: unknown;
    try {
      raw = await req.json();
    } catch (error) {
      return jsonResponse({ error: { code: 'invalid_json', message: 'Invalid JSON' } }, 400);
    }

    const parsed = chatBodySchema.safeParse(raw);
    const messages = parsed.success ? normalizeMessages(parsed.data.messages) : [];
    if (!parsed.success || messages.length === 0) {
      return jsonResponse(
        { error: { code: 'invalid_request', message: 'messages must be a non-empty array' } },
        400
      );
    }

    const body = parsed.data;
    const requestId =
      req.headers.get('x-router-request-id') ??
      createRequestId(messages.map((m) => m.content).join('\n'));

    const request: ChatRequest = {
      requestId,
      model: body.model,
      messages,
      maxTokens: body.max_tokens,
      temperature: body.temperature,
      metadata: normalizeMetadata(body.metadata),
    };

    try {
      const result = await handleChatCompletion(request, routerDeps);
      routerDeps.metrics?.incCounter('router_requests_total', { status: '200' });
      const payload = formatChatCompletion(result);
      if (req.headers.get('x-router-debug')?.toLowerCase() === 'true') {
        return jsonResponse({
          ...payload,
          router: { decision: result.decision, context: result.contextInfo },
        });
      }
      return jsonResponse(payload);
    } catch (error) {
      if (error instanceof BudgetExceededError) {
        routerDeps.metrics?.incCounter('router_requests_total', { status: '429' });
        return jsonResponse(
          { error: { code: 'budget_exceeded', message: 'Budget exceeded for all providers' } },
          429
        );
      }

      if (error instanceof NoViableRouteError) {
        routerDeps.metrics?.incCounter('router_requests_total', { status: '503' });
        routerDeps.logs?.append('errors', { requestId, error: error.message });
        return jsonResponse(
          { error: { code: 'no_viable_route', message: 'No viable route for request' } },
          503
        );
      }

      logError('router_failure', {
        requestId,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      routerDeps.logs?.append('errors', {
        requestId,
        error: errorMessage(error),
        name: error instanceof Error ? error.name : typeof error,
      });
      routerDeps.metrics?.incCounter('router_requests_total', { status: '500' });
      return jsonResponse(
        { error: { code: 'router_error', message: 'Internal router error' } },
        500
      );
    }
  };
}

async function healthPayload(
  deps: RouterDeps,
  execution: ExecutionTracker,
  fetch: FetchLike,
  startedAt: number
) {
  const localProviders = Object.entries(deps.config.providers).filter(
    ([, provider]) => provider.kind === 'local'
  );
  const probes = await Promise.all(
    localProviders.map(
      async ([name, provider]): Promise<[string, BackendStatus]> => [
        name,
        await probeBackend(provider, fetch),
      ]
    )
  );

  return {
    status: 'ok',
    uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
    providers: deps.budget.snapshot(),
    backends: Object.fromEntries(probes),
    last_execution: execution.lastExecution,
  };
}

function logsResponse(deps: RouterDeps, url: URL): Response {
  const type = url.searchParams.get('type') ?? 'requests';
  const limitParam = url.searchParams.get('limit');
  const limit = limitParam === null ? DEFAULT_LOG_LIMIT : Number(limitParam);

  if (!isLogType(type)) {
    return jsonResponse(
      { error: { code: 'invalid_request', message: 'type must be requests, errors or context' } },
      400
    );
  }
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LOG_LIMIT) {
    return jsonResponse(
      { error: { code: 'invalid_request', message: `limit must be between 1 and ${MAX_LOG_LIMIT}` } },
      400
    );
  }

  return jsonResponse({ type, lines: deps.logs?.tail(type, limit) ?? [] });
}

function normalizeMessages(raw: z.infer<typeof messageSchema>[]): ChatMessage[] {
  return raw
    .map((message): ChatMessage => {
      const role = normalizeRole(message.role);
      if (Array.isArray(message.content)) {
        const text = message.content
          .filter((part) => part.type === 'text' && part.text)
          .map((part) => part.text)
          .join(' ');
        const hasImage = message.content.some(
          (part) => part.type === 'image_url' || part.type === 'image'
        );
        return hasImage ? { role, content: text, hasImage } : { role, content: text };
      }
      return { role, content: message.content ?? '' };
    })
    .filter((message) => message.content.length > 0 || message.hasImage === true);
}

function normalizeRole(role: string | undefined): MessageRole {
  if (role === 'system' || role === 'assistant' || role === 'tool') return role;
  return 'user';
}

function normalizeMetadata(
  metadata: z.infer<typeof chatBodySchema>['metadata']
): RequestMetadata | undefined {
  if (!metadata) return undefined;
  return {
    intent: isIntent(metadata.intent) ? metadata.intent : undefined,
    priority: isPriority(metadata.priority) ? metadata.priority : undefined,
    route: metadata.route || undefined,
    model: metadata.model || undefined,
  };
}

function createRequestId(seed: string): string {
  const hash = createHash('sha256').update(seed + Date.now().toString()).digest('hex');
  return `req_${hash.slice(0, 12)}`;
}

function formatChatCompletion({ response }: ChatCompletionResult) {
  const created = Math.floor(Date.now() / 1000);
  const { promptTokens, completionTokens } = response.usage;
  return {
    id: response.id,
    object: 'chat.completion',
    created,
    model: response.model,
    choices: [
      {
        index: 0,
        message: {
          role: 'assistant',
          content: response.text,
        },
        finish_reason: 'stop',
      },
    ],
    usage: {
      prompt_tokens: promptTokens,
      completion_tokens: completionTokens,
      total_tokens: promptTokens + completionTokens,
    },
  };
}

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
