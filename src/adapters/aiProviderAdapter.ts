import { generateText, type CoreMessage } from 'ai';
import { createOpenAI, type OpenAIProvider } from '@ai-sdk/openai';
import { z } from 'zod';
import type {
  AdapterEndpoint,
  AdapterGenerateParams,
  ChatMessage,
  NormalizedResponse,
  ProviderAdapter,
} from '../core/types';
import { normalizeAdapterError } from './errors';

const clients = new Map<string, OpenAIProvider>();

// OpenRouter-style accounting: `usage.cost` in USD on the completion body
const reportedCostSchema = z.object({
  usage: z.object({ cost: z.number().nonnegative() }),
});

export function reportedCost(body: unknown): number | undefined {
  const parsed = reportedCostSchema.safeParse(body);
  return parsed.success ? parsed.data.usage.cost : undefined;
}

function clientFor(endpoint: AdapterEndpoint): OpenAIProvider {
  const key = `${endpoint.provider}|${endpoint.baseUrl}`;
  const existing = clients.get(key);
  if (existing) return existing;

  const client = createOpenAI({
    name: endpoint.provider,
    baseURL: endpoint.baseUrl,
    apiKey: endpoint.apiKey ?? 'not-needed',
    headers: endpoint.headers,
    compatibility: 'compatible',
  });
  clients.set(key, client);
  return client;
}

function finiteOrUndefined(value: number | undefined): number | undefined {
  return value !== undefined && Number.isFinite(value) ? value : undefined;
}

/**
 * OpenAI-compatible chat call. Retries are owned by the dispatchers, so the
 * SDK's own retry loop is disabled.
 */
export const aiProviderAdapter: ProviderAdapter = {
  async generate({
    endpoint,
    model,
    messages,
    maxTokens,
    temperature,
    timeoutMs,
  }: AdapterGenerateParams): Promise<NormalizedResponse> {
    try {
      const result = await generateText({
        model: clientFor(endpoint).chat(model),
        messages: messages.map(toCoreMessage),
        maxTokens,
        temperature,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(timeoutMs),
      });

      return {
        id: result.response.id,
        model: result.response.modelId,
        text: result.text,
        usage: {
          inputTokens: finiteOrUndefined(result.usage?.promptTokens),
          outputTokens: finiteOrUndefined(result.usage?.completionTokens),
        },
        costUsd: reportedCost(result.response.body),
      };
    } catch (error) {
      throw normalizeAdapterError(error);
    }
  },
};

function toCoreMessage(message: ChatMessage): CoreMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      // tool output without a call id cannot be replayed as a tool message
      return { role: 'user', content: message.content };
  }
}
