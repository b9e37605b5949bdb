export const INTENTS = ['chat', 'code', 'reasoning', 'vision', 'verify'] as const;
export const PRIORITIES = ['low', 'normal', 'high'] as const;

export type Intent = (typeof INTENTS)[number];
export type Priority = (typeof PRIORITIES)[number];

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export type ChatMessage = {
  role: MessageRole;
  content: string;
  hasImage?: boolean;
};

export type RequestMetadata = {
  intent?: Intent;
  priority?: Priority;
  route?: string;
  model?: string;
};

export type ChatRequest = {
  readonly requestId: string;
  readonly model: string;
  readonly messages: readonly ChatMessage[];
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly metadata?: Readonly<RequestMetadata>;
};

export type RouteDecision = {
  readonly provider: string;
  readonly model: string;
  readonly tier: string;
  readonly intent: Intent;
  readonly priority: Priority;
  readonly forced: boolean;
  readonly forcedProvider?: string;
  readonly forcedModel?: string;
  readonly reason: string;
};

export type ContextInfo = {
  method: 'keep' | 'summarized';
  priority: Priority;
  tokensBefore: number;
  tokensAfter: number;
  targetInputTokens: number;
  hardMaxInputTokens: number;
  trimmedCount: number;
  pinnedIncluded: boolean;
  summarizerUsed: string | null;
};

export type TokenUsage = {
  promptTokens: number;
  completionTokens: number;
};

export type UpstreamResponse = {
  id: string;
  model: string;
  text: string;
  usage: TokenUsage;
  costUsd?: number;
  reportedCostUsd?: number;
};

export type ChatCompletionResult = {
  response: UpstreamResponse;
  decision: RouteDecision;
  contextInfo: ContextInfo;
  latencyMs: number;
};

export type ProviderBudgetSnapshot = {
  enabled: boolean;
  dailyCostEstimate: number;
  monthlyCostEstimate: number;
  callsToday: number;
  dailyCapUsd: number;
  monthlyCapUsd: number;
};

export type NormalizedResponse = {
  id?: string;
  model?: string;
  text: string;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
  };
  /** Cost the upstream reported for this call, when it reports one. */
  costUsd?: number;
};

export type AdapterEndpoint = {
  provider: string;
  baseUrl: string;
  apiKey?: string;
  headers?: Record<string, string>;
};

export type AdapterGenerateParams = {
  endpoint: AdapterEndpoint;
  model: string;
  messages: readonly ChatMessage[];
  maxTokens?: number;
  temperature?: number;
  timeoutMs: number;
};

export type ProviderAdapter = {
  generate: (params: AdapterGenerateParams) => Promise<NormalizedResponse>;
};

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export function isIntent(value: unknown): value is Intent {
  return INTENTS.some((intent) => intent === value);
}

export function isPriority(value: unknown): value is Priority {
  return PRIORITIES.some((priority) => priority === value);
}
