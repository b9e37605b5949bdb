import type { BudgetReservation } from '../core/budgetManager';
import type {
  ChatMessage,
  ChatRequest,
  ContextInfo,
  FetchLike,
  NormalizedResponse,
  ProviderAdapter,
  RouteDecision,
  TokenUsage,
  UpstreamResponse,
} from '../core/types';
import type { Metrics } from '../util/metrics';
import type { RouterLogs } from '../util/routerLogs';

export type ProviderKind = 'aggregator' | 'local' | 'placeholder';

export type DispatchParams = {
  request: ChatRequest;
  messages: readonly ChatMessage[];
  decision: RouteDecision;
  reservation: BudgetReservation;
  contextInfo: ContextInfo;
};

export type ProviderDispatcher = {
  readonly kind: ProviderKind;
  readonly name: string;
  dispatch: (params: DispatchParams) => Promise<UpstreamResponse>;
};

export type DispatcherDeps = {
  adapter: ProviderAdapter;
  fetch: FetchLike;
  sleep: (ms: number) => Promise<void>;
  env: Record<string, string | undefined>;
  metrics?: Metrics;
  logs?: RouterLogs;
  now?: () => number;
};

export function usageFrom(response: NormalizedResponse, contextInfo: ContextInfo): TokenUsage {
  return {
    promptTokens: response.usage?.inputTokens ?? contextInfo.tokensAfter,
    completionTokens: response.usage?.outputTokens ?? 0,
  };
}
