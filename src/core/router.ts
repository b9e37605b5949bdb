import type { RouterConfig } from './config';
import type { BudgetManager, BudgetReservation } from './budgetManager';
import { buildContext, type ContextDeps } from './context';
import { BudgetExceededError, NoViableRouteError } from './errors';
import type { ExecutionTracker } from './execution';
import { decideRoute } from './routing';
import type {
  ChatCompletionResult,
  ChatRequest,
  ContextInfo,
  RouteDecision,
  UpstreamResponse,
} from './types';
import { dispatcherFor, type DispatcherTable } from '../providers';
import type { TelemetryEmitter } from '../telemetry/emitter';
import type { Metrics } from '../util/metrics';
import type { RouterLogs } from '../util/routerLogs';
import { errorMessage, logInfo, logWarn } from '../util/logger';

export type RouterDeps = {
  config: RouterConfig;
  budget: BudgetManager;
  dispatchers: DispatcherTable;
  context?: Omit<ContextDeps, 'config' | 'logs'>;
  telemetry?: TelemetryEmitter;
  logs?: RouterLogs;
  metrics?: Metrics;
  execution?: ExecutionTracker;
  now?: () => number;
};

type Admission = {
  decision: RouteDecision;
  reservation: BudgetReservation;
};

/**
 * route -> build context -> admit -> dispatch -> record -> telemetry.
 * A budget rejection re-routes once to a different provider before giving up.
 */
export async function handleChatCompletion(
  request: ChatRequest,
  deps: RouterDeps
): Promise<ChatCompletionResult> {
  const now = deps.now ?? Date.now;
  const { config } = deps;

  const primary = decideRoute(request, config, deps.budget);
  const context = buildContext(request, primary.priority, {
    config,
    ...deps.context,
    logs: deps.logs,
  });
  deps.metrics?.observeHistogram('prompt_tokens_histogram', context.info.tokensAfter, {
    priority: primary.priority,
  });

  const { decision, reservation } = admit(request, primary, context.info, deps);

  const start = now();
  let response: UpstreamResponse;
  try {
    const dispatcher = dispatcherFor(deps.dispatchers, decision.provider);
    response = await dispatcher.dispatch({
      request,
      messages: context.messages,
      decision,
      reservation,
      contextInfo: context.info,
    });
  } finally {
    reservation.release();
  }
  const latencyMs = now() - start;

  const providerConfig = config.providers[decision.provider];
  const execution = deps.execution?.record(decision.provider, providerConfig);
  deps.logs?.append('requests', {
    requestId: request.requestId,
    provider: decision.provider,
    model: decision.model,
    actual_model: response.model,
    tier: decision.tier,
    intent: decision.intent,
    priority: decision.priority,
    forced_route: decision.forced,
    forced_provider: decision.forcedProvider ?? null,
    forced_model: decision.forcedModel ?? null,
    estimated_tokens_in: context.info.tokensAfter,
    reason: decision.reason,
    latency_ms: latencyMs,
    execution_target: decision.provider,
    execution_host: execution?.host ?? '',
    execution_mode: execution?.mode ?? '',
  });

  deps.metrics?.observeHistogram('dispatch_latency_ms_histogram', latencyMs, {
    provider: decision.provider,
  });
  const snapshot = deps.budget.snapshot()[decision.provider];
  if (snapshot) {
    deps.metrics?.setGauge('budget_daily_cost_usd', snapshot.dailyCostEstimate, {
      provider: decision.provider,
    });
  }

  emitTelemetry(request, decision, response, latencyMs, deps);

  logInfo('router_complete', {
    requestId: request.requestId,
    provider: decision.provider,
    model: response.model,
    latencyMs,
    promptTokens: response.usage.promptTokens,
    completionTokens: response.usage.completionTokens,
  });

  return { response, decision, contextInfo: context.info, latencyMs };
}

function admit(
  request: ChatRequest,
  primary: RouteDecision,
  contextInfo: ContextInfo,
  deps: RouterDeps
): Admission {
  const promptTokens = contextInfo.tokensAfter;
  const completionTokens = request.maxTokens ?? deps.config.budget.defaultCompletionTokens;

  const reservation = deps.budget.admit(primary.provider, primary.model, promptTokens, completionTokens);
  if (reservation) return { decision: primary, reservation };

  logInfo('budget_rejected', {
    requestId: request.requestId,
    provider: primary.provider,
    model: primary.model,
  });

  let alternate: RouteDecision;
  try {
    alternate = decideRoute(request, deps.config, deps.budget, {
      excludeProvider: primary.provider,
    });
  } catch (error) {
    if (error instanceof NoViableRouteError) {
      throw new BudgetExceededError([primary.provider]);
    }
    throw error;
  }

  const fallback = deps.budget.admit(alternate.provider, alternate.model, promptTokens, completionTokens);
  if (!fallback) {
    logInfo('budget_rejected', {
      requestId: request.requestId,
      provider: alternate.provider,
      model: alternate.model,
    });
    throw new BudgetExceededError([primary.provider, alternate.provider]);
  }

  logInfo('budget_rerouted', {
    requestId: request.requestId,
    from: primary.provider,
    to: alternate.provider,
  });
  return { decision: alternate, reservation: fallback };
}

function emitTelemetry(
  request: ChatRequest,
  decision: RouteDecision,
  response: UpstreamResponse,
  latencyMs: number,
  deps: RouterDeps
): void {
  if (!deps.telemetry) return;
  try {
    const { promptTokens, completionTokens } = response.usage;
    const local = deps.config.providers[decision.provider]?.kind === 'local';
    deps.telemetry.emit({
      provider: local ? 'local' : decision.provider,
      modelName: decision.model,
      actualModel: response.model,
      agentName: request.metadata?.route ?? deps.config.telemetry.agentName,
      tokensIn: promptTokens,
      tokensOut: completionTokens,
      costUsd:
        response.reportedCostUsd ??
        response.costUsd ??
        deps.budget.estimateCost(decision.provider, response.model, promptTokens, completionTokens),
      latencyMs,
    });
  } catch (error) {
    logWarn('telemetry_emit_failed', { requestId: request.requestId, error: errorMessage(error) });
  }
}
