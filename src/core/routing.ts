import type { RouterConfig } from './config';
import { detectIntent } from './intent';
import { NoViableRouteError } from './errors';
import {
  isIntent,
  isPriority,
  type ChatRequest,
  type Intent,
  type Priority,
  type RouteDecision,
} from './types';
import { logInfo } from '../util/logger';

export type ProviderGate = {
  providerEnabled: (provider: string) => boolean;
};

export type DecideRouteOptions = {
  /** Provider already chosen and rejected; no candidate of it is returned. */
  excludeProvider?: string;
};

type Candidate = { provider: string; tier: string };

export function resolveIntent(request: ChatRequest, config: RouterConfig): Intent {
  const requested = request.metadata?.intent;
  if (isIntent(requested)) return requested;
  return detectIntent(request.messages, config.routing.intentKeywords);
}

export function resolvePriority(request: ChatRequest, config: RouterConfig): Priority {
  const requested = request.metadata?.priority;
  if (isPriority(requested)) return requested;
  return config.routing.defaultPriority;
}

/**
 * Picks the first viable (provider, tier) candidate of the intent's fallback
 * chain. Pure with respect to its inputs: the gate is only read.
 */
export function decideRoute(
  request: ChatRequest,
  config: RouterConfig,
  gate: ProviderGate,
  options: DecideRouteOptions = {}
): RouteDecision {
  const intent = resolveIntent(request, config);
  const priority = resolvePriority(request, config);

  const { allowRouteOverride, allowModelOverride } = config.routing.overrides;
  const forcedProvider =
    allowRouteOverride && request.metadata?.route ? request.metadata.route : undefined;
  const forcedModel =
    allowModelOverride && request.metadata?.model ? request.metadata.model : undefined;
  const forced = forcedProvider !== undefined || forcedModel !== undefined;

  let chain: Candidate[] = (config.routing.fallbackChain[intent] ?? []).map(
    ([provider, tier]) => ({ provider, tier })
  );
  if (forcedProvider) {
    chain = chain.map(({ tier }) => ({ provider: forcedProvider, tier }));
  }

  if (options.excludeProvider !== undefined) {
    chain = chain.filter((candidate) => candidate.provider !== options.excludeProvider);
  }

  if (chain.length === 0) {
    throw new NoViableRouteError(intent, `No routing chain configured for intent: ${intent}`);
  }

  for (const { provider, tier } of chain) {
    const model = forcedModel ?? defaultModelFor(config, provider, tier);
    if (!model) continue;
    if (!gate.providerEnabled(provider)) continue;

    let reason = `intent=${intent}, priority=${priority}, tier=${tier}`;
    if (forced) reason += ', forced override';

    logInfo('route_decided', { provider, model, tier, intent, priority, forced });

    return Object.freeze({
      provider,
      model,
      tier,
      intent,
      priority,
      forced,
      forcedProvider,
      forcedModel,
      reason,
    });
  }

  throw new NoViableRouteError(intent);
}

function defaultModelFor(config: RouterConfig, provider: string, tier: string): string | undefined {
  const model = config.providers[provider]?.tiers[tier]?.defaultModel;
  return model && model.length > 0 ? model : undefined;
}
