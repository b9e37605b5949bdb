import type { ProviderConfig } from '../core/config';
import { ProviderError } from '../core/errors';
import type { UpstreamResponse } from '../core/types';
import { chatBaseUrl, discoverLoadedModel } from '../adapters/localBackends';
import { normalizeAdapterError } from '../adapters/errors';
import { errorMessage, logError, logInfo } from '../util/logger';
import { usageFrom, type DispatchParams, type DispatcherDeps, type ProviderDispatcher } from './types';

const DEFAULT_TIMEOUT_MS = 120_000;
const SYMBOLIC_MODELS = new Set(['auto', 'local']);

/**
 * Self-hosted OpenAI-compatible backend (LM Studio, Ollama). One attempt, long
 * timeout; spend is settled at zero cost.
 */
export class LocalDispatcher implements ProviderDispatcher {
  readonly kind = 'local';

  constructor(
    readonly name: string,
    private readonly provider: ProviderConfig,
    private readonly deps: DispatcherDeps
  ) {}

  async resolveModel(requested: string, explicit: boolean): Promise<string> {
    if (explicit) return requested;
    if (!SYMBOLIC_MODELS.has(requested) && requested !== this.name) return requested;

    const loaded = await discoverLoadedModel(this.name, this.provider, this.deps.fetch);
    if (!loaded) {
      throw new ProviderError(this.name, `${this.name}: no model loaded`);
    }
    return loaded;
  }

  async dispatch({
    request,
    messages,
    decision,
    reservation,
    contextInfo,
  }: DispatchParams): Promise<UpstreamResponse> {
    const model = await this.resolveModel(decision.model, decision.forcedModel !== undefined);
    logInfo('provider_call', {
      requestId: request.requestId,
      provider: this.name,
      model,
      attempt: 1,
    });

    try {
      const result = await this.deps.adapter.generate({
        endpoint: {
          provider: this.name,
          baseUrl: chatBaseUrl(this.provider),
          headers: this.provider.headers,
        },
        model,
        messages,
        maxTokens: request.maxTokens,
        temperature: request.temperature,
        timeoutMs: this.provider.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      });
      this.deps.metrics?.incCounter('upstream_attempts_total', {
        provider: this.name,
        outcome: 'success',
      });

      const usage = usageFrom(result, contextInfo);
      const costUsd = reservation.settle(usage.promptTokens, usage.completionTokens);
      return {
        id: result.id ?? `chatcmpl-${request.requestId}`,
        model: result.model ?? model,
        text: result.text,
        usage,
        costUsd,
        reportedCostUsd: result.costUsd,
      };
    } catch (error) {
      const normalized = normalizeAdapterError(error);
      this.deps.metrics?.incCounter('upstream_attempts_total', {
        provider: this.name,
        outcome: normalized.type.toLowerCase(),
      });
      logError('provider_attempt_failed', {
        requestId: request.requestId,
        provider: this.name,
        model,
        type: normalized.type,
        error: errorMessage(error),
      });
      this.deps.logs?.append('errors', {
        requestId: request.requestId,
        provider: this.name,
        model,
        type: normalized.type,
        status: normalized.status,
        error: normalized.message.slice(0, 2000),
      });
      throw normalized;
    }
  }
}
