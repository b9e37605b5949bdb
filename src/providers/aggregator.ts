import type { ProviderConfig } from '../core/config';
import { ProviderError } from '../core/errors';
import type { UpstreamResponse } from '../core/types';
import { AdapterError, normalizeAdapterError } from '../adapters/errors';
import { errorMessage, logError, logInfo } from '../util/logger';
import { usageFrom, type DispatchParams, type DispatcherDeps, type ProviderDispatcher } from './types';

export const MAX_ATTEMPTS = 3;
const DEFAULT_TIMEOUT_MS = 60_000;

export function backoffMs(attempt: number): number {
  return Math.min(2 ** attempt, 5) * 1000;
}

/**
 * Remote paid provider speaking the OpenAI chat protocol. Rate limits and 5xx
 * are retried with capped exponential backoff; other failures are terminal.
 */
export class AggregatorDispatcher implements ProviderDispatcher {
  readonly kind = 'aggregator';

  constructor(
    readonly name: string,
    private readonly provider: ProviderConfig,
    private readonly deps: DispatcherDeps
  ) {}

  async dispatch({
    request,
    messages,
    decision,
    reservation,
    contextInfo,
  }: DispatchParams): Promise<UpstreamResponse> {
    const apiKeyEnv = this.provider.apiKeyEnv;
    const apiKey = apiKeyEnv ? this.deps.env[apiKeyEnv] : undefined;
    if (apiKeyEnv && !apiKey) {
      throw new ProviderError(this.name, `${apiKeyEnv} is not set in the environment`);
    }

    let lastError: AdapterError | undefined;
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt += 1) {
      try {
        logInfo('provider_call', {
          requestId: request.requestId,
          provider: this.name,
          model: decision.model,
          attempt: attempt + 1,
        });
        const result = await this.deps.adapter.generate({
          endpoint: {
            provider: this.name,
            baseUrl: this.provider.baseUrl ?? '',
            apiKey,
            headers: this.provider.headers,
          },
          model: decision.model,
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
          model: result.model ?? decision.model,
          text: result.text,
          usage,
          costUsd,
          reportedCostUsd: result.costUsd,
        };
      } catch (error) {
        lastError = normalizeAdapterError(error);
        this.deps.metrics?.incCounter('upstream_attempts_total', {
          provider: this.name,
          outcome: lastError.type.toLowerCase(),
        });
        logError('provider_attempt_failed', {
          requestId: request.requestId,
          provider: this.name,
          attempt: attempt + 1,
          type: lastError.type,
          status: lastError.status,
          error: errorMessage(error),
        });
        this.deps.logs?.append('errors', {
          requestId: request.requestId,
          provider: this.name,
          model: decision.model,
          attempt: attempt + 1,
          type: lastError.type,
          status: lastError.status,
          error: lastError.message.slice(0, 2000),
        });

        if (!lastError.retryable || attempt === MAX_ATTEMPTS - 1) break;
        await this.deps.sleep(backoffMs(attempt));
      }
    }

    throw lastError ?? new ProviderError(this.name, 'Unknown upstream error');
  }
}
