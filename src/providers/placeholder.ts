import type { UpstreamResponse } from '../core/types';
import { logInfo } from '../util/logger';
import type { DispatchParams, DispatcherDeps, ProviderDispatcher } from './types';

export const PLACEHOLDER_TEXT =
  'This is a stubbed response from the router (no upstream call yet).';

/** Provider that is configured but not integrated yet. Keeps the ledger consistent. */
export class PlaceholderDispatcher implements ProviderDispatcher {
  readonly kind = 'placeholder';

  constructor(
    readonly name: string,
    private readonly deps: Pick<DispatcherDeps, 'now'>
  ) {}

  async dispatch({ request, decision, reservation, contextInfo }: DispatchParams): Promise<UpstreamResponse> {
    logInfo('provider_call_stubbed', {
      requestId: request.requestId,
      provider: this.name,
      model: decision.model,
    });
    const now = Math.floor((this.deps.now?.() ?? Date.now()) / 1000);
    const usage = { promptTokens: contextInfo.tokensAfter, completionTokens: 0 };
    const costUsd = reservation.settle(usage.promptTokens, usage.completionTokens);
    return {
      id: `chatcmpl-local-${now}`,
      model: decision.model,
      text: PLACEHOLDER_TEXT,
      usage,
      costUsd,
    };
  }
}
