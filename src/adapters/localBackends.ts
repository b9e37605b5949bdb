import { z } from 'zod';
import type { ProviderConfig } from '../core/config';
import type { FetchLike } from '../core/types';
import { errorMessage, logWarn } from '../util/logger';

const PROBE_TIMEOUT_MS = 3000;

const lmStudioModelsSchema = z.object({
  data: z.array(z.object({ id: z.string(), state: z.string().optional() })).default([]),
});

const ollamaModelsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

export type BackendStatus =
  | { status: 'up'; models: string[] }
  | { status: 'error'; http_status: number }
  | { status: 'down'; error: string };

export function chatBaseUrl(provider: ProviderConfig): string {
  return `${trimSlash(provider.baseUrl ?? '')}/v1`;
}

/**
 * Returns the model currently loaded in the backend, or undefined when none is
 * loaded or the backend cannot be reached.
 */
export async function discoverLoadedModel(
  name: string,
  provider: ProviderConfig,
  fetchFn: FetchLike
): Promise<string | undefined> {
  const base = trimSlash(provider.baseUrl ?? '');
  const path = provider.discovery === 'ollama' ? '/api/ps' : '/api/v0/models';
  try {
    const response = await fetchFn(`${base}${path}`, {
      signal: AbortSignal.timeout(provider.discoveryTimeoutMs),
    });
    if (!response.ok) {
      logWarn('local_discovery_http_error', { provider: name, status: response.status });
      return undefined;
    }
    const body: unknown = await response.json();
    if (provider.discovery === 'ollama') {
      return ollamaModelsSchema.parse(body).models[0]?.name;
    }
    return lmStudioModelsSchema.parse(body).data.find((m) => m.state === 'loaded')?.id;
  } catch (error) {
    logWarn('local_discovery_failed', { provider: name, error: errorMessage(error) });
    return undefined;
  }
}

export async function probeBackend(
  provider: ProviderConfig,
  fetchFn: FetchLike
): Promise<BackendStatus> {
  const base = trimSlash(provider.baseUrl ?? '');
  const path = provider.discovery === 'ollama' ? '/api/tags' : '/v1/models';
  try {
    const response = await fetchFn(`${base}${path}`, {
      signal: AbortSignal.timeout(PROBE_TIMEOUT_MS),
    });
    if (!response.ok) {
      return { status: 'error', http_status: response.status };
    }
    const body: unknown = await response.json();
    const models =
      provider.discovery === 'ollama'
        ? ollamaModelsSchema.parse(body).models.map((m) => m.name)
        : lmStudioModelsSchema.parse(body).data.map((m) => m.id);
    return { status: 'up', models };
  } catch (error) {
    return { status: 'down', error: errorMessage(error).slice(0, 120) };
  }
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
