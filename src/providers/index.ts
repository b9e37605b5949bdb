import type { RouterConfig } from '../core/config';
import { ProviderError } from '../core/errors';
import { AggregatorDispatcher } from './aggregator';
import { LocalDispatcher } from './local';
import { PlaceholderDispatcher } from './placeholder';
import type { DispatcherDeps, ProviderDispatcher } from './types';

export type DispatcherTable = ReadonlyMap<string, ProviderDispatcher>;

export function buildDispatchers(config: RouterConfig, deps: DispatcherDeps): DispatcherTable {
  const table = new Map<string, ProviderDispatcher>();
  for (const [name, provider] of Object.entries(config.providers)) {
    switch (provider.kind) {
      case 'aggregator':
        table.set(name, new AggregatorDispatcher(name, provider, deps));
        break;
      case 'local':
        table.set(name, new LocalDispatcher(name, provider, deps));
        break;
      case 'placeholder':
        table.set(name, new PlaceholderDispatcher(name, deps));
        break;
    }
  }
  return table;
}

export function dispatcherFor(table: DispatcherTable, provider: string): ProviderDispatcher {
  const dispatcher = table.get(provider);
  if (!dispatcher) {
    throw new ProviderError(provider, `No dispatcher configured for provider: ${provider}`);
  }
  return dispatcher;
}

export type { ProviderDispatcher, DispatchParams, DispatcherDeps } from './types';
