import type { ProviderConfig } from './config';

export type ExecutionMode = 'local' | 'remote' | 'stub';

export type ExecutionRecord = {
  target: string;
  host: string;
  mode: ExecutionMode;
  timestamp: string;
  timestampUnix: number;
};

export function executionMode(provider: ProviderConfig | undefined): ExecutionMode {
  if (provider?.kind === 'local') return 'local';
  if (provider?.kind === 'aggregator') return 'remote';
  return 'stub';
}

export function executionHost(provider: ProviderConfig | undefined): string {
  if (!provider?.baseUrl) return '';
  try {
    return new URL(provider.baseUrl).origin;
  } catch {
    return provider.baseUrl;
  }
}

/** Remembers where the most recent dispatched call ran, for the health endpoint. */
export class ExecutionTracker {
  private last: ExecutionRecord | null = null;

  constructor(private readonly now: () => number = () => Date.now()) {}

  record(target: string, provider: ProviderConfig | undefined): ExecutionRecord {
    const ts = this.now();
    this.last = {
      target,
      host: executionHost(provider),
      mode: executionMode(provider),
      timestamp: new Date(ts).toISOString(),
      timestampUnix: ts / 1000,
    };
    return this.last;
  }

  get lastExecution(): ExecutionRecord | null {
    return this.last;
  }
}
