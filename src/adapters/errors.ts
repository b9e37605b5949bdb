import { APICallError } from 'ai';

export type AdapterErrorType =
  | 'RATE_LIMIT'
  | 'QUOTA_EXCEEDED'
  | 'TRANSIENT'
  | 'PERMANENT';

export class AdapterError extends Error {
  type: AdapterErrorType;
  status?: number;
  retryAfterMs?: number;

  constructor(
    type: AdapterErrorType,
    message: string,
    options: { status?: number; retryAfterMs?: number } = {}
  ) {
    super(message);
    this.name = 'AdapterError';
    this.type = type;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }

  get retryable(): boolean {
    return this.type === 'RATE_LIMIT' || this.type === 'TRANSIENT';
  }
}

export function adapterErrorForStatus(
  status: number,
  message: string,
  retryAfterMs?: number
): AdapterError {
  if (status === 429) {
    return new AdapterError('RATE_LIMIT', message, { status, retryAfterMs });
  }
  if (status === 402) {
    return new AdapterError('QUOTA_EXCEEDED', message, { status });
  }
  if (status >= 500) {
    return new AdapterError('TRANSIENT', message, { status });
  }
  return new AdapterError('PERMANENT', message, { status });
}

export function normalizeAdapterError(error: unknown): AdapterError {
  if (error instanceof AdapterError) return error;

  if (APICallError.isInstance(error)) {
    const retryAfter = error.responseHeaders?.['retry-after'];
    const retryAfterMs = retryAfter ? Number(retryAfter) * 1000 : undefined;
    if (error.statusCode !== undefined) {
      return adapterErrorForStatus(
        error.statusCode,
        error.message,
        Number.isFinite(retryAfterMs) ? retryAfterMs : undefined
      );
    }
    return new AdapterError(error.isRetryable ? 'TRANSIENT' : 'PERMANENT', error.message);
  }

  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return new AdapterError('TRANSIENT', `Upstream timed out: ${error.message}`);
    }
    if (error instanceof TypeError && error.message === 'fetch failed') {
      return new AdapterError('TRANSIENT', 'Cannot connect to upstream');
    }
    return new AdapterError('PERMANENT', error.message);
  }

  return new AdapterError('PERMANENT', 'Provider error');
}
