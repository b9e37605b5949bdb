import type { FetchLike } from '../core/types';
import { toWire, type TelemetryRecord, type TelemetrySink } from './types';

export class HttpTelemetrySink implements TelemetrySink {
  readonly name = 'http';

  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
    private readonly fetchFn: FetchLike
  ) {}

  async write(record: TelemetryRecord): Promise<void> {
    const response = await this.fetchFn(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(toWire(record)),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Telemetry endpoint returned HTTP ${response.status}`);
    }
  }
}
