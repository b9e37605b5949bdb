import { errorMessage, logWarn } from '../util/logger';
import type { TelemetryRecord, TelemetrySink } from './types';

/**
 * Delivers each record to the first sink that accepts it. Emission never
 * throws and never delays the caller; `flush` waits for in-flight deliveries.
 */
export class TelemetryEmitter {
  private pending = new Set<Promise<void>>();

  constructor(private readonly sinks: TelemetrySink[]) {}

  emit(record: TelemetryRecord): void {
    const delivery: Promise<void> = this.deliver(record).finally(() => {
      this.pending.delete(delivery);
    });
    this.pending.add(delivery);
  }

  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private async deliver(record: TelemetryRecord): Promise<void> {
    // sinks may block (sqlite); let the caller's response go out first
    await new Promise<void>((resolve) => setImmediate(resolve));
    for (const sink of this.sinks) {
      try {
        await sink.write(record);
        return;
      } catch (error) {
        logWarn('telemetry_sink_failed', { sink: sink.name, error: errorMessage(error) });
      }
    }
    logWarn('telemetry_dropped', { provider: record.provider, model: record.modelName });
  }
}
