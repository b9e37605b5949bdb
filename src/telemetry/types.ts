export type TelemetryRecord = {
  provider: string;
  modelName: string;
  actualModel: string;
  agentName: string;
  tokensIn: number;
  tokensOut: number;
  costUsd: number;
  latencyMs: number;
};

/** A sink may throw; the emitter decides what happens next. */
export type TelemetrySink = {
  readonly name: string;
  write: (record: TelemetryRecord) => Promise<void>;
};

export function toWire(record: TelemetryRecord) {
  return {
    provider: record.provider,
    model_name: record.modelName,
    actual_model: record.actualModel,
    agent_name: record.agentName,
    tokens_in: record.tokensIn,
    tokens_out: record.tokensOut,
    cost_usd: record.costUsd,
    latency_ms: record.latencyMs,
  };
}
