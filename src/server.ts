import { serve } from '@hono/node-server';
import { loadConfig } from './core/config';
import { BudgetStoreSqlite } from './core/budgetStore';
import { BudgetManager } from './core/budgetManager';
import { FilePinnedContext } from './core/context';
import { ExecutionTracker } from './core/execution';
import type { RouterDeps } from './core/router';
import { aiProviderAdapter } from './adapters/aiProviderAdapter';
import { buildDispatchers } from './providers';
import { HttpTelemetrySink } from './telemetry/httpSink';
import { SqliteTelemetrySink } from './telemetry/sqliteSink';
import { TelemetryEmitter } from './telemetry/emitter';
import type { TelemetrySink } from './telemetry/types';
import { errorMessage, logError, logInfo } from './util/logger';
import { InMemoryMetrics } from './util/metrics';
import { RouterLogs } from './util/routerLogs';
import { sleep } from './util/sleep';
import { createHandler } from './server/handler';

const config = await loadConfig();
const budgetStore = new BudgetStoreSqlite(process.env.STATE_DB_PATH ?? config.state.dbPath);
const budget = new BudgetManager(config, { store: budgetStore });
const metrics = new InMemoryMetrics();
const logs = new RouterLogs({
  requests: config.logging.requestLog,
  errors: config.logging.errorLog,
  context: config.logging.contextLog,
});

const telemetrySinks: TelemetrySink[] = [];
if (config.telemetry.url) {
  telemetrySinks.push(new HttpTelemetrySink(config.telemetry.url, config.telemetry.timeoutMs, fetch));
}
const sqliteSink = new SqliteTelemetrySink(config.telemetry.dbPath);
telemetrySinks.push(sqliteSink);
const telemetry = new TelemetryEmitter(telemetrySinks);

const execution = new ExecutionTracker();

const routerDeps: RouterDeps = {
  config,
  budget,
  dispatchers: buildDispatchers(config, {
    adapter: aiProviderAdapter,
    fetch,
    sleep,
    env: process.env,
    metrics,
    logs,
  }),
  context: { pins: new FilePinnedContext(config.memory.pinsFile) },
  telemetry,
  logs,
  metrics,
  execution,
};

const port = Number(process.env.PORT ?? 8000);
const handler = createHandler({ routerDeps, execution, fetch });

const server = serve({ fetch: handler, port }, (info) => {
  logInfo('router_started', { port: info.port, providers: Object.keys(config.providers) });
});

async function shutdown(signal: string): Promise<void> {
  logInfo('router_stopping', { signal });
  server.close();
  try {
    await telemetry.flush();
  } catch (error) {
    logError('telemetry_flush_failed', { error: errorMessage(error) });
  }
  sqliteSink.close();
  budgetStore.close();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logError('router_shutdown_failed', { error: errorMessage(error) });
      process.exit(1);
    });
  });
}
