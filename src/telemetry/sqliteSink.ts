import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { TelemetryRecord, TelemetrySink } from './types';

/**
 * Direct write into the monitoring service's own store, used when its HTTP API
 * is unreachable. Schema mirrors the service's `routing_calls` and `budget`.
 */
export class SqliteTelemetrySink implements TelemetrySink {
  readonly name = 'sqlite';
  private db: Database.Database | undefined;

  constructor(
    private readonly dbPath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async write(record: TelemetryRecord): Promise<void> {
    const db = this.open();
    const now = this.now();
    const periodStart = `${now.toISOString().slice(0, 7)}-01`;

    const insertCall = db.prepare<[string, string, string, string, string, number, number, number, number]>(
      `INSERT INTO routing_calls
         (timestamp, provider, model_name, actual_model, agent_name,
          tokens_in, tokens_out, cost_usd, latency_ms)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const addBudget = db.prepare<[string, string, number]>(
      `INSERT INTO budget (period_start, provider, total_spent) VALUES (?, ?, ?)
       ON CONFLICT(period_start, provider) DO UPDATE SET
         total_spent = total_spent + excluded.total_spent`
    );

    db.transaction(() => {
      insertCall.run(
        now.toISOString(),
        record.provider,
        record.modelName,
        record.actualModel,
        record.agentName,
        record.tokensIn,
        record.tokensOut,
        record.costUsd,
        record.latencyMs
      );
      addBudget.run(periodStart, record.provider, record.costUsd);
    })();
  }

  close(): void {
    this.db?.close();
    this.db = undefined;
  }

  private open(): Database.Database {
    if (this.db) return this.db;
    if (this.dbPath !== ':memory:') {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    const db = new Database(this.dbPath, { timeout: 3000 });
    db.exec(
      `CREATE TABLE IF NOT EXISTS routing_calls (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        provider TEXT NOT NULL,
        model_name TEXT,
        actual_model TEXT,
        agent_name TEXT DEFAULT 'unknown',
        tokens_in INTEGER DEFAULT 0,
        tokens_out INTEGER DEFAULT 0,
        cost_usd REAL DEFAULT 0.0,
        latency_ms INTEGER DEFAULT 0
      );
      CREATE TABLE IF NOT EXISTS budget (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        period_start DATE NOT NULL,
        provider TEXT NOT NULL,
        total_spent REAL DEFAULT 0.0,
        UNIQUE(period_start, provider)
      );`
    );
    this.db = db;
    return db;
  }
}
