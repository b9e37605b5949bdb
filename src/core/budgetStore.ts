import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type BudgetPeriods = {
  day: string;
  month: string;
};

export type ProviderSpend = {
  dailyCost: number;
  monthlyCost: number;
  callsToday: number;
};

export interface BudgetStore {
  get(provider: string, periods: BudgetPeriods): ProviderSpend;
  record(provider: string, periods: BudgetPeriods, costUsd: number): void;
}

export function periodsFor(date: Date): BudgetPeriods {
  const iso = date.toISOString();
  return { day: iso.slice(0, 10), month: iso.slice(0, 7) };
}

type SpendRow = { costUsd: number; calls: number };

export class BudgetStoreSqlite implements BudgetStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(
      `CREATE TABLE IF NOT EXISTS provider_spend (
        provider TEXT NOT NULL,
        period TEXT NOT NULL,
        cost_usd REAL NOT NULL DEFAULT 0,
        calls INTEGER NOT NULL DEFAULT 0,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (provider, period)
      )`
    );
  }

  get(provider: string, periods: BudgetPeriods): ProviderSpend {
    const query = this.db.prepare<[string, string], SpendRow>(
      'SELECT cost_usd AS costUsd, calls FROM provider_spend WHERE provider = ? AND period = ?'
    );
    const daily = query.get(provider, periods.day);
    const monthly = query.get(provider, periods.month);
    return {
      dailyCost: daily?.costUsd ?? 0,
      monthlyCost: monthly?.costUsd ?? 0,
      callsToday: daily?.calls ?? 0,
    };
  }

  record(provider: string, periods: BudgetPeriods, costUsd: number): void {
    const upsert = this.db.prepare<[string, string, number, number]>(
      `INSERT INTO provider_spend (provider, period, cost_usd, calls, updated_at)
       VALUES (?, ?, ?, 1, ?)
       ON CONFLICT(provider, period) DO UPDATE SET
         cost_usd = cost_usd + excluded.cost_usd,
         calls = calls + 1,
         updated_at = excluded.updated_at`
    );
    const now = Date.now();
    this.db.transaction(() => {
      upsert.run(provider, periods.day, costUsd, now);
      upsert.run(provider, periods.month, costUsd, now);
    })();
  }

  close(): void {
    this.db.close();
  }
}

export class BudgetStoreMemory implements BudgetStore {
  private store = new Map<string, SpendRow>();

  get(provider: string, periods: BudgetPeriods): ProviderSpend {
    const daily = this.store.get(keyFor(provider, periods.day));
    const monthly = this.store.get(keyFor(provider, periods.month));
    return {
      dailyCost: daily?.costUsd ?? 0,
      monthlyCost: monthly?.costUsd ?? 0,
      callsToday: daily?.calls ?? 0,
    };
  }

  record(provider: string, periods: BudgetPeriods, costUsd: number): void {
    for (const period of [periods.day, periods.month]) {
      const key = keyFor(provider, period);
      const existing = this.store.get(key) ?? { costUsd: 0, calls: 0 };
      this.store.set(key, {
        costUsd: existing.costUsd + costUsd,
        calls: existing.calls + 1,
      });
    }
  }
}

function keyFor(provider: string, period: string): string {
  return `${provider}|${period}`;
}
