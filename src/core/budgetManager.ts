import type { RouterConfig } from './config';
import { periodsFor, type BudgetStore } from './budgetStore';
import type { ProviderBudgetSnapshot } from './types';

export type BudgetManagerOptions = {
  store: BudgetStore;
  now?: () => Date;
};

/**
 * Cost held by an admitted call until its dispatch finishes. Settling records
 * the spend; releasing drops it. Whichever happens first wins.
 */
export class BudgetReservation {
  private open = true;

  constructor(
    private readonly manager: BudgetManager,
    readonly provider: string,
    readonly model: string,
    readonly estimatedCostUsd: number
  ) {}

  get isOpen(): boolean {
    return this.open;
  }

  settle(promptTokens: number, completionTokens: number): number {
    if (!this.open) return 0;
    this.open = false;
    this.manager.releasePending(this.provider, this.estimatedCostUsd);
    return this.manager.recordSpend(this.provider, this.model, promptTokens, completionTokens);
  }

  release(): void {
    if (!this.open) return;
    this.open = false;
    this.manager.releasePending(this.provider, this.estimatedCostUsd);
  }
}

export class BudgetManager {
  private readonly store: BudgetStore;
  private readonly now: () => Date;
  private readonly pending = new Map<string, number>();

  constructor(
    private readonly config: RouterConfig,
    options: BudgetManagerOptions
  ) {
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
  }

  providerEnabled(provider: string): boolean {
    return this.config.providers[provider]?.enabled === true;
  }

  costPer1k(provider: string, model: string): number {
    if (this.config.providers[provider]?.kind === 'local') return 0;
    const rates = this.config.budget.costPer1kTokensUsd[provider];
    return rates?.[model] ?? this.config.budget.fallbackCostPer1kUsd;
  }

  estimateCost(provider: string, model: string, promptTokens: number, completionTokens: number): number {
    return ((promptTokens + completionTokens) / 1000) * this.costPer1k(provider, model);
  }

  caps(provider: string): { daily: number; monthly: number } {
    const providerConfig = this.config.providers[provider];
    return {
      daily: providerConfig?.dailyCapUsd ?? this.config.budget.dailyCapPerProviderUsd,
      monthly: providerConfig?.monthlyCapUsd ?? this.config.budget.monthlyCapPerProviderUsd,
    };
  }

  canSpend(provider: string, model: string, promptTokens: number, completionTokens: number): boolean {
    if (!this.providerEnabled(provider)) return false;

    const estimate = this.estimateCost(provider, model, promptTokens, completionTokens);
    const spend = this.store.get(provider, periodsFor(this.now()));
    const pending = this.pending.get(provider) ?? 0;
    const caps = this.caps(provider);

    if (spend.dailyCost + pending + estimate > caps.daily) return false;
    if (spend.monthlyCost + pending + estimate > caps.monthly) return false;
    return true;
  }

  /**
   * Check-and-reserve in one synchronous step so concurrent requests cannot
   * both pass the cap on the same headroom.
   */
  admit(
    provider: string,
    model: string,
    promptTokens: number,
    completionTokens: number
  ): BudgetReservation | null {
    if (!this.canSpend(provider, model, promptTokens, completionTokens)) return null;
    const estimate = this.estimateCost(provider, model, promptTokens, completionTokens);
    this.pending.set(provider, (this.pending.get(provider) ?? 0) + estimate);
    return new BudgetReservation(this, provider, model, estimate);
  }

  recordSpend(provider: string, model: string, promptTokens: number, completionTokens: number): number {
    if (!this.config.providers[provider]) return 0;
    const cost = this.estimateCost(provider, model, promptTokens, completionTokens);
    this.store.record(provider, periodsFor(this.now()), cost);
    return cost;
  }

  releasePending(provider: string, amount: number): void {
    const remaining = (this.pending.get(provider) ?? 0) - amount;
    if (remaining <= 1e-12) {
      this.pending.delete(provider);
      return;
    }
    this.pending.set(provider, remaining);
  }

  snapshot(): Record<string, ProviderBudgetSnapshot> {
    const periods = periodsFor(this.now());
    const result: Record<string, ProviderBudgetSnapshot> = {};
    for (const provider of Object.keys(this.config.providers)) {
      const spend = this.store.get(provider, periods);
      const caps = this.caps(provider);
      result[provider] = {
        enabled: this.providerEnabled(provider),
        dailyCostEstimate: spend.dailyCost,
        monthlyCostEstimate: spend.monthlyCost,
        callsToday: spend.callsToday,
        dailyCapUsd: caps.daily,
        monthlyCapUsd: caps.monthly,
      };
    }
    return result;
  }
}
