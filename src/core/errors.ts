export class NoViableRouteError extends Error {
  intent: string;

  constructor(intent: string, message = `No viable provider/model in fallback chain for intent: ${intent}`) {
    super(message);
    this.name = 'NoViableRouteError';
    this.intent = intent;
  }
}

export class BudgetExceededError extends Error {
  providers: string[];

  constructor(providers: string[]) {
    super('Budget exceeded for all providers');
    this.name = 'BudgetExceededError';
    this.providers = providers;
  }
}

export class ProviderError extends Error {
  provider: string;

  constructor(provider: string, message: string) {
    super(message);
    this.name = 'ProviderError';
    this.provider = provider;
  }
}
