import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { INTENTS, PRIORITIES, type Priority } from './types';
import { logWarn } from '../util/logger';

const DEFAULT_CONFIG_DIR = 'config';
const CONFIG_FILE = 'router.yaml';

const intentSchema = z.enum(INTENTS);
const prioritySchema = z.enum(PRIORITIES);

const candidateSchema = z.tuple([z.string().min(1), z.string().min(1)]);

const tierSchema = z.object({
  defaultModel: z.string().optional(),
});

const providerSchema = z.object({
  kind: z.enum(['aggregator', 'local', 'placeholder']),
  enabled: z.boolean().default(true),
  baseUrl: z.string().optional(),
  apiKeyEnv: z.string().optional(),
  discovery: z.enum(['lmstudio', 'ollama']).default('lmstudio'),
  timeoutMs: z.number().int().positive().optional(),
  discoveryTimeoutMs: z.number().int().positive().default(4000),
  headers: z.record(z.string()).default({}),
  dailyCapUsd: z.number().nonnegative().optional(),
  monthlyCapUsd: z.number().nonnegative().optional(),
  tiers: z.record(tierSchema).default({}),
});

const tokenBudgetSchema = z.object({
  targetInputTokens: z.number().int().positive(),
  hardMaxInputTokens: z.number().int().positive(),
});

const routerConfigSchema = z.object({
  routing: z.object({
    defaultPriority: prioritySchema.default('normal'),
    intentKeywords: z.record(intentSchema, z.array(z.string())).default({}),
    fallbackChain: z.record(intentSchema, z.array(candidateSchema)).default({}),
    overrides: z
      .object({
        allowRouteOverride: z.boolean().default(true),
        allowModelOverride: z.boolean().default(true),
      })
      .default({}),
  }),
  providers: z.record(providerSchema),
  budget: z
    .object({
      dailyCapPerProviderUsd: z.number().nonnegative().default(2),
      monthlyCapPerProviderUsd: z.number().nonnegative().default(60),
      fallbackCostPer1kUsd: z.number().nonnegative().default(0.5),
      defaultCompletionTokens: z.number().int().positive().default(512),
      costPer1kTokensUsd: z.record(z.record(z.number().nonnegative())).default({}),
    })
    .default({}),
  tokens: z
    .object({
      default: tokenBudgetSchema.default({
        targetInputTokens: 6000,
        hardMaxInputTokens: 10000,
      }),
      priorities: z.record(prioritySchema, tokenBudgetSchema).default({}),
    })
    .default({}),
  memory: z
    .object({
      pinsFile: z.string().default('memory/pins.md'),
      summariesDir: z.string().default('memory/router-summaries'),
    })
    .default({}),
  logging: z
    .object({
      requestLog: z.string().default('logs/router-requests.log'),
      errorLog: z.string().default('logs/router-errors.log'),
      contextLog: z.string().default('logs/router-context.log'),
    })
    .default({}),
  telemetry: z
    .object({
      url: z.string().optional(),
      timeoutMs: z.number().int().positive().default(2000),
      dbPath: z.string().default('data/command_center.sqlite'),
      agentName: z.string().default('router'),
    })
    .default({}),
  state: z
    .object({
      dbPath: z.string().default('data/state.sqlite'),
    })
    .default({}),
});

export type RouterConfig = z.infer<typeof routerConfigSchema>;
export type RouterConfigInput = z.input<typeof routerConfigSchema>;
export type ProviderConfig = RouterConfig['providers'][string];
export type TokenBudget = z.infer<typeof tokenBudgetSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export async function loadConfig(
  configDir: string = process.env.ROUTER_CONFIG_DIR ?? DEFAULT_CONFIG_DIR
): Promise<RouterConfig> {
  const raw = await readFile(join(configDir, CONFIG_FILE), 'utf8');
  return parseConfig(yaml.parse(raw));
}

export function parseConfig(input: unknown): RouterConfig {
  const result = routerConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid router config: ${issues}`);
  }

  validateConfig(result.data);
  return result.data;
}

function validateConfig(config: RouterConfig): void {
  for (const [intent, chain] of Object.entries(config.routing.fallbackChain)) {
    for (const [provider, tier] of chain ?? []) {
      const providerConfig = config.providers[provider];
      if (!providerConfig) {
        logWarn('config_unknown_provider', { intent, provider });
        continue;
      }
      if (!providerConfig.tiers[tier]?.defaultModel) {
        logWarn('config_tier_without_model', { intent, provider, tier });
      }
    }
  }

  for (const [name, provider] of Object.entries(config.providers)) {
    if (provider.kind !== 'placeholder' && !provider.baseUrl) {
      throw new ConfigError(`Provider ${name} (${provider.kind}) requires baseUrl`);
    }
  }

  for (const [priority, budget] of Object.entries(config.tokens.priorities)) {
    if (budget && budget.targetInputTokens > budget.hardMaxInputTokens) {
      logWarn('config_token_budget_inverted', { priority, ...budget });
    }
  }
}

export function tokenBudgetFor(config: RouterConfig, priority: Priority): TokenBudget {
  return config.tokens.priorities[priority] ?? config.tokens.default;
}
