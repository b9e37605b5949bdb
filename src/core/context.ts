import { existsSync, mkdirSync, readFileSync, appendFileSync } from 'node:fs';
import { join } from 'node:path';
import { tokenBudgetFor, type RouterConfig } from './config';
import type { ChatMessage, ChatRequest, ContextInfo, Priority } from './types';
import { charsPerTokenEstimator, type TokenEstimator } from '../util/tokens';
import { errorMessage, logError, logWarn } from '../util/logger';
import type { RouterLogs } from '../util/routerLogs';

export const PINNED_PREFIX = 'Pinned context:\n';

export type PinnedContextSource = {
  load: () => string[];
};

export type SummarizeParams = {
  messages: ChatMessage[];
  priority: Priority;
  targetInputTokens: number;
  estimator: TokenEstimator;
};

export type SummarizeResult = {
  messages: ChatMessage[];
  method: ContextInfo['method'];
  /** Text of the summary, appended to the dated notes under `memory.summariesDir`. */
  summary?: string;
};

/**
 * Invoked when the trimmed prompt is still above the priority's target.
 * Implementations may compress older turns into a system message.
 */
export type Summarizer = {
  name: string;
  summarize: (params: SummarizeParams) => SummarizeResult;
};

export const keepSummarizer: Summarizer = {
  name: 'keep',
  summarize: ({ messages }) => ({ messages, method: 'keep' }),
};

export class FilePinnedContext implements PinnedContextSource {
  constructor(private readonly path: string) {}

  load(): string[] {
    if (!existsSync(this.path)) return [];
    return readFileSync(this.path, 'utf8')
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }
}

export type ContextDeps = {
  config: RouterConfig;
  pins?: PinnedContextSource;
  estimator?: TokenEstimator;
  summarizer?: Summarizer;
  logs?: RouterLogs;
  now?: () => Date;
};

export type BuiltContext = {
  messages: ChatMessage[];
  info: ContextInfo;
};

export function isProtected(message: ChatMessage): boolean {
  return message.role === 'system';
}

export function trimToHardMax(
  messages: readonly ChatMessage[],
  hardMax: number,
  estimator: TokenEstimator
): { messages: ChatMessage[]; trimmedCount: number } {
  const trimmed = [...messages];
  let trimmedCount = 0;
  while (estimator.estimate(trimmed) > hardMax) {
    const removableIndex = trimmed.findIndex((m) => !isProtected(m));
    if (removableIndex === -1) break;
    trimmed.splice(removableIndex, 1);
    trimmedCount += 1;
  }
  return { messages: trimmed, trimmedCount };
}

export function buildContext(
  request: ChatRequest,
  priority: Priority,
  deps: ContextDeps
): BuiltContext {
  const estimator = deps.estimator ?? charsPerTokenEstimator;
  const summarizer = deps.summarizer ?? keepSummarizer;
  const budget = tokenBudgetFor(deps.config, priority);

  try {
    const messages = [...request.messages];
    const pins = deps.pins?.load() ?? [];
    if (pins.length > 0 && !hasPinnedMessage(messages)) {
      messages.unshift({ role: 'system', content: PINNED_PREFIX + pins.join('\n') });
    }

    const tokensBefore = estimator.estimate(messages);
    const fitted = trimToHardMax(messages, budget.hardMaxInputTokens, estimator);

    let result: SummarizeResult = { messages: fitted.messages, method: 'keep' };
    let summarizerUsed: string | null = null;
    if (estimator.estimate(fitted.messages) > budget.targetInputTokens) {
      result = summarizer.summarize({
        messages: fitted.messages,
        priority,
        targetInputTokens: budget.targetInputTokens,
        estimator,
      });
      summarizerUsed = summarizer.name;
      if (result.method === 'summarized' && result.summary) {
        saveSummary(deps, request.requestId, result.summary);
      }
    }

    const info: ContextInfo = {
      method: result.method,
      priority,
      tokensBefore,
      tokensAfter: estimator.estimate(result.messages),
      targetInputTokens: budget.targetInputTokens,
      hardMaxInputTokens: budget.hardMaxInputTokens,
      trimmedCount: fitted.trimmedCount,
      pinnedIncluded: result.messages.some(isPinnedMessage),
      summarizerUsed,
    };

    deps.logs?.append('context', { requestId: request.requestId, ...info });
    return { messages: result.messages, info };
  } catch (error) {
    logError('context_build_failed', {
      requestId: request.requestId,
      error: errorMessage(error),
    });
    const messages = [...request.messages];
    const tokens = estimator.estimate(messages);
    return {
      messages,
      info: {
        method: 'keep',
        priority,
        tokensBefore: tokens,
        tokensAfter: tokens,
        targetInputTokens: budget.targetInputTokens,
        hardMaxInputTokens: budget.hardMaxInputTokens,
        trimmedCount: 0,
        pinnedIncluded: false,
        summarizerUsed: null,
      },
    };
  }
}

/** Appends a summary to `<summariesDir>/YYYY-MM-DD.md` and returns the file path. */
export function persistSummary(summariesDir: string, summary: string, now: Date = new Date()): string {
  mkdirSync(summariesDir, { recursive: true });
  const path = join(summariesDir, `${now.toISOString().slice(0, 10)}.md`);
  appendFileSync(path, `## ${now.toISOString()}\n\n${summary.trim()}\n\n`, 'utf8');
  return path;
}

function saveSummary(deps: ContextDeps, requestId: string, summary: string): void {
  try {
    persistSummary(deps.config.memory.summariesDir, summary, deps.now?.() ?? new Date());
  } catch (error) {
    logWarn('summary_persist_failed', { requestId, error: errorMessage(error) });
  }
}

function isPinnedMessage(message: ChatMessage): boolean {
  return message.role === 'system' && message.content.startsWith(PINNED_PREFIX);
}

function hasPinnedMessage(messages: readonly ChatMessage[]): boolean {
  return messages.some(isPinnedMessage);
}
