import type { ChatMessage } from '../core/types';

/**
 * Pluggable token counting used for prompt budgets and admission estimates.
 * Swap in a real tokenizer by implementing this type.
 */
export type TokenEstimator = {
  name: string;
  estimate: (messages: readonly ChatMessage[]) => number;
};

export function estimateTokens(text: string): number {
  return Math.max(1, Math.floor(text.length / 4));
}

export const charsPerTokenEstimator: TokenEstimator = {
  name: 'chars_div_4',
  estimate: (messages) => estimateTokens(messages.map((m) => m.content).join('\n')),
};
