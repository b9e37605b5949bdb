import type { RouterConfig } from './config';
import { INTENTS, type ChatMessage, type Intent } from './types';

const VISION_WORDS = ['image', 'screenshot', 'vision'];

export function detectIntent(
  messages: readonly ChatMessage[],
  keywords: RouterConfig['routing']['intentKeywords']
): Intent {
  const lastUser = [...messages].reverse().find((m) => m.role === 'user');
  if (!lastUser) return 'chat';

  const normalized = lastUser.content.toLowerCase();

  for (const [key, words] of Object.entries(keywords)) {
    const intent = INTENTS.find((known) => known === key);
    if (!intent) continue;
    if (words?.some((word) => normalized.includes(word.toLowerCase()))) {
      return intent;
    }
  }

  if (lastUser.hasImage || VISION_WORDS.some((word) => normalized.includes(word))) {
    return 'vision';
  }

  return 'chat';
}
