import { expect, test } from 'vitest';
import { detectIntent } from '../../src/core/intent';
import { makeConfig } from '../fixtures/config';

const keywords = makeConfig().routing.intentKeywords;

test('detects code intent from configured keywords', () => {
  expect(detectIntent([{ role: 'user', content: 'Please REFACTOR this module' }], keywords)).toBe(
    'code'
  );
});

test('uses the most recent user message only', () => {
  const intent = detectIntent(
    [
      { role: 'user', content: 'refactor this' },
      { role: 'assistant', content: 'done' },
      { role: 'user', content: 'thanks, hello again' },
    ],
    keywords
  );
  expect(intent).toBe('chat');
});

test('keyword lists are checked in configuration order', () => {
  expect(
    detectIntent([{ role: 'user', content: 'refactor it step by step' }], keywords)
  ).toBe('code');
});

test('vision from image attachment or wording', () => {
  expect(detectIntent([{ role: 'user', content: 'what is this?', hasImage: true }], keywords)).toBe(
    'vision'
  );
  expect(detectIntent([{ role: 'user', content: 'Look at this screenshot' }], keywords)).toBe(
    'vision'
  );
});

test('defaults to chat without a user message', () => {
  expect(detectIntent([{ role: 'system', content: 'refactor' }], keywords)).toBe('chat');
  expect(detectIntent([], keywords)).toBe('chat');
});
