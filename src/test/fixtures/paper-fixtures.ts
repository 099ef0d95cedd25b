import { vi } from 'vitest';
import { InMemoryStorageAdapter, MockLLMAdapter } from '@/adapters/mock';
import { QuestionHistoryStore } from '@/domain/history/QuestionHistoryStore';
import type { TierContext } from '@/domain/tiers/types';

/**
 * Five compiler-design units in syllabus form
 */
export const UNITS = [
  'UNIT I: LEXICAL ANALYSIS Tokens and lexemes',
  'UNIT II: SYNTAX ANALYSIS Grammars and parsers',
  'UNIT III: SEMANTIC ANALYSIS Type checking',
  'UNIT IV: INTERMEDIATE CODE Three address code',
  'UNIT V: CODE GENERATION Register allocation',
];

export const REFERENCE_TEXT =
  'Tokens are produced by a lexer. Parsers check grammars. Type checking finds errors.';

/**
 * An MCQ chunk as a model would write it
 */
export function mcq(n: number, text: string): string {
  return `Q${n}. ${text}\nA. one\nB. two\nC. three\nD. four`;
}

/**
 * Create a tier context backed by a mock provider and in-memory history.
 * Pacing sleeps are recorded, never awaited.
 */
export function createTestTierContext(key = 'test_history', defaultReply = '') {
  const provider = new MockLLMAdapter(defaultReply);
  const storage = new InMemoryStorageAdapter();
  const history = new QuestionHistoryStore(storage, key);
  const sleep = vi.fn(async (_ms: number) => {});
  const context: TierContext = {
    provider,
    history,
    referenceText: REFERENCE_TEXT,
    difficulty: 'Medium',
    unitDelayMs: 0,
    sleep,
    random: () => 0,
  };
  return { provider, storage, history, sleep, context };
}
