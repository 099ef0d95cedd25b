/**
 * Question Module
 *
 * Parsing, deduplication and renumbering of generated questions, plus the
 * prompts used to request them.
 */

// Types
export type {
  DedupInput,
  DedupOutcome,
  Difficulty,
  NumberedQuestion,
  QuestionRecord,
  QuestionSource,
  TierId,
} from './types';
export { DIFFICULTIES } from './types';

// Parsing
export type { ParsedQuestion } from './parseQuestions';
export {
  parseQuestionMarker,
  renderQuestion,
  renumberQuestion,
  splitDescriptiveCandidates,
  splitMcqCandidates,
} from './parseQuestions';

// Deduplication
export { acceptNewQuestions } from './dedupe';

// Prompts
export type { TierPromptInput } from './prompts';
export {
  ONE_MARK_SYSTEM_PROMPT,
  SIX_MARK_SYSTEM_PROMPT,
  TWELVE_MARK_SYSTEM_PROMPT,
  buildOneMarkPrompt,
  buildSixMarkPrompt,
  buildTwelveMarkPrompt,
} from './prompts';
