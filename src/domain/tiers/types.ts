/**
 * Tier Domain Types
 */

import type { GenerationError } from '@/domain/generation/errors';
import type { QuestionHistoryStore } from '@/domain/history/QuestionHistoryStore';
import type {
  Difficulty,
  NumberedQuestion,
  QuestionRecord,
  TierId,
  TierPromptInput,
} from '@/domain/question';
import type { RelevanceConfig } from '@/domain/relevance/types';
import type { ILLMProvider } from '@/ports/ILLMProvider';

/**
 * How one tier asks for and reads back questions
 */
export interface TierDefinition {
  id: TierId;
  /** Human-readable name used in warnings */
  label: string;
  /** Storage key of the tier's history document */
  historyKey: string;
  systemPrompt: string;
  buildPrompt: (input: TierPromptInput) => string;
  splitCandidates: (raw: string) => string[];
  temperature: number;
  maxTokens: number;
  stripDecimalMarker: boolean;
  /** Body of a placeholder question, rendered after "Q<n>." */
  placeholderBody: string;
}

/**
 * Everything a tier needs to generate questions for a list of units
 */
export interface TierContext {
  /** Provider for this tier, normally wrapped in a RetryingLLMProvider */
  provider: ILLMProvider;
  history: QuestionHistoryStore;
  referenceText: string;
  difficulty: Difficulty;
  /** Pause after each generation call */
  unitDelayMs?: number;
  relevance?: Partial<RelevanceConfig>;
  sleep?: (ms: number) => Promise<void>;
  /** Source of prompt seeds, in [0, 1) */
  random?: () => number;
}

/**
 * Result of generating questions for one unit
 */
export type UnitOutcome =
  | { kind: 'accepted'; questions: NumberedQuestion[] }
  | { kind: 'empty'; reason: string }
  | { kind: 'fatal'; error: GenerationError };

/**
 * The questions of one unit within a tier
 */
export interface TierSection {
  unitName: string;
  records: QuestionRecord[];
}

/**
 * A generated tier
 */
export interface TierResult {
  tier: TierId;
  /** All questions in number order */
  records: QuestionRecord[];
  /** Questions grouped by unit, in syllabus order */
  sections: TierSection[];
  /** Rendered questions separated by blank lines */
  text: string;
  /** One message per unit that fell back to placeholders */
  warnings: string[];
}

/**
 * How one-mark questions are numbered when a unit yields nothing new
 */
export type OneMarkNumbering = 'contiguous' | 'legacy';
