/**
 * Question Domain Types
 *
 * Types for turning raw generated text into numbered question records.
 */

// ============ Tiers ============

/**
 * Question tiers, one per paper part
 */
export type TierId = 'one_mark' | 'six_mark' | 'twelve_mark';

/**
 * Difficulty levels offered to the generator
 */
export type Difficulty = 'Easy' | 'Medium' | 'Hard';

export const DIFFICULTIES: readonly Difficulty[] = ['Easy', 'Medium', 'Hard'];

// ============ Questions ============

/**
 * A question with its final number. `body` is everything after the
 * marker's first "." (for MCQs this includes the option lines), so the
 * rendered form is `Q<number>.<body>`.
 */
export interface NumberedQuestion {
  number: number;
  body: string;
}

/**
 * Where a question in a tier result came from
 */
export type QuestionSource = 'generated' | 'placeholder';

/**
 * A question placed in a tier result
 */
export interface QuestionRecord extends NumberedQuestion {
  /** Short name of the unit the question belongs to */
  unitName: string;
  source: QuestionSource;
}

// ============ Deduplication ============

/**
 * Input for deduplicating and renumbering one generation response
 */
export interface DedupInput {
  /** Candidate question texts in response order */
  candidates: string[];
  /** The unit's fingerprint history; accepted fingerprints are appended */
  history: string[];
  /** Maximum questions to accept */
  desiredCount: number;
  /** Number given to the first accepted question */
  startNumber: number;
  /** Treat "Q17.5017"-style markers as number plus stray digits */
  stripDecimalMarker?: boolean;
}

/**
 * Outcome of deduplication: either new questions, or a non-fatal
 * "nothing new" with a reason
 */
export type DedupOutcome =
  | { kind: 'accepted'; questions: NumberedQuestion[]; fingerprints: string[] }
  | { kind: 'empty'; reason: string };
