/**
 * Paper Domain Types
 */

import type { RetryHooks, RetryOptions } from '@/domain/generation/retry';
import type { Difficulty } from '@/domain/question';
import type { RelevanceConfig } from '@/domain/relevance/types';
import type { UnitDescriptor } from '@/domain/syllabus';
import type { OneMarkNumbering, TierResult } from '@/domain/tiers';

/**
 * Raw inputs of one paper
 */
export interface PaperInput {
  syllabusText: string;
  referenceText: string;
}

/**
 * Knobs for paper generation
 */
export interface PaperOptions {
  difficulty: Difficulty;
  /** One-mark questions per unit (1 to 10) */
  questionsPerUnit: number;
  oneMarkNumbering: OneMarkNumbering;
  /** Pause after each generation call */
  unitDelayMs: number;
  retry: Partial<RetryOptions>;
  /** Hooks for the retry policy; omit to log retries */
  retryHooks?: RetryHooks;
  relevance?: Partial<RelevanceConfig>;
  sleep?: (ms: number) => Promise<void>;
  /** Source of prompt seeds, in [0, 1) */
  random?: () => number;
}

export const DEFAULT_PAPER_OPTIONS: PaperOptions = {
  difficulty: 'Medium',
  questionsPerUnit: 2,
  oneMarkNumbering: 'contiguous',
  unitDelayMs: 1500,
  retry: {},
};

/**
 * Progress update for UI display
 */
export interface PaperProgress {
  stage: 'units' | 'one_mark' | 'six_mark' | 'twelve_mark';
  /** Current progress count */
  current: number;
  /** Total items to process */
  total: number;
  /** Human-readable message */
  message: string;
}

/**
 * A complete three-part paper
 */
export interface GeneratedPaper {
  units: UnitDescriptor[];
  usedFallbackUnits: boolean;
  oneMark: TierResult;
  sixMark: TierResult;
  twelveMark: TierResult;
  /** Unit fallback warning, then every tier's warnings in order */
  warnings: string[];
}

/**
 * Question counts and marks for one unit
 */
export interface DistributionRow {
  unitName: string;
  oneMark: number;
  sixMark: number;
  twelveMark: number;
  marks: number;
}

export interface DistributionSummary {
  rows: DistributionRow[];
  totals: Omit<DistributionRow, 'unitName'>;
}
