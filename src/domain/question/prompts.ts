/**
 * Question Generation Prompts Module
 *
 * System prompts and user prompt builders for the three question tiers.
 */

import type { Difficulty } from './types';

// ============ System Prompts ============

export const ONE_MARK_SYSTEM_PROMPT = 'You are an expert university question paper setter.';

export const SIX_MARK_SYSTEM_PROMPT =
  'You are an expert university professor creating six-mark questions.';

export const TWELVE_MARK_SYSTEM_PROMPT =
  'You are an expert university professor creating twelve-mark questions.';

// ============ User Prompt Builders ============

/**
 * Inputs shared by every tier's user prompt
 */
export interface TierPromptInput {
  /** Full unit description */
  unit: string;
  difficulty: Difficulty;
  /** Reference excerpt chosen for the unit */
  excerpt: string;
  /** Number of questions to ask for */
  count: number;
  /** Random value that varies otherwise identical requests */
  seed: number;
}

/**
 * Build the user prompt for one-mark MCQs
 */
export function buildOneMarkPrompt(input: TierPromptInput): string {
  return `Generate EXACTLY ${input.count} NEW one-mark MCQs.

UNIT: ${input.unit}
DIFFICULTY: ${input.difficulty}

RELEVANT CONTENT (for this unit only):
${input.excerpt}

Rules:
- Each question must have 4 options (A-D)
- Only generate the question and options, do NOT include the answers
- Each question should be unique and phrased differently
- Strictly syllabus-based
- Ensure questions are not repeated from previous sessions
- Format strictly:

Q1. Question?
A. Option
B. Option
C. Option
D. Option

Q2. Question?
A. Option
B. Option
C. Option
D. Option

[Seed: ${input.seed}]
`;
}

/**
 * Build the user prompt for six-mark descriptive questions
 */
export function buildSixMarkPrompt(input: TierPromptInput): string {
  return `Generate EXACTLY ${input.count} NEW six-mark descriptive questions.

UNIT: ${input.unit}
DIFFICULTY: ${input.difficulty}
MARKS: 6 marks each

RELEVANT CONTENT:
${input.excerpt}

Rules:
- Each question should require detailed explanation or step-by-step solution
- Questions should test analytical and application skills
- Make questions challenging for ${input.difficulty} difficulty
- Each question should be unique and not repeated
- Questions should be suitable for 6 marks (approximately 150-200 words answer)
- Format strictly as:
Q[number]. [Question text]

[Seed: ${input.seed}]
`;
}

/**
 * Build the user prompt for twelve-mark descriptive questions
 */
export function buildTwelveMarkPrompt(input: TierPromptInput): string {
  return `Generate EXACTLY ${input.count} NEW twelve-mark descriptive questions.

UNIT: ${input.unit}
DIFFICULTY: ${input.difficulty}
MARKS: 12 marks each

RELEVANT CONTENT:
${input.excerpt}

Rules:
- Each question should require comprehensive explanation, analysis, and application
- Questions should test in-depth understanding, critical thinking, and problem-solving skills
- Make questions challenging for ${input.difficulty} difficulty
- Each question should be unique and not repeated
- Questions should be suitable for 12 marks (approximately 250-300 words answer)
- Questions should cover different aspects/topics of the unit
- Format strictly as:
Q[number]. [Question text]

[Seed: ${input.seed}]
`;
}
