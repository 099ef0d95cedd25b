import {
  ONE_MARK_SYSTEM_PROMPT,
  SIX_MARK_SYSTEM_PROMPT,
  TWELVE_MARK_SYSTEM_PROMPT,
  buildOneMarkPrompt,
  buildSixMarkPrompt,
  buildTwelveMarkPrompt,
  splitDescriptiveCandidates,
  splitMcqCandidates,
} from '@/domain/question';
import type { TierDefinition } from './types';

export const ONE_MARK_TIER: TierDefinition = {
  id: 'one_mark',
  label: 'one-mark',
  historyKey: 'question_history',
  systemPrompt: ONE_MARK_SYSTEM_PROMPT,
  buildPrompt: buildOneMarkPrompt,
  splitCandidates: splitMcqCandidates,
  temperature: 0.7,
  maxTokens: 512,
  stripDecimalMarker: false,
  placeholderBody:
    ' [Question generation failed - please try again]\nA. Option A\nB. Option B\nC. Option C\nD. Option D',
};

export const SIX_MARK_TIER: TierDefinition = {
  id: 'six_mark',
  label: 'six-mark',
  historyKey: 'six_mark_history',
  systemPrompt: SIX_MARK_SYSTEM_PROMPT,
  buildPrompt: buildSixMarkPrompt,
  splitCandidates: splitDescriptiveCandidates,
  temperature: 0.8,
  maxTokens: 512,
  stripDecimalMarker: true,
  placeholderBody: ' Explain the key concepts covered in this unit with suitable examples.',
};

export const TWELVE_MARK_TIER: TierDefinition = {
  id: 'twelve_mark',
  label: 'twelve-mark',
  historyKey: 'twelve_mark_history',
  systemPrompt: TWELVE_MARK_SYSTEM_PROMPT,
  buildPrompt: buildTwelveMarkPrompt,
  splitCandidates: splitDescriptiveCandidates,
  temperature: 0.8,
  maxTokens: 600,
  stripDecimalMarker: false,
  placeholderBody:
    ' Discuss in detail the important concepts and applications from this unit with appropriate examples and analysis.',
};

/** Questions per unit position in part B */
export const SIX_MARK_DISTRIBUTION: readonly number[] = [2, 2, 2, 1, 1];
export const SIX_MARK_START = 11;
export const SIX_MARK_TOTAL = 8;

export const TWELVE_MARK_PER_UNIT = 2;
export const TWELVE_MARK_START = 19;
export const TWELVE_MARK_TOTAL = 10;

export const DEFAULT_UNIT_DELAY_MS = 1500;
