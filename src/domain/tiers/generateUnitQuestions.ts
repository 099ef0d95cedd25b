/**
 * Per-unit generation step shared by every tier
 */

import { GenerationError } from '@/domain/generation/errors';
import { acceptNewQuestions } from '@/domain/question';
import { extractRelevantContent } from '@/domain/relevance';
import { type UnitDescriptor, getUnitShortName } from '@/domain/syllabus';
import { DEFAULT_UNIT_DELAY_MS } from './definitions';
import type { TierContext, TierDefinition, UnitOutcome } from './types';

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Random prompt seed in 1000..9999
 */
export function createSeed(random: () => number = Math.random): number {
  return 1000 + Math.floor(random() * 9000);
}

/**
 * Ask for `count` questions for one unit, keep the ones not yet in the
 * unit's history and number them from `startNumber`.
 *
 * Never throws: provider and storage failures come back as `fatal`.
 */
export async function generateUnitQuestions(
  tier: TierDefinition,
  context: TierContext,
  unit: UnitDescriptor,
  count: number,
  startNumber: number,
): Promise<UnitOutcome> {
  const unitName = getUnitShortName(unit);
  const sleep = context.sleep ?? defaultSleep;

  try {
    const excerpt = extractRelevantContent(context.referenceText, unit, context.relevance);
    const prompt = tier.buildPrompt({
      unit,
      difficulty: context.difficulty,
      excerpt,
      count,
      seed: createSeed(context.random),
    });

    const response = await context.provider.chat(
      [
        { role: 'system', content: tier.systemPrompt },
        { role: 'user', content: prompt },
      ],
      { temperature: tier.temperature, maxTokens: tier.maxTokens },
    );

    const candidates = tier.splitCandidates(response.content);
    const outcome = await context.history.updateUnit(unitName, (history) =>
      acceptNewQuestions({
        candidates,
        history,
        desiredCount: count,
        startNumber,
        stripDecimalMarker: tier.stripDecimalMarker,
      }),
    );

    await sleep(context.unitDelayMs ?? DEFAULT_UNIT_DELAY_MS);

    if (outcome.kind === 'empty') {
      return outcome;
    }
    return { kind: 'accepted', questions: outcome.questions };
  } catch (error) {
    return { kind: 'fatal', error: new GenerationError(tier.label, unitName, error) };
  }
}
