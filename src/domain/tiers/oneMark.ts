/**
 * Part A: one-mark MCQs, `questionsPerUnit` per unit, numbered from 1
 */

import type { UnitDescriptor } from '@/domain/syllabus';
import { getUnitShortName } from '@/domain/syllabus';
import { describeOutcome, buildTierResult, generatedRecords, placeholderRecords } from './assemble';
import { ONE_MARK_TIER } from './definitions';
import { generateUnitQuestions } from './generateUnitQuestions';
import type { OneMarkNumbering, TierContext, TierResult, TierSection } from './types';

export interface OneMarkOptions {
  questionsPerUnit: number;
  /**
   * contiguous: every unit fills its quota, padding with placeholders.
   * legacy: units with nothing new are left out and keep their numbers
   * free; partially filled units still consume the whole quota.
   */
  numbering?: OneMarkNumbering;
}

export async function generateOneMarkTier(
  units: readonly UnitDescriptor[],
  context: TierContext,
  options: OneMarkOptions,
): Promise<TierResult> {
  const { questionsPerUnit } = options;
  const numbering = options.numbering ?? 'contiguous';
  const sections: TierSection[] = [];
  const warnings: string[] = [];
  let counter = 1;

  for (const unit of units) {
    const unitName = getUnitShortName(unit);
    const outcome = await generateUnitQuestions(
      ONE_MARK_TIER,
      context,
      unit,
      questionsPerUnit,
      counter,
    );

    if (outcome.kind === 'accepted') {
      const records = generatedRecords(outcome, unitName);
      if (numbering === 'contiguous') {
        const missing = questionsPerUnit - records.length;
        records.push(
          ...placeholderRecords(ONE_MARK_TIER, unitName, counter + records.length, missing),
        );
      }
      sections.push({ unitName, records });
      counter += questionsPerUnit;
      continue;
    }

    warnings.push(describeOutcome(ONE_MARK_TIER, unitName, outcome));
    if (outcome.kind === 'empty' && numbering === 'legacy') {
      continue;
    }

    sections.push({
      unitName,
      records: placeholderRecords(ONE_MARK_TIER, unitName, counter, questionsPerUnit),
    });
    counter += questionsPerUnit;
  }

  return buildTierResult(ONE_MARK_TIER, sections, warnings);
}
