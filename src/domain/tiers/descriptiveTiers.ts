/**
 * Parts B and C: descriptive questions with a fixed total per tier
 */

import type { UnitDescriptor } from '@/domain/syllabus';
import { getUnitShortName } from '@/domain/syllabus';
import { buildTierResult, describeOutcome, generatedRecords, placeholderRecords } from './assemble';
import {
  SIX_MARK_DISTRIBUTION,
  SIX_MARK_START,
  SIX_MARK_TIER,
  SIX_MARK_TOTAL,
  TWELVE_MARK_PER_UNIT,
  TWELVE_MARK_START,
  TWELVE_MARK_TIER,
  TWELVE_MARK_TOTAL,
} from './definitions';
import { generateUnitQuestions } from './generateUnitQuestions';
import type { TierContext, TierDefinition, TierResult, TierSection } from './types';

interface Allocation {
  unit: UnitDescriptor;
  quota: number;
}

/**
 * Generate a fixed-size tier. Units that yield nothing get placeholders for
 * their whole quota in place; units that fall short are padded after the
 * last unit, so numbers stay contiguous. Padding needed because the syllabus
 * has too few units is credited to no unit (''). The result always holds exactly
 * `total` questions numbered from `start`.
 */
async function generateFixedTier(
  tier: TierDefinition,
  allocations: Allocation[],
  context: TierContext,
  start: number,
  total: number,
): Promise<TierResult> {
  const sections: TierSection[] = [];
  const warnings: string[] = [];
  const shortfalls: TierSection[] = [];
  let counter = start;

  for (const { unit, quota } of allocations) {
    const remaining = start + total - counter;
    if (remaining <= 0) break;

    const unitName = getUnitShortName(unit);
    const count = Math.min(quota, remaining);
    const outcome = await generateUnitQuestions(tier, context, unit, count, counter);

    if (outcome.kind === 'accepted') {
      const section = { unitName, records: generatedRecords(outcome, unitName) };
      sections.push(section);
      counter += section.records.length;
      for (let i = section.records.length; i < count; i++) {
        shortfalls.push(section);
      }
      continue;
    }

    warnings.push(describeOutcome(tier, unitName, outcome));
    sections.push({ unitName, records: placeholderRecords(tier, unitName, counter, count) });
    counter += count;
  }

  // Pad to the total, crediting each padded question to a unit that fell
  // short; the rest belongs to no unit
  for (const section of shortfalls) {
    if (counter >= start + total) break;
    section.records.push(...placeholderRecords(tier, section.unitName, counter, 1));
    counter += 1;
  }
  if (counter < start + total) {
    const records = placeholderRecords(tier, '', counter, start + total - counter);
    sections.push({ unitName: '', records });
  }

  return buildTierResult(tier, sections, warnings, total);
}

/**
 * Part B: 2, 2, 2, 1, 1 six-mark questions over the first five units,
 * numbered 11 to 18
 */
export function generateSixMarkTier(
  units: readonly UnitDescriptor[],
  context: TierContext,
): Promise<TierResult> {
  const allocations = units
    .slice(0, SIX_MARK_DISTRIBUTION.length)
    .map((unit, i) => ({ unit, quota: SIX_MARK_DISTRIBUTION[i] }));

  return generateFixedTier(SIX_MARK_TIER, allocations, context, SIX_MARK_START, SIX_MARK_TOTAL);
}

/**
 * Part C: two twelve-mark questions per unit, numbered 19 to 28
 */
export function generateTwelveMarkTier(
  units: readonly UnitDescriptor[],
  context: TierContext,
): Promise<TierResult> {
  const allocations = units.map((unit) => ({ unit, quota: TWELVE_MARK_PER_UNIT }));

  return generateFixedTier(
    TWELVE_MARK_TIER,
    allocations,
    context,
    TWELVE_MARK_START,
    TWELVE_MARK_TOTAL,
  );
}
