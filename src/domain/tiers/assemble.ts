/**
 * Helpers for building tier results out of unit outcomes
 */

import { type QuestionRecord, renderQuestion } from '@/domain/question';
import type { TierDefinition, TierResult, TierSection, UnitOutcome } from './types';

/**
 * `count` placeholder questions numbered from `startNumber`
 */
export function placeholderRecords(
  tier: TierDefinition,
  unitName: string,
  startNumber: number,
  count: number,
): QuestionRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    number: startNumber + i,
    body: tier.placeholderBody,
    unitName,
    source: 'placeholder' as const,
  }));
}

/**
 * Records for an accepted outcome
 */
export function generatedRecords(
  outcome: Extract<UnitOutcome, { kind: 'accepted' }>,
  unitName: string,
): QuestionRecord[] {
  return outcome.questions.map((q) => ({ ...q, unitName, source: 'generated' as const }));
}

/**
 * Warning text for a unit that produced nothing usable
 */
export function describeOutcome(
  tier: TierDefinition,
  unitName: string,
  outcome: Exclude<UnitOutcome, { kind: 'accepted' }>,
): string {
  if (outcome.kind === 'fatal') {
    return outcome.error.message;
  }
  return `No new ${tier.label} questions generated for ${unitName}: ${outcome.reason}`;
}

/**
 * Render records as the tier's text block
 */
export function renderRecords(records: QuestionRecord[]): string {
  return records.map((r) => renderQuestion(r.number, r.body)).join('\n\n');
}

/**
 * Build a tier result from sections, keeping the `limit` lowest-numbered
 * questions when a limit is given
 */
export function buildTierResult(
  tier: TierDefinition,
  sections: TierSection[],
  warnings: string[],
  limit?: number,
): TierResult {
  const sorted = sections.flatMap((section) => section.records).sort((a, b) => a.number - b.number);
  const records = limit === undefined ? sorted : sorted.slice(0, limit);
  const kept = new Set(records);

  return {
    tier: tier.id,
    records,
    sections: sections
      .map((section) => ({
        unitName: section.unitName,
        records: section.records.filter((r) => kept.has(r)),
      }))
      .filter((section) => section.records.length > 0),
    text: renderRecords(records),
    warnings,
  };
}
