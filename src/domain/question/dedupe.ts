/**
 * Deduplicator
 *
 * Filters candidates against a unit's fingerprint history and numbers the
 * survivors in acceptance order.
 */

import { fingerprintQuestion } from '@/domain/history/fingerprint';
import { parseQuestionMarker } from './parseQuestions';
import type { DedupInput, DedupOutcome, NumberedQuestion } from './types';

/**
 * Accept up to `desiredCount` candidates whose fingerprint is not yet in
 * `history`. Fingerprints cover the body only, so the model's own numbering
 * does not affect duplicate detection. Accepted fingerprints are appended to
 * `history` in place; candidates without any text are skipped.
 */
export function acceptNewQuestions(input: DedupInput): DedupOutcome {
  const { candidates, history, desiredCount, startNumber, stripDecimalMarker } = input;

  if (candidates.length === 0) {
    return { kind: 'empty', reason: 'The response contained no recognizable questions.' };
  }

  const seen = new Set(history);
  const questions: NumberedQuestion[] = [];
  const fingerprints: string[] = [];

  for (const candidate of candidates) {
    if (questions.length >= desiredCount) break;

    const { body } = parseQuestionMarker(candidate, { stripDecimalMarker });
    if (!body.trim()) continue;

    const fingerprint = fingerprintQuestion(body);
    if (seen.has(fingerprint)) continue;

    seen.add(fingerprint);
    history.push(fingerprint);
    fingerprints.push(fingerprint);
    questions.push({ number: startNumber + questions.length, body });
  }

  if (questions.length === 0) {
    return { kind: 'empty', reason: 'All generated questions were duplicates.' };
  }

  return { kind: 'accepted', questions, fingerprints };
}
