/**
 * Relevance Extractor
 *
 * Picks the sentences of the reference material that mention a unit's
 * keywords, bounded to a character budget. Matching is a plain
 * case-insensitive substring test.
 */

import { POSITIONAL_KEYWORDS, DEFAULT_RELEVANCE_CONFIG, type RelevanceConfig } from './types';

/**
 * Derive search keywords from a unit descriptor
 */
export function extractUnitKeywords(
  unit: string,
  config: Partial<RelevanceConfig> = {},
): string[] {
  const { maxKeywords, stopWords } = { ...DEFAULT_RELEVANCE_CONFIG, ...config };
  const lines = unit.split('\n');
  const unitName = lines[0].trim().split(':')[0].trim().toUpperCase();
  const description = lines.join(' ').toLowerCase();

  const stopSet = new Set(stopWords);
  const keywords: string[] = [];
  for (const word of description.match(/\b[a-z]{4,}\b/g) ?? []) {
    if (keywords.length >= maxKeywords) break;
    if (stopSet.has(word) || keywords.includes(word)) continue;
    keywords.push(word);
  }

  const nameKeyword = unitName.toLowerCase().replace('unit ', '');
  if (nameKeyword) {
    keywords.push(nameKeyword);
  }

  // Only a unit with neither words nor a name falls back to topic words
  if (keywords.length === 0) {
    const position = unitName.replace('UNIT', '').trim();
    const positional = POSITIONAL_KEYWORDS[position];
    if (positional) return [...positional];
    return unitName ? [unitName.toLowerCase()] : [];
  }

  return keywords;
}

/**
 * Extract the portion of the reference text relevant to a unit
 */
export function extractRelevantContent(
  fullText: string,
  unit: string,
  config: Partial<RelevanceConfig> = {},
): string {
  const fullConfig = { ...DEFAULT_RELEVANCE_CONFIG, ...config };
  const keywords = extractUnitKeywords(unit, fullConfig).map((k) => k.toLowerCase());

  const kept: string[] = [];
  let keptLength = 0;
  let firstMatch: string | null = null;

  for (const sentence of fullText.split('.')) {
    const lower = sentence.toLowerCase();
    if (!keywords.some((keyword) => lower.includes(keyword))) continue;

    const trimmed = sentence.trim();
    if (firstMatch === null) firstMatch = trimmed;

    // Stop before the sentence that would cross the budget
    if (keptLength + trimmed.length > fullConfig.maxChars) break;

    kept.push(trimmed);
    keptLength += trimmed.length;
  }

  if (firstMatch === null) {
    return fullText.slice(0, fullConfig.fallbackChars);
  }

  if (kept.length === 0) {
    return firstMatch.slice(0, fullConfig.maxChars);
  }

  return kept.join('. ').slice(0, fullConfig.maxChars);
}
