/**
 * Relevance Extraction Types
 */

/**
 * Configuration for keyword derivation and excerpt sizing
 */
export interface RelevanceConfig {
  /** Maximum characters in the returned excerpt */
  maxChars: number;
  /** Characters of raw reference text used when no sentence matches */
  fallbackChars: number;
  /** Maximum distinct keywords taken from the unit description */
  maxKeywords: number;
  /** Words ignored when deriving keywords */
  stopWords: readonly string[];
}

export const DEFAULT_STOP_WORDS: readonly string[] = [
  'the',
  'and',
  'for',
  'with',
  'this',
  'that',
  'from',
  'have',
  'has',
  'are',
  'was',
  'were',
  'unit',
  'units',
];

export const DEFAULT_RELEVANCE_CONFIG: RelevanceConfig = {
  maxChars: 4000,
  fallbackChars: 3000,
  maxKeywords: 10,
  stopWords: DEFAULT_STOP_WORDS,
};

/**
 * Topic keywords by unit position, used when a unit yields no keywords
 */
export const POSITIONAL_KEYWORDS: Readonly<Record<string, readonly string[]>> = {
  I: ['introduction', 'basics', 'fundamentals', 'overview'],
  II: ['supervised', 'regression', 'classification'],
  III: ['unsupervised', 'clustering', 'dimensionality'],
  IV: ['neural', 'network', 'kernel', 'svm'],
  V: ['probabilistic', 'bayesian', 'markov', 'graphical'],
};
