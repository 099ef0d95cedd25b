export type { RelevanceConfig } from './types';
export { DEFAULT_RELEVANCE_CONFIG, DEFAULT_STOP_WORDS, POSITIONAL_KEYWORDS } from './types';
export { extractRelevantContent, extractUnitKeywords } from './extractRelevantContent';
