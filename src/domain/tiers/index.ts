export type {
  OneMarkNumbering,
  TierContext,
  TierDefinition,
  TierResult,
  TierSection,
  UnitOutcome,
} from './types';
export {
  DEFAULT_UNIT_DELAY_MS,
  ONE_MARK_TIER,
  SIX_MARK_DISTRIBUTION,
  SIX_MARK_START,
  SIX_MARK_TIER,
  SIX_MARK_TOTAL,
  TWELVE_MARK_PER_UNIT,
  TWELVE_MARK_START,
  TWELVE_MARK_TIER,
  TWELVE_MARK_TOTAL,
} from './definitions';
export { buildTierResult, placeholderRecords, renderRecords } from './assemble';
export { createSeed, generateUnitQuestions } from './generateUnitQuestions';
export type { OneMarkOptions } from './oneMark';
export { generateOneMarkTier } from './oneMark';
export { generateSixMarkTier, generateTwelveMarkTier } from './descriptiveTiers';
