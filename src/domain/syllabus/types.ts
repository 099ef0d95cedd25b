/**
 * Syllabus Domain Types
 */

/**
 * One syllabus unit as a single whitespace-normalized line of text,
 * e.g. "UNIT I: BASICS Intro to X"
 */
export type UnitDescriptor = string;

/**
 * Result of resolving the units of a syllabus
 */
export interface UnitResolution {
  /** Units in syllabus order (never empty) */
  units: UnitDescriptor[];
  /** True when no heading was found and DEFAULT_UNITS were substituted */
  usedFallback: boolean;
  /** Human-readable warning when the fallback was used */
  warning?: string;
}

/**
 * Units used when a syllabus has no recognizable unit headings
 */
export const DEFAULT_UNITS: readonly UnitDescriptor[] = [
  'UNIT I: INTRODUCTION TO COMPILER DESIGN',
  'UNIT II: LEXICAL ANALYSIS AND SYNTAX ANALYSIS',
  'UNIT III: INTERMEDIATE CODE GENERATION',
  'UNIT IV: CODE OPTIMIZATION',
  'UNIT V: CODE GENERATION AND ERROR HANDLING',
];
