/**
 * Unit Segmenter
 *
 * Splits raw syllabus text into ordered unit descriptors by recognizing
 * "UNIT I" / "Unit 2" style headings anywhere in a line.
 */

import { DEFAULT_UNITS, type UnitDescriptor, type UnitResolution } from './types';

/**
 * "UNIT" as a whole word followed by a Roman numeral or an Arabic number
 */
const UNIT_HEADING_PATTERN = /\bunit\s*[-–]?\s*(?:[ivxlcdm]+|\d+)\b/i;

/**
 * A line holding nothing but an hour count, e.g. "9 Hrs" or "12 hours"
 */
const HOURS_ONLY_PATTERN = /^\d+\s*(?:hrs|hours)$/i;

export function isUnitHeading(line: string): boolean {
  return UNIT_HEADING_PATTERN.test(line);
}

export function isHoursAnnotation(line: string): boolean {
  return HOURS_ONLY_PATTERN.test(line.trim());
}

/**
 * Collapse whitespace runs to single spaces and trim
 */
export function normalizeUnit(unit: string): string {
  return unit.replace(/\s+/g, ' ').trim();
}

/**
 * Split syllabus text into units.
 * Lines before the first heading are ignored; hour-count lines are dropped.
 */
export function segmentUnits(syllabusText: string): UnitDescriptor[] {
  const units: string[] = [];
  let current = '';

  for (const rawLine of syllabusText.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (isUnitHeading(line)) {
      if (current) {
        units.push(current);
      }
      current = line;
      continue;
    }

    if (!current || !line || isHoursAnnotation(line)) {
      continue;
    }

    current += ` ${line}`;
  }

  if (current) {
    units.push(current);
  }

  return units.map(normalizeUnit).filter((unit) => unit.length > 0);
}

/**
 * Segment a syllabus, substituting DEFAULT_UNITS when no heading is found
 */
export function resolveUnits(syllabusText: string): UnitResolution {
  const units = segmentUnits(syllabusText);

  if (units.length > 0) {
    return { units, usedFallback: false };
  }

  return {
    units: [...DEFAULT_UNITS],
    usedFallback: true,
    warning: 'No units detected in syllabus. Using default unit names.',
  };
}

/**
 * Short name of a unit: the text before the first colon, or the whole unit.
 * Used as the history partition key and as the unit header in the paper.
 */
export function getUnitShortName(unit: UnitDescriptor): string {
  const colonIndex = unit.indexOf(':');
  return (colonIndex === -1 ? unit : unit.slice(0, colonIndex)).trim();
}
