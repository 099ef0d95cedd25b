export type { UnitDescriptor, UnitResolution } from './types';
export { DEFAULT_UNITS } from './types';
export {
  getUnitShortName,
  isHoursAnnotation,
  isUnitHeading,
  normalizeUnit,
  resolveUnits,
  segmentUnits,
} from './segmentUnits';
