export { resolveProfile } from './threshold-profile';
export { deviationSide, normalizedDistance } from './helpers';
export { parseProfileTable, DEFAULT_PROFILE_TABLE } from './table';
export type { ProfileTable } from './table';
export type {
  VariableRange,
  ThresholdProfile,
  DeviationSide,
  PhaseProfiles,
  LateVariant,
  StageProfileEntry
} from './types';
