/**
 * Threshold profile type definitions
 */

import type { NumericVariable } from '$types/common';

// ═══════════════════════════════════════════════════════════════
// PROFILE TYPES
// Ideal ranges per variable
// ═══════════════════════════════════════════════════════════════

/**
 * Ideal range for one variable
 */
export interface VariableRange {
  /** Lower bound of the ideal range */
  min: number;
  /** Upper bound of the ideal range */
  max: number;
  /** Distance outside the range that counts as one normalized unit */
  tolerance: number;
}

/**
 * Ideal ranges for every numeric variable at one (stage, phase)
 */
export type ThresholdProfile = Readonly<Record<NumericVariable, VariableRange>>;

/**
 * Where a value sits relative to its ideal range
 */
export type DeviationSide = 'below' | 'inside' | 'above';

// ═══════════════════════════════════════════════════════════════
// TABLE TYPES
// Static lookup data keyed by stage
// ═══════════════════════════════════════════════════════════════

/**
 * Day profile plus optional night profile (falls back to day)
 */
export interface PhaseProfiles {
  day: ThresholdProfile;
  night?: ThresholdProfile;
}

/**
 * Profiles that replace the base entry once a stage has run long enough
 */
export interface LateVariant extends PhaseProfiles {
  /** Stage age in whole days from which the variant applies */
  afterDays: number;
}

export interface StageProfileEntry extends PhaseProfiles {
  late?: LateVariant;
}
