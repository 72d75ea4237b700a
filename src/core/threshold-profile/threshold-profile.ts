/**
 * ThresholdProfile resolver
 *
 * Selects the ideal ranges for a growth stage and day/night phase.
 * Lookups are total: the table is validated when it is loaded.
 */

import type { DayNightPhase, GrowthStage } from '$types/common';
import type { ProfileTable } from './table';
import type { PhaseProfiles, ThresholdProfile } from './types';

/**
 * Pick the day or night profile, falling back to day
 * @param profiles - Day/night pair
 * @param phase - Current phase
 * @returns Matching profile
 */
function pickPhase(profiles: PhaseProfiles, phase: DayNightPhase): ThresholdProfile {
  if (phase === 'night' && profiles.night) {
    return profiles.night;
  }
  return profiles.day;
}

/**
 * Resolve the threshold profile for a stage and phase
 *
 * @param table - Validated profile table
 * @param stage - Current growth stage
 * @param phase - Current day/night phase
 * @param stageAgeDays - Whole days since the stage started (omit when unknown)
 * @returns Profile for this evaluation
 *
 * @remarks
 * **Fallback**: a missing night profile resolves to the day profile.
 *
 * **Late variant**: once `stageAgeDays >= late.afterDays` the late variant
 * replaces the base entry; its own night falls back to its own day.
 *
 * Nothing is cached, so a stage or phase change shows on the next call.
 */
export function resolveProfile(
  table: ProfileTable,
  stage: GrowthStage,
  phase: DayNightPhase,
  stageAgeDays?: number
): ThresholdProfile {
  const entry = table[stage];

  if (entry.late && stageAgeDays !== undefined && stageAgeDays >= entry.late.afterDays) {
    return pickPhase(entry.late, phase);
  }

  return pickPhase(entry, phase);
}
