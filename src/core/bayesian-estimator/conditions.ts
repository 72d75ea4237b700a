/**
 * Evidence source lists for each published condition
 *
 * Stress and mold differ only in which variables they read and the direction
 * of each ratio. Optimal inverts the mapping: in range favors the condition.
 * Trend sources only speak once a variable has enough history in the window;
 * until then the range source for the same variable carries its evidence.
 * In dry and cure stages the profiles describe drying and curing air, so
 * "optimal" there means good drying or curing conditions.
 */

import { createRangeEvidence, createStateEvidence, createTrendEvidence } from './evidence';

import type { ConditionName } from '$types/common';
import type { EvidenceContext, EvidenceSource } from './types';

/**
 * Dehumidifier running while the air is already too dry
 * @param context - Evaluation context
 * @returns null when neither humidity nor VPD is known
 */
function airAlreadyDry(context: EvidenceContext): boolean | null {
  const humidity = context.readings.numeric.humidity;
  const vpd = context.readings.numeric.vpd;
  if (humidity === undefined && vpd === undefined) return null;

  return (humidity !== undefined && humidity < context.profile.humidity.min) ||
    (vpd !== undefined && vpd > context.profile.vpd.max);
}

/**
 * Equipment running while humidity is still above range
 * @param context - Evaluation context
 * @returns null when humidity is not known
 */
function airStillHumid(context: EvidenceContext): boolean | null {
  const humidity = context.readings.numeric.humidity;
  if (humidity === undefined) return null;

  return humidity > context.profile.humidity.max;
}

export const CONDITION_SOURCES: Readonly<Record<ConditionName, readonly EvidenceSource[]>> = {
  stress: [
    createRangeEvidence('temperature', { side: 'both', atIdeal: 1, atExtreme: 6 }),
    createRangeEvidence('humidity', { side: 'both', atIdeal: 1, atExtreme: 4 }),
    createRangeEvidence('vpd', { side: 'both', atIdeal: 1, atExtreme: 4 }),
    createRangeEvidence('co2', { side: 'both', atIdeal: 1, atExtreme: 3 }),
    createStateEvidence('dehumidifier_state', {
      whenOn: 4,
      whenOff: 1,
      requires: airAlreadyDry,
      reason: 'Active desiccation (dehumidifier on, air already dry)'
    }),
    createStateEvidence('humidifier_state', {
      whenOn: 4,
      whenOff: 1,
      requires: airStillHumid,
      reason: 'Active saturation (humidifier on, humidity above range)'
    }),
    createTrendEvidence('temperature', { direction: 'rising', whenTrending: 2.4, beyond: 'above' }),
    createTrendEvidence('humidity', { direction: 'rising', whenTrending: 2.4, beyond: 'above' }),
    createTrendEvidence('vpd', { direction: 'rising', whenTrending: 2.4, beyond: 'above' })
  ],
  mold: [
    createRangeEvidence('humidity', { side: 'above', atIdeal: 1, atExtreme: 6, nightWeight: 1.5 }),
    createRangeEvidence('vpd', { side: 'below', atIdeal: 1, atExtreme: 5, nightWeight: 1.5 }),
    createStateEvidence('fan_state', { whenOn: 1, whenOff: 5.3, nightWeight: 1.5 }),
    createStateEvidence('dehumidifier_state', {
      whenOn: 3,
      whenOff: 1,
      requires: airStillHumid,
      reason: 'Dehumidifier ineffective (on, humidity above range)'
    }),
    createStateEvidence('humidifier_state', {
      whenOn: 3,
      whenOff: 1,
      requires: airStillHumid,
      reason: 'Humidifier on while humidity above range'
    }),
    createTrendEvidence('humidity', { direction: 'rising', whenTrending: 2.4 }),
    createTrendEvidence('vpd', { direction: 'falling', whenTrending: 2.4 })
  ],
  optimal: [
    createRangeEvidence('temperature', { side: 'both', atIdeal: 3, atExtreme: 0.25 }),
    createRangeEvidence('humidity', { side: 'both', atIdeal: 3, atExtreme: 0.25 }),
    createRangeEvidence('vpd', { side: 'both', atIdeal: 3, atExtreme: 0.25 }),
    createRangeEvidence('co2', { side: 'both', atIdeal: 2, atExtreme: 0.5 }),
    createStateEvidence('dehumidifier_state', { whenOn: 0.57, whenOff: 1 })
  ]
};
