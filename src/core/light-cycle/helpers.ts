/**
 * Light cycle helpers
 */

import { TIME_CONSTANTS } from '@utils/constants';
import { nextRolloverBoundary } from '@utils/time';

import type { LightCycleConfig, LightCycleState, LightScheduleStatus, PhaseRecord } from './types';

/**
 * Length of the overlap between two half-open intervals
 * @returns Seconds of overlap (>= 0)
 */
export function overlapSec(aStart: number, aEnd: number, bStart: number, bEnd: number): number {
  return Math.max(0, Math.min(aEnd, bEnd) - Math.max(aStart, bStart));
}

/**
 * Total on-time inside [windowStart, windowEnd), including the open phase
 * @param state - Verifier state
 * @param windowStart - Window start
 * @param windowEnd - Window end
 * @returns On seconds
 */
export function sumOnSeconds(state: LightCycleState, windowStart: number, windowEnd: number): number {
  let total = 0;

  for (const record of state.log) {
    if (record.phase === 'on') {
      total += overlapSec(record.start, record.end, windowStart, windowEnd);
    }
  }

  if (state.phase === 'on' && state.phaseStart !== null) {
    total += overlapSec(state.phaseStart, windowEnd, windowStart, windowEnd);
  }

  return total;
}

/**
 * Compare observed on-time against the expectation
 * @param observedOnSec - On seconds in the window
 * @param expectedOnSec - Expected on seconds
 * @param toleranceSec - Allowed absolute deviation
 * @returns correct when within tolerance, otherwise incorrect
 */
export function judgeWindow(observedOnSec: number, expectedOnSec: number, toleranceSec: number): LightScheduleStatus {
  return Math.abs(observedOnSec - expectedOnSec) <= toleranceSec ? 'correct' : 'incorrect';
}

/**
 * Close time of a window opened at a timestamp
 * @param start - Window start
 * @param config - Verifier settings
 * @returns Window end
 */
export function firstWindowEnd(start: number, config: LightCycleConfig): number {
  if (config.rolloverHourUtc === null) {
    return start + TIME_CONSTANTS.SECONDS_PER_DAY;
  }
  return nextRolloverBoundary(start, config.rolloverHourUtc);
}

/**
 * Drop records that ended before a timestamp
 * @param log - Phase records
 * @param since - Earliest end to keep
 * @returns Remaining records
 */
export function pruneLog(log: PhaseRecord[], since: number): PhaseRecord[] {
  return log.filter(function(record) {
    return record.end > since;
  });
}
