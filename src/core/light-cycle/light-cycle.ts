/**
 * Light cycle verifier
 *
 * Tracks light on/off phases and checks the total on-time of each 24h window
 * against the stage's expected schedule. Every transition is one phase,
 * however short; flapping is surfaced, not filtered.
 */

import { LightCycleValidationError } from '$types/errors';
import { TIME_CONSTANTS } from '@utils/constants';
import { isFiniteNumber, isInteger } from '@utils/number';
import { formatDateUTC } from '@utils/time';
import { firstWindowEnd, judgeWindow, pruneLog, sumOnSeconds } from './helpers';

import type { LightCycleConfig, LightCycleState, LightCycleVerdict, LightPhase, LightWindowResult } from './types';

/**
 * Validate verifier settings
 * @param config - Verifier settings
 * @param expectedOnSec - Expected on-time for the current stage
 * @throws {LightCycleValidationError} On out-of-range values
 */
export function validateLightCycleConfig(config: LightCycleConfig, expectedOnSec: number): void {
  if (!isFiniteNumber(config.toleranceSec) || config.toleranceSec < 0) {
    throw new LightCycleValidationError('light: tolerance must be non-negative (got ' + config.toleranceSec + ')');
  }
  if (config.rolloverHourUtc !== null && (!isInteger(config.rolloverHourUtc) || config.rolloverHourUtc < 0 || config.rolloverHourUtc > 23)) {
    throw new LightCycleValidationError('light: rollover hour must be an integer 0-23 (got ' + config.rolloverHourUtc + ')');
  }
  if (!isFiniteNumber(expectedOnSec) || expectedOnSec < 0 || expectedOnSec > TIME_CONSTANTS.SECONDS_PER_DAY) {
    throw new LightCycleValidationError('light: expected on-time must be within one day (got ' + expectedOnSec + ')');
  }
}

/**
 * Initial verifier state: no phase known, no window open
 * @param expectedOnSec - Expected on-time per window
 * @returns Verifier state
 */
export function createLightCycleState(expectedOnSec: number): LightCycleState {
  return {
    phase: 'unknown',
    phaseStart: null,
    windowStart: null,
    windowEnd: null,
    windowPartial: false,
    windowGap: false,
    log: [],
    expectedOnSec: expectedOnSec,
    status: 'unknown',
    lastWindow: null
  };
}

/**
 * Close every window whose end is at or before a timestamp
 *
 * @param state - Verifier state (not mutated)
 * @param now - Current timestamp in seconds
 * @param config - Verifier settings
 * @returns State with due windows closed
 *
 * @remarks
 * A partial lead-in window or a window with an unavailable stretch closes
 * as unknown. An unknown window never clears an incorrect verdict: it holds
 * until a later window is within tolerance or the stage changes, and the
 * published on-time stays that of the incorrect window.
 */
export function advanceLightCycle(state: LightCycleState, now: number, config: LightCycleConfig): LightCycleState {
  let next = state;

  while (next.windowStart !== null && next.windowEnd !== null && now >= next.windowEnd) {
    const start = next.windowStart;
    const end = next.windowEnd;
    const observed = sumOnSeconds(next, start, end);
    const complete = !next.windowPartial && !next.windowGap;

    const result: LightWindowResult = {
      start: start,
      end: end,
      observedOnSec: complete ? observed : null,
      expectedOnSec: next.expectedOnSec,
      status: complete ? judgeWindow(observed, next.expectedOnSec, config.toleranceSec) : 'unknown'
    };

    const holdIncorrect = result.status === 'unknown' && next.status === 'incorrect';

    next = {
      ...next,
      windowStart: end,
      windowEnd: end + TIME_CONSTANTS.SECONDS_PER_DAY,
      windowPartial: false,
      windowGap: next.phase === 'unknown',
      log: pruneLog(next.log, end),
      status: holdIncorrect ? 'incorrect' : result.status,
      lastWindow: holdIncorrect ? next.lastWindow : result
    };
  }

  return next;
}

/**
 * Record a light state change
 *
 * @param state - Verifier state (not mutated)
 * @param on - New light state; null when the sensor is unavailable
 * @param timestamp - Event timestamp in seconds
 * @param config - Verifier settings
 * @returns Updated state
 *
 * @remarks
 * The first known state opens the first window. A repeat of the current
 * state is ignored. Windows due before the change are closed first. A
 * timestamp before the current phase or the open window is moved up to
 * it; a window that has already closed is never re-judged.
 */
export function recordLightChange(
  state: LightCycleState,
  on: boolean | null,
  timestamp: number,
  config: LightCycleConfig
): LightCycleState {
  let t = timestamp;
  if (state.phaseStart !== null) t = Math.max(t, state.phaseStart);
  if (state.windowStart !== null) t = Math.max(t, state.windowStart);
  const closed = advanceLightCycle(state, t, config);

  let phase: LightPhase = 'unknown';
  if (on !== null) {
    phase = on ? 'on' : 'off';
  }

  if (phase === closed.phase) {
    return closed;
  }

  const next: LightCycleState = { ...closed, log: closed.log.slice(), phase: phase, phaseStart: t };

  if (closed.phase !== 'unknown' && closed.phaseStart !== null) {
    next.log.push({
      phase: closed.phase,
      start: closed.phaseStart,
      end: t,
      durationSec: t - closed.phaseStart,
      day: formatDateUTC(closed.phaseStart)
    });
  }

  if (phase === 'unknown') {
    if (next.windowStart !== null) {
      next.windowGap = true;
    }
    return next;
  }

  if (next.windowStart === null) {
    next.windowStart = t;
    next.windowEnd = firstWindowEnd(t, config);
    next.windowPartial = config.rolloverHourUtc !== null;
    next.windowGap = false;
  }

  return next;
}

/**
 * Reset the verifier for a new stage
 *
 * @param state - Verifier state (not mutated)
 * @param expectedOnSec - Expected on-time for the new stage
 * @param now - Stage change timestamp
 * @param config - Verifier settings
 * @returns State with an empty log and an unknown verdict
 *
 * @remarks
 * The log from the previous stage is discarded so it is never compared
 * against the new expectation. If the light state is known, a fresh window
 * opens at the stage change.
 */
export function changeStage(
  state: LightCycleState,
  expectedOnSec: number,
  now: number,
  config: LightCycleConfig
): LightCycleState {
  const fresh = createLightCycleState(expectedOnSec);

  if (state.phase === 'unknown') {
    return fresh;
  }

  return {
    ...fresh,
    phase: state.phase,
    phaseStart: now,
    windowStart: now,
    windowEnd: firstWindowEnd(now, config),
    windowPartial: config.rolloverHourUtc !== null
  };
}

/**
 * Published view of the verifier
 * @param state - Verifier state
 * @returns Status with observed and expected on-time
 */
export function getLightVerdict(state: LightCycleState): LightCycleVerdict {
  return {
    status: state.status,
    observedOnSec: state.lastWindow ? state.lastWindow.observedOnSec : null,
    expectedOnSec: state.expectedOnSec
  };
}
