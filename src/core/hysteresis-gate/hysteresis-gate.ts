/**
 * Hysteresis gate
 *
 * Turns a posterior time series into a stable boolean with a dead-band and an
 * optional minimum dwell. States are {false, true} x {fresh, stale}; the gate
 * starts false/stale and never terminates.
 */

import { GateValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';
import { classifyPosterior, dwellElapsed, toVerdict } from './helpers';

import type { PosteriorEstimate } from '@core/bayesian-estimator';
import type { GateConfig, GateState, GateUpdate } from './types';

/**
 * Validate gate thresholds and dwell
 * @param config - Gate configuration
 * @param context - Label for error messages
 * @throws {GateValidationError} Unless 0 < off < on < 1 and dwell >= 0
 */
export function validateGateConfig(config: GateConfig, context: string): void {
  const on = config.turnOnThreshold;
  const off = config.turnOffThreshold;

  if (!isFiniteNumber(on) || on <= 0 || on >= 1) {
    throw new GateValidationError(context + ': turn-on threshold must be between 0 and 1 (got ' + on + ')');
  }
  if (!isFiniteNumber(off) || off <= 0 || off >= 1) {
    throw new GateValidationError(context + ': turn-off threshold must be between 0 and 1 (got ' + off + ')');
  }
  if (on <= off) {
    throw new GateValidationError(context + ': turn-on threshold must exceed turn-off threshold (got ' + on + ' <= ' + off + ')');
  }
  if (!isFiniteNumber(config.minDwellSec) || config.minDwellSec < 0) {
    throw new GateValidationError(context + ': minimum dwell must be non-negative (got ' + config.minDwellSec + ')');
  }
}

/**
 * Initial gate state: false, stale, no evidence
 * @returns Fresh gate state
 */
export function createGateState(): GateState {
  return {
    verdict: false,
    hasEvidence: false,
    fresh: false,
    changedAt: null,
    raw: 'unknown',
    rawSince: null,
    probability: null
  };
}

/**
 * Feed one estimate through the gate
 *
 * @param state - Current gate state (not mutated)
 * @param estimate - Latest posterior estimate
 * @param now - Current timestamp in seconds
 * @param config - Gate thresholds and dwell
 * @returns Published verdict and the next state
 *
 * @remarks
 * **Dead-band**: false -> true only when the posterior is >= turnOnThreshold,
 * true -> false only when it is <= turnOffThreshold; between them the verdict holds.
 *
 * **Dwell**: the new raw classification must have held continuously for
 * minDwellSec. A classification change restarts the clock.
 *
 * **Insufficient data**: never forces a transition. The verdict is held and
 * marked stale, and dwell continuity is broken.
 *
 * @example
 * ```typescript
 * let gate = createGateState();
 * const result = updateGate(gate, estimate, now, { turnOnThreshold: 0.7, turnOffThreshold: 0.55, minDwellSec: 120 });
 * gate = result.state;
 * ```
 */
export function updateGate(
  state: GateState,
  estimate: PosteriorEstimate,
  now: number,
  config: GateConfig
): GateUpdate {
  const raw = classifyPosterior(estimate, config);

  if (estimate.kind === 'insufficient') {
    const next: GateState = { ...state, fresh: false, raw: raw, rawSince: null };
    return { verdict: toVerdict(next, false), state: next };
  }

  const rawSince = raw === state.raw && state.rawSince !== null ? state.rawSince : now;
  const next: GateState = {
    ...state,
    hasEvidence: true,
    fresh: true,
    raw: raw,
    rawSince: rawSince,
    probability: estimate.probability
  };

  const settled = dwellElapsed(rawSince, now, config.minDwellSec);
  let changed = false;

  if (!state.verdict && raw === 'high' && settled) {
    next.verdict = true;
    changed = true;
  } else if (state.verdict && raw === 'low' && settled) {
    next.verdict = false;
    changed = true;
  }

  if (changed) {
    next.changedAt = now;
  }

  return { verdict: toVerdict(next, changed), state: next };
}
