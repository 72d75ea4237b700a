/**
 * Hysteresis gate helpers
 */

import type { PosteriorEstimate } from '@core/bayesian-estimator';
import type { GateConfig, GateState, GateVerdict, RawClassification } from './types';

/**
 * Classify an estimate against the dead-band
 * @param estimate - Posterior estimate
 * @param config - Gate thresholds
 * @returns Raw classification
 */
export function classifyPosterior(estimate: PosteriorEstimate, config: GateConfig): RawClassification {
  if (estimate.kind === 'insufficient') return 'unknown';
  if (estimate.probability >= config.turnOnThreshold) return 'high';
  if (estimate.probability <= config.turnOffThreshold) return 'low';
  return 'band';
}

/**
 * Check whether a raw classification has held long enough
 * @param rawSince - When the classification began
 * @param now - Current timestamp in seconds
 * @param minDwellSec - Required hold time
 * @returns True if dwell has elapsed
 */
export function dwellElapsed(rawSince: number | null, now: number, minDwellSec: number): boolean {
  if (rawSince === null) return false;
  return now - rawSince >= minDwellSec;
}

/**
 * Build the published view of a gate state
 * @param state - Gate state after the update
 * @param changed - Whether the held verdict flipped
 * @returns Published verdict
 */
export function toVerdict(state: GateState, changed: boolean): GateVerdict {
  return {
    value: state.hasEvidence ? state.verdict : 'unknown',
    stale: !state.fresh,
    changed: changed,
    changedAt: state.changedAt,
    probability: state.fresh ? state.probability : null
  };
}
