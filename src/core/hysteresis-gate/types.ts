/**
 * Hysteresis gate type definitions
 */

/**
 * Pre-hysteresis classification of the latest estimate
 * - high: posterior at or above the turn-on threshold
 * - low: posterior at or below the turn-off threshold
 * - band: inside the dead-band
 * - unknown: insufficient data
 */
export type RawClassification = 'high' | 'low' | 'band' | 'unknown';

/**
 * Gate thresholds and dwell
 */
export interface GateConfig {
  turnOnThreshold: number;
  turnOffThreshold: number;
  minDwellSec: number;
}

/**
 * Owned gate state, threaded through updateGate
 */
export interface GateState {
  /** Held boolean verdict */
  verdict: boolean;
  /** Whether any numeric estimate has ever arrived */
  hasEvidence: boolean;
  /** False while holding the verdict on insufficient data */
  fresh: boolean;
  /** Timestamp the held verdict last changed (null = never) */
  changedAt: number | null;
  raw: RawClassification;
  /** Timestamp the current raw classification began (null = no continuity) */
  rawSince: number | null;
  /** Posterior from the latest numeric estimate */
  probability: number | null;
}

/**
 * Verdict as published to consumers
 */
export interface GateVerdict {
  value: boolean | 'unknown';
  stale: boolean;
  /** The held boolean flipped on this update */
  changed: boolean;
  changedAt: number | null;
  /** Current posterior (null on insufficient data) */
  probability: number | null;
}

export interface GateUpdate {
  verdict: GateVerdict;
  state: GateState;
}
