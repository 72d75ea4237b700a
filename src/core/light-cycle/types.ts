/**
 * Light cycle verifier type definitions
 */

// ═══════════════════════════════════════════════════════════════
// PHASE TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Current light phase ('unknown' while the light sensor is unavailable)
 */
export type LightPhase = 'on' | 'off' | 'unknown';

/**
 * A completed on or off phase
 */
export interface PhaseRecord {
  phase: 'on' | 'off';
  start: number;
  end: number;
  durationSec: number;
  /** UTC calendar day the phase started (YYYY-MM-DD) */
  day: string;
}

// ═══════════════════════════════════════════════════════════════
// WINDOW TYPES
// ═══════════════════════════════════════════════════════════════

export type LightScheduleStatus = 'correct' | 'incorrect' | 'unknown';

/**
 * Outcome of one closed window
 */
export interface LightWindowResult {
  start: number;
  end: number;
  /** Total on-time inside the window (null when the window was not fully observed) */
  observedOnSec: number | null;
  expectedOnSec: number;
  status: LightScheduleStatus;
}

/**
 * Verifier settings
 */
export interface LightCycleConfig {
  toleranceSec: number;
  /** UTC hour windows roll over at; null anchors windows to the first transition */
  rolloverHourUtc: number | null;
}

/**
 * Verifier state, threaded through every operation
 */
export interface LightCycleState {
  phase: LightPhase;
  /** When the current phase began (null before the first known state) */
  phaseStart: number | null;
  /** Open window bounds (null until the first known state) */
  windowStart: number | null;
  windowEnd: number | null;
  /** Open window is the partial lead-in before the first rollover */
  windowPartial: boolean;
  /** Light state was unavailable at some point in the open window */
  windowGap: boolean;
  /** Phases exited since the open window began */
  log: PhaseRecord[];
  expectedOnSec: number;
  status: LightScheduleStatus;
  lastWindow: LightWindowResult | null;
}

/**
 * Published light-schedule verdict
 */
export interface LightCycleVerdict {
  status: LightScheduleStatus;
  observedOnSec: number | null;
  expectedOnSec: number;
}
