/**
 * Light debounce type definitions
 */

/**
 * A light change waiting to be confirmed
 */
export interface PendingLightChange {
  on: boolean;
  /** When the raw change was first seen */
  since: number;
}

/**
 * Debounce state
 */
export interface LightDebounceState {
  /** Last accepted state (null = unknown / unavailable) */
  accepted: boolean | null;
  pending: PendingLightChange | null;
}

/**
 * Transition released to the verifier
 */
export interface AcceptedLightChange {
  on: boolean | null;
  /** Back-dated to when the change began */
  timestamp: number;
}

export interface LightDebounceResult {
  state: LightDebounceState;
  /** Accepted transition, or null when nothing was released */
  accepted: AcceptedLightChange | null;
}
