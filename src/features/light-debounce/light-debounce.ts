/**
 * Light debounce pre-filter
 *
 * Optional filter upstream of the light cycle verifier. A raw change is only
 * released once it has held for minPhaseSec; the released transition keeps
 * the time the change began so no on-time is lost. With minPhaseSec = 0 every
 * change passes straight through.
 */

import type { LightDebounceResult, LightDebounceState } from './types';

/**
 * Initial debounce state
 * @returns State with nothing accepted or pending
 */
export function createLightDebounceState(): LightDebounceState {
  return { accepted: null, pending: null };
}

/**
 * Feed a raw light state (or a tick) through the debounce
 *
 * @param state - Current debounce state (not mutated)
 * @param raw - Raw light state; null when unavailable; undefined for a time tick
 * @param now - Current timestamp in seconds
 * @param minPhaseSec - Required hold time (0 disables)
 * @returns Next state and the transition released, if any
 *
 * @remarks
 * Unavailable is released immediately. A revert to the accepted state before
 * the hold time elapses cancels the pending change.
 */
export function updateLightDebounce(
  state: LightDebounceState,
  raw: boolean | null | undefined,
  now: number,
  minPhaseSec: number
): LightDebounceResult {
  let pending = state.pending;

  if (raw === null) {
    if (state.accepted === null) {
      return { state: { accepted: null, pending: null }, accepted: null };
    }
    return { state: { accepted: null, pending: null }, accepted: { on: null, timestamp: now } };
  }

  if (raw !== undefined) {
    if (raw === state.accepted) {
      pending = null;
    } else if (!pending || pending.on !== raw) {
      pending = { on: raw, since: now };
    }
  }

  if (pending && now - pending.since >= minPhaseSec) {
    return {
      state: { accepted: pending.on, pending: null },
      accepted: { on: pending.on, timestamp: pending.since }
    };
  }

  return { state: { accepted: state.accepted, pending: pending }, accepted: null };
}
