/**
 * TimerAPI backed by Node's global timers
 *
 * Handles are unref'd so a pending drain never keeps the process alive.
 */

import type { TimerAPI } from '../types';

export const nodeTimers: TimerAPI = {
  set(intervalMs: number, repeat: boolean, callback: () => void): () => void {
    if (repeat) {
      const handle = setInterval(callback, intervalMs);
      handle.unref();
      return function cancel() {
        clearInterval(handle);
      };
    }
    const handle = setTimeout(callback, intervalMs);
    handle.unref();
    return function cancel() {
      clearTimeout(handle);
    };
  }
};
