/**
 * Console output sink with rate-limited buffering
 *
 * Messages are buffered up to a configurable limit and written out in
 * small batches on a timer, so a burst of verdict changes across many
 * growspaces does not block the event loop on stdout. A full buffer is
 * written out on the spot, so a synchronous run that never yields to the
 * timer still loses no lines.
 */

import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI, TimerAPI } from '../types';

/**
 * Create a console sink with buffering
 *
 * @param timerApi - Timer API for scheduling the drain
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (bufferSize, drainInterval, drainBatch)
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(nodeTimers, console, {
 *   bufferSize: 200,
 *   drainInterval: 50,
 *   drainBatch: 20
 * });
 * consoleSink.initialize(() => {});
 * consoleSink.write('growspace tent-a: mold -> true');
 * ```
 */
export function createConsoleSink(
  timerApi: TimerAPI,
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): ConsoleSink {
  const buffer: string[] = [];
  let cancelDrain: (() => void) | null = null;

  /**
   * Drain up to drainBatch messages from the buffer
   */
  function drain() {
    const count = Math.min(buffer.length, config.drainBatch);
    const batch = buffer.splice(0, count);
    for (let i = 0; i < batch.length; i++) {
      consoleApi.log(batch[i]);
    }
  }

  function write(formattedMessage: string) {
    if (buffer.length >= config.bufferSize) {
      flush();
    }
    buffer.push(formattedMessage);
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  function flush(): void {
    while (buffer.length > 0) {
      drain();
    }
  }

  /**
   * Start the drain timer (idempotent)
   * @param callback - Called with (success, message)
   */
  function initialize(callback: (success: boolean, message: string) => void): void {
    if (cancelDrain === null) {
      cancelDrain = timerApi.set(config.drainInterval, true, drain);
    }
    callback(true, 'Console sink initialized');
  }

  function dispose(): void {
    flush();
    if (cancelDrain !== null) {
      cancelDrain();
      cancelDrain = null;
    }
  }

  return {
    write: write,
    initialize: initialize,
    getBufferSize: getBufferSize,
    flush: flush,
    dispose: dispose
  };
}
