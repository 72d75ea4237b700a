/**
 * Unit tests for console sink
 */

import { createConsoleSink } from './console-sink';
import type { ConsoleSinkConfig, TimerAPI } from '../types';

const CONFIG: ConsoleSinkConfig = {
  bufferSize: 10,
  drainInterval: 100,
  drainBatch: 1
};

describe('createConsoleSink', () => {
  let ticks: Array<() => void>;
  let cancel: ReturnType<typeof vi.fn>;
  let timer: TimerAPI & { set: ReturnType<typeof vi.fn> };
  let out: { log: ReturnType<typeof vi.fn>; warn: ReturnType<typeof vi.fn> };

  function tick(): void {
    for (const fn of ticks) fn();
  }

  beforeEach(() => {
    ticks = [];
    cancel = vi.fn();
    timer = {
      set: vi.fn((_interval: number, _repeat: boolean, callback: () => void) => {
        ticks.push(callback);
        return cancel;
      })
    };
    out = { log: vi.fn(), warn: vi.fn() };
  });

  describe('write', () => {
    test('should buffer messages without writing immediately', () => {
      const sink = createConsoleSink(timer, out, CONFIG);

      sink.write('message 1');
      sink.write('message 2');

      expect(sink.getBufferSize()).toBe(2);
      expect(out.log).not.toHaveBeenCalled();
    });

    test('should write out a full buffer before queuing the next message', () => {
      const sink = createConsoleSink(timer, out, { ...CONFIG, bufferSize: 2 });

      sink.write('first');
      sink.write('second');
      sink.write('third');

      expect(out.log.mock.calls).toEqual([['first'], ['second']]);
      expect(sink.getBufferSize()).toBe(1);
      expect(out.warn).not.toHaveBeenCalled();
    });

    test('should keep every line of a burst when the timer never fires', () => {
      const sink = createConsoleSink(timer, out, { ...CONFIG, bufferSize: 3 });
      sink.initialize(() => {});

      for (let i = 0; i < 10; i++) {
        sink.write('line ' + i);
      }
      sink.dispose();

      expect(out.log.mock.calls.map((c) => c[0])).toEqual([
        'line 0', 'line 1', 'line 2', 'line 3', 'line 4',
        'line 5', 'line 6', 'line 7', 'line 8', 'line 9'
      ]);
      expect(out.warn).not.toHaveBeenCalled();
    });
  });

  describe('initialize', () => {
    test('should set up a repeating timer with the drain interval', () => {
      const sink = createConsoleSink(timer, out, { ...CONFIG, drainInterval: 150 });

      sink.initialize(() => {});

      expect(timer.set).toHaveBeenCalledWith(150, true, expect.any(Function));
    });

    test('should only start the timer once', () => {
      const sink = createConsoleSink(timer, out, CONFIG);

      sink.initialize(() => {});
      sink.initialize(() => {});

      expect(timer.set).toHaveBeenCalledTimes(1);
    });

    test('should report success', () => {
      const sink = createConsoleSink(timer, out, CONFIG);
      const callback = vi.fn();

      sink.initialize(callback);

      expect(callback).toHaveBeenCalledWith(true, 'Console sink initialized');
    });
  });

  describe('drain', () => {
    test('should write drainBatch messages per tick in FIFO order', () => {
      const sink = createConsoleSink(timer, out, { ...CONFIG, drainBatch: 2 });
      sink.write('first');
      sink.write('second');
      sink.write('third');
      sink.initialize(() => {});

      tick();
      expect(out.log.mock.calls).toEqual([['first'], ['second']]);
      expect(sink.getBufferSize()).toBe(1);

      tick();
      expect(out.log).toHaveBeenLastCalledWith('third');
      expect(sink.getBufferSize()).toBe(0);
    });

    test('should do nothing on an empty buffer', () => {
      const sink = createConsoleSink(timer, out, CONFIG);
      sink.initialize(() => {});

      tick();

      expect(out.log).not.toHaveBeenCalled();
    });
  });

  describe('flush and dispose', () => {
    test('flush should write every buffered message', () => {
      const sink = createConsoleSink(timer, out, CONFIG);
      sink.write('a');
      sink.write('b');
      sink.write('c');

      sink.flush();

      expect(out.log).toHaveBeenCalledTimes(3);
      expect(sink.getBufferSize()).toBe(0);
    });

    test('dispose should flush and cancel the timer', () => {
      const sink = createConsoleSink(timer, out, CONFIG);
      sink.initialize(() => {});
      sink.write('pending');

      sink.dispose();

      expect(out.log).toHaveBeenCalledWith('pending');
      expect(cancel).toHaveBeenCalledTimes(1);
    });

    test('dispose without initialize should not cancel anything', () => {
      const sink = createConsoleSink(timer, out, CONFIG);

      sink.dispose();

      expect(cancel).not.toHaveBeenCalled();
    });
  });
});
