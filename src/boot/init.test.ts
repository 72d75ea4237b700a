/**
 * Tests for engine initialization
 */

import { initialize } from './init';
import { createGrowspaceConfig } from './config';

import type { Mock } from 'vitest';
import type { ConsoleAPI, TimerAPI } from '@logging';

describe('initialize', () => {
  let log: Mock<ConsoleAPI['log']>;
  let warn: Mock<ConsoleAPI['warn']>;
  let set: Mock<TimerAPI['set']>;
  let cancel: Mock<() => void>;
  let consoleApi: ConsoleAPI;
  let timerApi: TimerAPI;

  function logged(): string[] {
    return log.mock.calls.map((call) => call[0]);
  }

  function warned(): string[] {
    return warn.mock.calls.map((call) => call[0]);
  }

  beforeEach(() => {
    log = vi.fn<ConsoleAPI['log']>();
    warn = vi.fn<ConsoleAPI['warn']>();
    cancel = vi.fn<() => void>();
    set = vi.fn<TimerAPI['set']>(() => cancel);
    consoleApi = { log, warn };
    timerApi = { set };
  });

  it('should start an engine for a valid growspace', () => {
    const engine = initialize([createGrowspaceConfig('tent-a')], { consoleApi, timerApi, timeSource: () => 0 });

    expect(engine).not.toBeNull();
    expect(engine?.registry.ids()).toEqual(['tent-a']);

    engine?.dispose();
    expect(logged()).toEqual([
      'ℹ️ [INFO]     🌱 Growspace inference engine',
      'ℹ️ [INFO]     Growspace tent-a registered',
      'ℹ️ [INFO]     📋 1 growspace(s): tent-a'
    ]);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('should drain the console on the timer', () => {
    initialize([createGrowspaceConfig('tent-a')], { consoleApi, timerApi, timeSource: () => 0 });

    expect(set).toHaveBeenCalledWith(50, true, expect.any(Function));
    expect(log).not.toHaveBeenCalled();

    const drain = set.mock.calls[0][2];
    drain();

    expect(log).toHaveBeenCalledTimes(3);
  });

  it('should skip an invalid growspace and keep the rest', () => {
    const engine = initialize([
      createGrowspaceConfig('tent-a', { conditions: { stress: { prior: 0 } } }),
      createGrowspaceConfig('tent-b')
    ], { consoleApi, timerApi, timeSource: () => 0 });

    expect(engine?.registry.ids()).toEqual(['tent-b']);
    expect(warned()).toEqual([
      'INIT FAIL: Invalid configuration for growspace "tent-a"',
      '  [conditions.stress.prior]: conditions.stress.prior must be strictly between 0 and 1 (got 0)'
    ]);
  });

  it('should return null when no growspace is valid', () => {
    const engine = initialize([createGrowspaceConfig('')], { consoleApi, timerApi });

    expect(engine).toBeNull();
    expect(warned()).toContain('INIT FAIL: No valid growspace configuration');
    expect(set).not.toHaveBeenCalled();
  });

  it('should print recommended-range warnings and still start', () => {
    const engine = initialize(
      [createGrowspaceConfig('tent-a', { light: { toleranceSec: 60 } })],
      { consoleApi, timerApi, timeSource: () => 0 }
    );

    expect(engine).not.toBeNull();
    expect(warned()).toEqual([
      '  [tent-a.light.toleranceSec]: light.toleranceSec is outside recommended range 300-3600 (got 60)'
    ]);
  });

  it('should reject a duplicate growspace id', () => {
    const engine = initialize(
      [createGrowspaceConfig('tent-a'), createGrowspaceConfig('tent-a')],
      { consoleApi, timerApi, timeSource: () => 0 }
    );

    expect(engine?.registry.ids()).toEqual(['tent-a']);
    engine?.dispose();
    expect(logged()).toContain('🚨 [CRITICAL] Growspace tent-a rejected: registry: growspace already registered (got tent-a)');
  });

  it('should pass debug lines through at level 0', () => {
    const engine = initialize([createGrowspaceConfig('tent-a')], { consoleApi, timerApi, timeSource: () => 0, logLevel: 0 });

    engine?.registry.dispatch({ type: 'light_change', growspaceId: 'tent-a', on: true, timestamp: 1710028800 });
    engine?.dispose();

    expect(logged()).toContain('[DEBUG]    [tent-a] light on');
  });
});
