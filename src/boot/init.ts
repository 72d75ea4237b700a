/**
 * Engine initialization
 */

import { USER_CONFIG, APP_CONSTANTS } from './config';
import { createLogger, createConsoleSink, nodeTimers } from '@logging';
import { createRegistry } from '@system/registry';
import { ConfigurationError } from '$types/errors';
import { now } from '@utils/time';
import { validateGrowspaceConfig } from '@validation';

import type { InitMessage } from '@logging';
import type { GrowspaceConfig } from '$types/config';
import type { Engine, InitOptions } from './types';

/**
 * Validate every growspace and start the engine with the valid ones
 *
 * Validation problems are printed straight to the console, since no
 * logger exists yet. A growspace with errors is skipped; the engine only
 * fails to start when none is left.
 *
 * @param growspaceConfigs - One configuration per growspace
 * @param options - Console, timer and clock overrides
 * @returns Running engine, or null when no growspace is valid
 *
 * @example
 * ```typescript
 * const engine = initialize([createGrowspaceConfig('tent-a')]);
 * engine?.registry.dispatch({ type: 'light_change', growspaceId: 'tent-a', on: true, timestamp: now() });
 * ```
 */
export function initialize(growspaceConfigs: GrowspaceConfig[], options: InitOptions = {}): Engine | null {
  const consoleApi = options.consoleApi ?? console;
  const timerApi = options.timerApi ?? nodeTimers;

  const valid: GrowspaceConfig[] = [];
  growspaceConfigs.forEach(function(config) {
    const validation = validateGrowspaceConfig(config);

    if (!validation.valid) {
      consoleApi.warn('INIT FAIL: Invalid configuration for growspace "' + config.id + '"');
      validation.errors.forEach(function(err) {
        consoleApi.warn('  [' + err.field + ']: ' + err.message);
      });
      return;
    }

    validation.warnings.forEach(function(warn) {
      consoleApi.warn('  [' + config.id + '.' + warn.field + ']: ' + warn.message);
    });
    valid.push(config);
  });

  if (valid.length === 0) {
    consoleApi.warn('INIT FAIL: No valid growspace configuration');
    return null;
  }

  // Setup logging
  const consoleSink = createConsoleSink(timerApi, consoleApi, {
    bufferSize: APP_CONSTANTS.CONSOLE_BUFFER_SIZE,
    drainInterval: APP_CONSTANTS.CONSOLE_INTERVAL_MS,
    drainBatch: APP_CONSTANTS.CONSOLE_DRAIN_BATCH
  });

  const logger = createLogger({
    level: options.logLevel ?? USER_CONFIG.GLOBAL_LOG_LEVEL,
    demoteHours: USER_CONFIG.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: options.timeSource ?? now,
    sinks: [{ sink: consoleSink, minLevel: options.logLevel ?? USER_CONFIG.CONSOLE_LOG_LEVEL }]
  }, APP_CONSTANTS.LOG_LEVELS);

  const registry = createRegistry({ logger: logger, profiles: options.profiles });

  logger.initialize(function(_success: boolean, messages: InitMessage[]) {
    logger.info('🌱 Growspace inference engine');

    // Use console directly; the sink that failed may be the console sink
    for (let i = 0; i < messages.length; i++) {
      if (!messages[i].success) {
        consoleApi.warn('⚠️ [WARNING]  ' + messages[i].message);
      }
    }
  });

  valid.forEach(function(config) {
    try {
      registry.add(config);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      logger.critical('Growspace ' + config.id + ' rejected: ' + err.message);
    }
  });

  const ids = registry.ids();
  if (ids.length === 0) {
    consoleSink.dispose();
    consoleApi.warn('INIT FAIL: No valid growspace configuration');
    return null;
  }
  logger.info('📋 ' + ids.length + ' growspace(s): ' + ids.join(', '));

  return {
    registry: registry,
    logger: logger,
    dispose() {
      registry.dispose();
      consoleSink.dispose();
    }
  };
}
