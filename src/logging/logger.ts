/**
 * Engine logger
 *
 * One instance is shared by the registry and every orchestrator; lines
 * from a growspace carry its `[id]` prefix. INFO lines are demoted after
 * a configurable uptime so verdict warnings stand out on long runs.
 */

import { formatLogMessage, shouldLog } from './helpers';
import type { LogLevel, LogLevels, LogSink, Logger, LoggerConfig, LoggerDependencies, InitMessage, SinkWithLevel } from './types';

/**
 * Create a logger instance
 *
 * Each message is checked against the current level and the auto-demotion
 * rule, formatted with a level tag, then written to every sink whose
 * minLevel it meets. A sink that throws does not stop the others.
 *
 * @param config - Logger configuration (level, demoteHours)
 * @param dependencies - External dependencies (timeSource, sinks)
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 24 },
 *   {
 *     timeSource: now,
 *     sinks: [{ sink: consoleSink, minLevel: LOG_LEVELS.INFO }]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.info('growspace tent-a registered');
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const demoteHours = config.demoteHours;
  const timeSource = dependencies.timeSource;
  const sinks: SinkWithLevel[] = dependencies.sinks;
  const startTime = timeSource();

  function log(level: LogLevel, msg: string) {
    const context = {
      currentLevel: currentLevel,
      uptime: timeSource() - startTime,
      demoteHours: demoteHours
    };
    if (!shouldLog(level, context, logLevels)) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg, logLevels);

    for (let i = 0; i < sinks.length; i++) {
      if (level < sinks[i].minLevel) {
        continue;
      }

      try {
        sinks[i].sink.write(formattedMessage);
      } catch (err) {
        console.warn('Logger sink error: ' + String(err));
      }
    }
  }

  function debug(msg: string): void {
    log(logLevels.DEBUG, msg);
  }

  function info(msg: string): void {
    log(logLevels.INFO, msg);
  }

  function warning(msg: string): void {
    log(logLevels.WARNING, msg);
  }

  function critical(msg: string): void {
    log(logLevels.CRITICAL, msg);
  }

  function setLevel(newLevel: LogLevel) {
    currentLevel = newLevel;
  }

  function getLevel(): LogLevel {
    return currentLevel;
  }

  /**
   * Initialize all sinks
   *
   * The callback fires once every sink with an initialize hook has
   * answered. Overall success is false when any sink reported failure.
   *
   * @param callback - Called with (success, messages[])
   */
  function initialize(callback: (success: boolean, messages: InitMessage[]) => void): void {
    const messages: InitMessage[] = [];
    const pending: Array<Required<Pick<LogSink, 'initialize'>>> = [];

    for (let i = 0; i < sinks.length; i++) {
      const init = sinks[i].sink.initialize;
      if (init) {
        pending.push({ initialize: init.bind(sinks[i].sink) });
      }
    }

    if (pending.length === 0) {
      callback(true, messages);
      return;
    }

    let allOk = true;
    for (let i = 0; i < pending.length; i++) {
      pending[i].initialize(function(success: boolean, message: string) {
        messages.push({ success: success, message: message });
        if (!success) allOk = false;
        if (messages.length === pending.length) {
          callback(allOk, messages);
        }
      });
    }
  }

  return {
    log: log,
    debug: debug,
    info: info,
    warning: warning,
    critical: critical,
    setLevel: setLevel,
    getLevel: getLevel,
    initialize: initialize
  };
}
