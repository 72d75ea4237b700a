/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with buffering (createConsoleSink) and its Node timer
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, fmtProbability } from './helpers';
export { createConsoleSink, nodeTimers } from './console';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  TimerAPI,
  FilterContext,
  InitMessage
} from './types';
