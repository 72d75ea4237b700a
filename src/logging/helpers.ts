/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels, FilterContext } from './types';

/**
 * Format a probability for log output
 * @param probability - Posterior probability, null when unknown
 * @returns Two-decimal string, or "n/a"
 */
export function fmtProbability(probability: number | null): string {
  if (probability === null) return 'n/a';
  return probability.toFixed(2);
}

/**
 * Prefix a line with its fixed-width level tag
 *
 * @param level - Level of the line
 * @param msg - Message text
 * @param logLevels - Level codes
 * @returns Tagged line, e.g. `⚠️ [WARNING]  [tent-a] listener error: ...`
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  switch (level) {
    case logLevels.CRITICAL:
      return '🚨 [CRITICAL] ' + msg;
    case logLevels.WARNING:
      return '⚠️ [WARNING]  ' + msg;
    case logLevels.INFO:
      return 'ℹ️ [INFO]     ' + msg;
    default:
      return '[DEBUG]    ' + msg;
  }
}

/**
 * Decide whether a line passes the logger's filters
 *
 * A line below the current level is dropped. Once the logger has run
 * longer than `demoteHours`, INFO lines are dropped too, so a long-running
 * engine only reports verdict warnings; DEBUG mode keeps everything.
 *
 * @param level - Level of the line
 * @param context - Current level, uptime and demotion setting
 * @param logLevels - Level codes
 * @returns True when the line should be written
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  const demoting = context.demoteHours > 0 && context.currentLevel !== logLevels.DEBUG;
  return !(demoting && level === logLevels.INFO && context.uptime > context.demoteHours * 3600);
}
