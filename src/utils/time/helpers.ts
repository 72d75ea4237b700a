/**
 * Time helper functions
 * All timestamps are Unix seconds; calendar math is done in UTC
 */

import { TIME_CONSTANTS } from '../constants';

/**
 * Pad number with leading zero
 * @param n - Number to pad
 * @returns Two-digit string
 */
function pad2(n: number): string {
  return n < 10 ? '0' + n : String(n);
}

/**
 * Format timestamp as a UTC calendar day
 * @param timestamp - Unix seconds
 * @returns Date string (YYYY-MM-DD)
 */
export function formatDateUTC(timestamp: number): string {
  const d = new Date(timestamp * TIME_CONSTANTS.MS_PER_SECOND);
  return d.getUTCFullYear() + '-' + pad2(d.getUTCMonth() + 1) + '-' + pad2(d.getUTCDate());
}

/**
 * Find the first rollover boundary strictly after a timestamp
 * @param timestamp - Unix seconds
 * @param hourUtc - Rollover hour (0-23, UTC)
 * @returns Unix seconds of the next boundary
 */
export function nextRolloverBoundary(timestamp: number, hourUtc: number): number {
  const offset = hourUtc * TIME_CONSTANTS.SECONDS_PER_HOUR;
  const dayStart = Math.floor((timestamp - offset) / TIME_CONSTANTS.SECONDS_PER_DAY) * TIME_CONSTANTS.SECONDS_PER_DAY;
  return dayStart + offset + TIME_CONSTANTS.SECONDS_PER_DAY;
}

/**
 * Whole days elapsed since a stage started
 * @param stageStart - Unix seconds the stage began, or null when unknown
 * @param timestamp - Current Unix seconds
 * @returns Elapsed whole days (never negative), or undefined when start is unknown
 */
export function daysSince(stageStart: number | null, timestamp: number): number | undefined {
  if (stageStart === null) return undefined;
  const elapsed = timestamp - stageStart;
  if (elapsed <= 0) return 0;
  return Math.floor(elapsed / TIME_CONSTANTS.SECONDS_PER_DAY);
}
