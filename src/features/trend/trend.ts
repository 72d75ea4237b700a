/**
 * Trend detection
 *
 * Keeps a short history of usable readings per variable and reports whether
 * the variable moved over the window. The comparison is first sample against
 * last; values in between only set the low and high marks.
 */

import type { TrendDirection, TrendSample, TrendSummary } from './types';

/**
 * Append a reading and drop samples that fell out of the window
 *
 * @param samples - History so far (not mutated)
 * @param value - Usable reading
 * @param timestamp - Reading time in seconds
 * @param windowSec - History length (0 keeps nothing)
 * @returns New history
 */
export function recordTrendSample(
  samples: readonly TrendSample[],
  value: number,
  timestamp: number,
  windowSec: number
): TrendSample[] {
  if (windowSec <= 0) {
    return [];
  }

  const since = timestamp - windowSec;
  const kept = samples.filter(function(s) {
    return s.timestamp >= since;
  });
  kept.push({ value: value, timestamp: timestamp });
  return kept;
}

/**
 * Summarize the samples inside the window ending at now
 *
 * @param samples - History for one variable
 * @param now - Evaluation timestamp in seconds
 * @param windowSec - Window length (0 disables)
 * @param minChange - Smallest change that counts as movement
 * @returns Summary, or null with fewer than two samples in the window
 *
 * @example
 * ```typescript
 * const history = recordTrendSample(recordTrendSample([], 24, t, 1800), 26, t + 600, 1800);
 * summarizeTrend(history, t + 600, 1800, 1)?.direction; // 'rising'
 * ```
 */
export function summarizeTrend(
  samples: readonly TrendSample[],
  now: number,
  windowSec: number,
  minChange: number
): TrendSummary | null {
  if (windowSec <= 0) {
    return null;
  }

  const since = now - windowSec;
  const inWindow = samples.filter(function(s) {
    return s.timestamp >= since;
  });
  if (inWindow.length < 2) {
    return null;
  }

  const change = inWindow[inWindow.length - 1].value - inWindow[0].value;
  let direction: TrendDirection = 'stable';
  if (change >= minChange) {
    direction = 'rising';
  } else if (change <= -minChange) {
    direction = 'falling';
  }

  const values = inWindow.map(function(s) { return s.value; });

  return {
    direction: direction,
    change: change,
    low: Math.min(...values),
    high: Math.max(...values),
    samples: inWindow.length
  };
}
