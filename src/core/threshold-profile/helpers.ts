/**
 * Threshold profile helpers
 */

import type { DeviationSide, VariableRange } from './types';

/**
 * Locate a value relative to its ideal range
 * @param value - Observed value
 * @param range - Ideal range
 * @returns Side of the range the value falls on
 */
export function deviationSide(value: number, range: VariableRange): DeviationSide {
  if (value < range.min) return 'below';
  if (value > range.max) return 'above';
  return 'inside';
}

/**
 * Distance from the ideal range in tolerance units
 *
 * @param value - Observed value
 * @param range - Ideal range
 * @returns 0 inside the range, otherwise distance to the nearest bound / tolerance
 *
 * @example
 * ```typescript
 * normalizedDistance(30, { min: 22, max: 26, tolerance: 2 }); // 2
 * ```
 */
export function normalizedDistance(value: number, range: VariableRange): number {
  if (value < range.min) return (range.min - value) / range.tolerance;
  if (value > range.max) return (value - range.max) / range.tolerance;
  return 0;
}
