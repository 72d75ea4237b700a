/**
 * Distance-to-likelihood-ratio shaping
 *
 * The falloff curve is a configuration choice: every shape is monotonic in the
 * normalized distance, starts at 0 inside the ideal range and approaches 1 far
 * away from it. Ratios are interpolated in log space and clamped.
 */

import { ConfigurationError } from '$types/errors';
import { clamp, isFiniteNumber } from '@utils/number';

import type { LikelihoodConfig } from '$types/config';

/**
 * Falloff of a normalized distance
 *
 * @param distance - Normalized distance from the ideal range (>= 0)
 * @param config - Likelihood configuration (shape, saturationDistance)
 * @returns Value in [0, 1]; 0 at the ideal range, 1 at or beyond saturation
 */
export function falloff(distance: number, config: LikelihoodConfig): number {
  if (!(distance > 0)) {
    return 0;
  }

  if (config.shape === 'linear') {
    return Math.min(distance / config.saturationDistance, 1);
  }

  return 1 - Math.exp(-(distance * distance) / 2);
}

/**
 * Interpolate a log likelihood ratio between its ideal and extreme values
 * @param f - Falloff in [0, 1]
 * @param atIdeal - Ratio at the ideal range
 * @param atExtreme - Ratio far from the ideal range
 * @returns Natural log of the interpolated ratio
 */
export function interpolateLogRatio(f: number, atIdeal: number, atExtreme: number): number {
  return (1 - f) * Math.log(atIdeal) + f * Math.log(atExtreme);
}

/**
 * Clamp a likelihood ratio into the configured bounds
 * @param ratio - Raw ratio
 * @param config - Likelihood configuration (minRatio, maxRatio)
 * @returns Clamped ratio
 */
export function clampRatio(ratio: number, config: LikelihoodConfig): number {
  if (Number.isNaN(ratio)) {
    return 1;
  }
  return clamp(ratio, config.minRatio, config.maxRatio);
}

/**
 * Validate likelihood shaping settings
 * @param config - Likelihood configuration
 * @param context - Prefix for error messages
 * @throws {ConfigurationError} On an unknown shape or a clamp that excludes 1
 */
export function validateLikelihoodConfig(config: LikelihoodConfig, context: string): void {
  if (config.shape !== 'linear' && config.shape !== 'gaussian') {
    throw new ConfigurationError(context + ': unknown likelihood shape (got ' + String(config.shape) + ')');
  }
  if (!isFiniteNumber(config.saturationDistance) || config.saturationDistance <= 0) {
    throw new ConfigurationError(context + ': saturation distance must be positive (got ' + config.saturationDistance + ')');
  }
  if (!isFiniteNumber(config.minRatio) || config.minRatio <= 0 || config.minRatio >= 1) {
    throw new ConfigurationError(context + ': minimum ratio must be between 0 and 1 (got ' + config.minRatio + ')');
  }
  if (!isFiniteNumber(config.maxRatio) || config.maxRatio <= 1) {
    throw new ConfigurationError(context + ': maximum ratio must exceed 1 (got ' + config.maxRatio + ')');
  }
}
