/**
 * Evidence source factories
 *
 * A source turns one variable's reading into a likelihood ratio. The combinator
 * in bayesian-estimator.ts never looks inside a source, so a new monitored
 * variable is just another entry in a condition's source list.
 */

import { clampRatio, falloff, interpolateLogRatio } from '@core/likelihood';
import { deviationSide, normalizedDistance } from '@core/threshold-profile';

import type { NumericVariable, StateVariable, TrendVariable } from '$types/common';
import type {
  EvidenceContext,
  EvidenceSource,
  RangeEvidenceOptions,
  StateEvidenceOptions,
  TrendEvidenceOptions
} from './types';

const LABELS: Readonly<Record<NumericVariable | StateVariable, string>> = {
  temperature: 'Temperature',
  humidity: 'Humidity',
  vpd: 'VPD',
  co2: 'CO2',
  fan_state: 'Fan',
  dehumidifier_state: 'Dehumidifier',
  humidifier_state: 'Humidifier'
};

/**
 * Round for reason text
 * @param value - Number to print
 * @returns Value with at most two decimals
 */
function fmtValue(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/**
 * Apply the night weight to a log ratio
 * @param logRatio - Natural log of the ratio
 * @param context - Evaluation context
 * @param nightWeight - Optional multiplier
 * @returns Weighted log ratio
 */
function weighForPhase(logRatio: number, context: EvidenceContext, nightWeight: number | undefined): number {
  if (context.phase === 'night' && nightWeight !== undefined) {
    return logRatio * nightWeight;
  }
  return logRatio;
}

/**
 * Create a source that scores a numeric reading against its ideal range
 *
 * @param variable - Numeric variable to read
 * @param options - Side, ideal/extreme ratios and night weight
 * @returns Evidence source
 *
 * @remarks
 * Deviations on a side the source does not count give a neutral ratio of 1.
 * A missing reading gives null (no evidence), never a ratio for zero.
 *
 * @example
 * ```typescript
 * // High humidity raises mold risk; low humidity says nothing about it
 * const humidity = createRangeEvidence('humidity', { side: 'above', atIdeal: 1, atExtreme: 6 });
 * ```
 */
export function createRangeEvidence(variable: NumericVariable, options: RangeEvidenceOptions): EvidenceSource {
  function likelihoodRatio(context: EvidenceContext): number | null {
    const value = context.readings.numeric[variable];
    if (value === undefined) {
      return null;
    }

    const range = context.profile[variable];
    const side = deviationSide(value, range);
    if (side !== 'inside' && options.side !== 'both' && options.side !== side) {
      return 1;
    }

    const f = falloff(normalizedDistance(value, range), context.likelihood);
    const logRatio = weighForPhase(interpolateLogRatio(f, options.atIdeal, options.atExtreme), context, options.nightWeight);

    return clampRatio(Math.exp(logRatio), context.likelihood);
  }

  function describe(context: EvidenceContext): string {
    const value = context.readings.numeric[variable];
    if (value === undefined) return LABELS[variable];

    const side = deviationSide(value, context.profile[variable]);
    const where = side === 'inside' ? 'in range' : side === 'above' ? 'high' : 'low';
    return LABELS[variable] + ' ' + where + ' (' + fmtValue(value) + ')';
  }

  return { variable: variable, likelihoodRatio: likelihoodRatio, describe: describe };
}

/**
 * Create a source that scores an on/off equipment state
 * @param variable - State variable to read
 * @param options - Ratios for on/off, night weight and optional gate
 * @returns Evidence source
 */
export function createStateEvidence(variable: StateVariable, options: StateEvidenceOptions): EvidenceSource {
  function likelihoodRatio(context: EvidenceContext): number | null {
    const on = context.readings.states[variable];
    if (on === undefined) {
      return null;
    }

    if (options.requires) {
      const applies = options.requires(context);
      if (applies === null) return null;
      if (!applies) return 1;
    }

    const logRatio = weighForPhase(Math.log(on ? options.whenOn : options.whenOff), context, options.nightWeight);

    return clampRatio(Math.exp(logRatio), context.likelihood);
  }

  function describe(context: EvidenceContext): string {
    if (options.reason !== undefined) return options.reason;
    return LABELS[variable] + (context.readings.states[variable] ? ' on' : ' off');
  }

  return { variable: variable, likelihoodRatio: likelihoodRatio, describe: describe };
}

/**
 * Create a source that scores how a variable moved over the trend window
 *
 * @param variable - Trend variable to read
 * @param options - Direction, ratio and optional range edge
 * @returns Evidence source
 *
 * @remarks
 * Without a trend summary there is no evidence. A summary moving the other
 * way, or not staying beyond the required edge, is neutral.
 *
 * @example
 * ```typescript
 * // Temperature climbing while already above the ideal range
 * createTrendEvidence('temperature', { direction: 'rising', whenTrending: 2.4, beyond: 'above' });
 * ```
 */
export function createTrendEvidence(variable: TrendVariable, options: TrendEvidenceOptions): EvidenceSource {
  function likelihoodRatio(context: EvidenceContext): number | null {
    const trend = context.readings.trends?.[variable];
    if (trend === undefined) {
      return null;
    }
    if (trend.direction !== options.direction) {
      return 1;
    }

    const range = context.profile[variable];
    if (options.beyond === 'above' && trend.low <= range.max) return 1;
    if (options.beyond === 'below' && trend.high >= range.min) return 1;

    return clampRatio(options.whenTrending, context.likelihood);
  }

  function describe(context: EvidenceContext): string {
    const change = context.readings.trends?.[variable]?.change ?? 0;
    return LABELS[variable] + ' ' + options.direction + ' (' + (change > 0 ? '+' : '') + fmtValue(change) + ')';
  }

  return { variable: variable, likelihoodRatio: likelihoodRatio, describe: describe };
}
