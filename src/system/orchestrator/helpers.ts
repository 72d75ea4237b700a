/**
 * Pure helpers for the inference orchestrator
 */

import { NUMERIC_VARIABLES, STATE_VARIABLES, TREND_VARIABLES } from '@utils/constants';
import { isFiniteNumber } from '@utils/number';
import { deriveVpd } from '@features/vpd';
import { checkReadingAge } from '@features/reading-freshness';
import { summarizeTrend } from '@features/trend';

import type { DayNightPhase, ReadingSnapshot, SensorValue, TrendVariable, VariableName } from '$types/common';
import type { GrowspaceConfig } from '$types/config';
import type { EvidenceReadings } from '@core/bayesian-estimator';
import type { LightCycleVerdict } from '@core/light-cycle';
import type { TrendSample, TrendSummary } from '@features/trend';
import type { VerdictUpdateEvent } from '@events';

type PublishedFields = Pick<VerdictUpdateEvent, 'value' | 'stale' | 'probability'>;

/**
 * Recent usable readings per trend variable
 */
export type TrendHistory = Partial<Record<TrendVariable, TrendSample[]>>;

/**
 * Whether a variable carries an on/off state rather than a number
 * @param variable - Variable name
 * @returns True for state variables
 */
function isStateVariable(variable: VariableName): boolean {
  return STATE_VARIABLES.some(function(v) { return v === variable; });
}

/** Whether a variable keeps a trend history */
export function isTrendVariable(variable: VariableName): variable is TrendVariable {
  return TREND_VARIABLES.some(function(v) { return v === variable; });
}

/**
 * Coerce a raw value to the kind its variable expects
 *
 * @param variable - Variable the value was reported for
 * @param value - Raw value
 * @returns The value, or null when it is unavailable or of the wrong kind
 */
export function normalizeSensorValue(variable: VariableName, value: SensorValue): SensorValue {
  if (isStateVariable(variable)) {
    return typeof value === 'boolean' ? value : null;
  }
  return isFiniteNumber(value) ? value : null;
}

/**
 * Build the estimator's view of the latest readings
 *
 * @param readings - Latest reading per variable
 * @param config - Growspace configuration
 * @param now - Evaluation timestamp
 * @param history - Recent readings for trend evidence
 * @returns Usable numeric and state readings with their trends
 *
 * @remarks
 * Unbound variables, unavailable values and readings older than
 * `maxReadingAgeSec` are left out. A trend is only reported for a variable
 * whose latest reading is usable. With `deriveVpd` on, a missing VPD is
 * computed from temperature and humidity when both are usable; a derived
 * VPD has no trend.
 */
export function collectEvidenceReadings(
  readings: ReadingSnapshot,
  config: GrowspaceConfig,
  now: number,
  history: TrendHistory = {}
): EvidenceReadings {
  const result: EvidenceReadings = { numeric: {}, states: {} };
  const trends: Partial<Record<TrendVariable, TrendSummary>> = {};

  for (const variable of NUMERIC_VARIABLES) {
    const reading = readings[variable];
    if (!config.sensors[variable] || !reading) continue;
    if (!checkReadingAge(reading, now, config.maxReadingAgeSec).fresh) continue;
    if (isFiniteNumber(reading.value)) {
      result.numeric[variable] = reading.value;
    }
  }

  for (const variable of STATE_VARIABLES) {
    const reading = readings[variable];
    if (!config.sensors[variable] || !reading) continue;
    if (!checkReadingAge(reading, now, config.maxReadingAgeSec).fresh) continue;
    if (typeof reading.value === 'boolean') {
      result.states[variable] = reading.value;
    }
  }

  for (const variable of TREND_VARIABLES) {
    const samples = history[variable];
    if (result.numeric[variable] === undefined || !samples) continue;
    const trend = summarizeTrend(samples, now, config.trend.windowSec, config.trend.minChange[variable]);
    if (trend) {
      trends[variable] = trend;
    }
  }
  result.trends = trends;

  const temperature = result.numeric.temperature;
  const humidity = result.numeric.humidity;
  if (config.deriveVpd && result.numeric.vpd === undefined && temperature !== undefined && humidity !== undefined) {
    result.numeric.vpd = deriveVpd(temperature, humidity);
  }

  return result;
}

/**
 * Day/night phase for the current light state
 * @param lightOn - Accepted light state (null = unknown)
 * @param lightBound - Whether a light sensor is bound
 * @param defaultPhase - Phase used without a known light state
 * @returns Current phase
 */
export function phaseFor(lightOn: boolean | null, lightBound: boolean, defaultPhase: DayNightPhase): DayNightPhase {
  if (!lightBound || lightOn === null) return defaultPhase;
  return lightOn ? 'day' : 'night';
}

/**
 * Whether a verdict differs from the last published one in a way
 * listeners care about
 * @param prev - Last published verdict
 * @param next - New verdict
 * @returns True when value, stale flag or probability moved
 */
export function verdictChanged(prev: PublishedFields, next: PublishedFields): boolean {
  return prev.value !== next.value ||
    prev.stale !== next.stale ||
    prev.probability !== next.probability;
}

export function lightVerdictChanged(prev: LightCycleVerdict, next: LightCycleVerdict): boolean {
  return prev.status !== next.status ||
    prev.observedOnSec !== next.observedOnSec ||
    prev.expectedOnSec !== next.expectedOnSec;
}
