/**
 * Type definitions for growspace engine configuration
 */

import type { ConditionName, DayNightPhase, GrowthStage, TrendVariable, VariableName } from './common';

/**
 * Distance-to-likelihood falloff curve
 */
export type LikelihoodShape = 'linear' | 'gaussian';

/**
 * Likelihood ratio shaping shared by every evidence source
 */
export interface LikelihoodConfig {
  /** Falloff curve applied to the normalized distance */
  shape: LikelihoodShape;
  /** Normalized distance at which the linear curve saturates */
  saturationDistance: number;
  /** Lower clamp for any single likelihood ratio */
  minRatio: number;
  /** Upper clamp for any single likelihood ratio */
  maxRatio: number;
}

/**
 * Per-condition estimator and gate settings
 */
export interface ConditionConfig {
  enabled: boolean;
  /** Prior probability, strictly inside (0, 1) */
  prior: number;
  /** Posterior at or above which the verdict turns on */
  turnOnThreshold: number;
  /** Posterior at or below which the verdict turns off */
  turnOffThreshold: number;
  /** Seconds a raw classification must hold before the verdict follows */
  minDwellSec: number;
}

/**
 * Which sensors are wired to the growspace
 */
export type SensorBindings = Record<VariableName | 'light', boolean>;

/**
 * Light schedule verification settings
 */
export interface LightScheduleConfig {
  /** Expected light-on hours per 24h, per stage */
  hours: Record<GrowthStage, number>;
  /** Allowed deviation of observed on-time per window */
  toleranceSec: number;
  /** UTC hour windows roll over at; null anchors windows to the first transition */
  rolloverHourUtc: number | null;
  /** Minimum hold before a raw light change is accepted (0 disables) */
  debounceSec: number;
}

/**
 * Rolling history used for trend evidence
 */
export interface TrendConfig {
  /** History kept per variable, in seconds (0 disables trend evidence) */
  windowSec: number;
  /** Smallest first-to-last change that counts as rising or falling */
  minChange: Record<TrendVariable, number>;
}

/**
 * Complete configuration for one growspace
 */
export interface GrowspaceConfig {
  id: string;
  /** Stage assumed until the first stage event */
  initialStage: GrowthStage;
  conditions: Record<ConditionName, ConditionConfig>;
  sensors: SensorBindings;
  light: LightScheduleConfig;
  likelihood: LikelihoodConfig;
  trend: TrendConfig;
  /** Readings older than this count as unavailable (0 disables) */
  maxReadingAgeSec: number;
  /** Compute VPD from temperature and humidity when no VPD reading exists */
  deriveVpd: boolean;
  /** Phase used when no light state is known */
  defaultPhase: DayNightPhase;
}
