/**
 * Bayesian estimator type definitions
 */

import type { ConditionName, DayNightPhase, NumericVariable, StateVariable, TrendVariable, VariableName } from '$types/common';
import type { LikelihoodConfig } from '$types/config';
import type { ThresholdProfile } from '@core/threshold-profile';
import type { TrendDirection, TrendSummary } from '@features/trend';

// ═══════════════════════════════════════════════════════════════
// EVIDENCE TYPES
// Inputs shared by every evidence source
// ═══════════════════════════════════════════════════════════════

/**
 * Usable readings for one evaluation
 * Unavailable, stale or unbound variables are simply absent
 */
export interface EvidenceReadings {
  numeric: Partial<Record<NumericVariable, number>>;
  states: Partial<Record<StateVariable, boolean>>;
  /** Movement over the trend window; absent without enough history */
  trends?: Partial<Record<TrendVariable, TrendSummary>>;
}

/**
 * Everything a source needs to produce a likelihood ratio
 */
export interface EvidenceContext {
  readings: EvidenceReadings;
  profile: ThresholdProfile;
  phase: DayNightPhase;
  likelihood: LikelihoodConfig;
}

/**
 * One monitored variable's contribution to a condition
 */
export interface EvidenceSource {
  readonly variable: VariableName;
  /**
   * P(observation | condition) / P(observation | not condition)
   * @returns Clamped ratio, or null when there is no evidence
   */
  likelihoodRatio(context: EvidenceContext): number | null;
  /** Human-readable reason, asked for only when the ratio moved the posterior */
  describe(context: EvidenceContext): string;
}

/**
 * Which side of the ideal range counts as evidence
 */
export type EvidenceSide = 'both' | 'above' | 'below';

export interface RangeEvidenceOptions {
  side: EvidenceSide;
  /** Ratio when the value is inside the ideal range */
  atIdeal: number;
  /** Ratio approached far from the ideal range */
  atExtreme: number;
  /** Multiplier on the log ratio during the night phase */
  nightWeight?: number;
}

export interface StateEvidenceOptions {
  whenOn: number;
  whenOff: number;
  nightWeight?: number;
  /**
   * Gate on other readings: false gives a neutral ratio,
   * null means the context needed to judge is missing (no evidence)
   */
  requires?: (context: EvidenceContext) => boolean | null;
  /** Reason text when the state moves the posterior (default "<Label> on|off") */
  reason?: string;
}

export interface TrendEvidenceOptions {
  /** Movement that counts as evidence; anything else is neutral */
  direction: Exclude<TrendDirection, 'stable'>;
  /** Ratio while the variable moves that way */
  whenTrending: number;
  /** Also require every sample in the window to sit beyond this edge of the ideal range */
  beyond?: 'above' | 'below';
}

// ═══════════════════════════════════════════════════════════════
// ESTIMATE TYPES
// Result of combining evidence
// ═══════════════════════════════════════════════════════════════

/**
 * Numeric posterior backed by at least one observed variable
 */
export interface PosteriorValue {
  kind: 'estimate';
  condition: ConditionName;
  probability: number;
  prior: number;
  /** Variables with evidence, in source order */
  observed: VariableName[];
  /** Observed variables whose ratio moved the posterior */
  contributing: VariableName[];
  /** Only one variable was observed */
  lowConfidence: boolean;
  /** Combined ratio per observed variable */
  ratios: Partial<Record<VariableName, number>>;
  /** Reasons for every source that moved the posterior, strongest first */
  reasons: string[];
}

/**
 * No variable had evidence
 */
export interface InsufficientData {
  kind: 'insufficient';
  condition: ConditionName;
  probability: null;
  prior: number;
}

export type PosteriorEstimate = PosteriorValue | InsufficientData;
