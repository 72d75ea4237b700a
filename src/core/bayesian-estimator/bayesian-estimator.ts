/**
 * Naive-Bayes posterior estimation
 *
 * Combines independent likelihood ratios with a prior in odds form:
 *   posterior_odds = prior_odds * Π L_s
 * A variable may feed several sources (its range and its trend); it is still
 * one observed variable.
 */

import { PriorValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

import type { ConditionName, VariableName } from '$types/common';
import type { EvidenceContext, EvidenceSource, PosteriorEstimate } from './types';

/** Ratios closer to 1 than this do not count as contributing */
const NEUTRAL_LOG_EPSILON = 1e-9;

/**
 * Validate a condition prior
 * @param prior - Prior probability
 * @param condition - Condition name for the error message
 * @throws {PriorValidationError} When prior is not strictly inside (0, 1)
 */
export function validatePrior(prior: number, condition: ConditionName): void {
  if (!isFiniteNumber(prior) || prior <= 0 || prior >= 1) {
    throw new PriorValidationError(condition + ': prior must be strictly between 0 and 1 (got ' + prior + ')');
  }
}

/**
 * Estimate the posterior probability of a condition
 *
 * @param condition - Condition being estimated
 * @param prior - Prior probability in (0, 1)
 * @param sources - Evidence sources for the condition
 * @param context - Readings, profile, phase and likelihood shaping
 * @returns Numeric estimate, or insufficient data when no source had evidence
 * @throws {PriorValidationError} When prior is outside (0, 1)
 *
 * @remarks
 * Sources returning null are skipped entirely; they are not neutral evidence.
 * Each ratio is already clamped by its source, so the posterior never reaches
 * exactly 0 or 1. Reasons are ordered by the size of their log ratio; equal
 * ones keep source order.
 */
export function estimatePosterior(
  condition: ConditionName,
  prior: number,
  sources: readonly EvidenceSource[],
  context: EvidenceContext
): PosteriorEstimate {
  validatePrior(prior, condition);

  let logOdds = Math.log(prior / (1 - prior));
  const observed: VariableName[] = [];
  const contributing: VariableName[] = [];
  const ratios: Partial<Record<VariableName, number>> = {};
  const reasons: { text: string; weight: number }[] = [];

  for (const source of sources) {
    const ratio = source.likelihoodRatio(context);
    if (ratio === null) {
      continue;
    }

    const variable = source.variable;
    const logRatio = Math.log(ratio);
    logOdds += logRatio;
    if (observed.indexOf(variable) === -1) {
      observed.push(variable);
    }
    ratios[variable] = (ratios[variable] ?? 1) * ratio;
    if (Math.abs(logRatio) > NEUTRAL_LOG_EPSILON) {
      if (contributing.indexOf(variable) === -1) {
        contributing.push(variable);
      }
      reasons.push({ text: source.describe(context), weight: Math.abs(logRatio) });
    }
  }

  reasons.sort(function(a, b) { return b.weight - a.weight; });

  if (observed.length === 0) {
    return { kind: 'insufficient', condition: condition, probability: null, prior: prior };
  }

  const odds = Math.exp(logOdds);

  return {
    kind: 'estimate',
    condition: condition,
    probability: odds / (1 + odds),
    prior: prior,
    observed: observed,
    contributing: contributing,
    lowConfidence: observed.length === 1,
    ratios: ratios,
    reasons: reasons.map(function(r) { return r.text; })
  };
}
