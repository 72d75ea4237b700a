/**
 * Growspace configuration validator
 *
 * Checks a complete configuration before it reaches the registry. Hard
 * limits produce errors (the growspace is rejected); values outside the
 * recommended ranges produce warnings.
 */

import { CONDITION_NAMES, GROWTH_STAGES, NUMERIC_VARIABLES, STATE_VARIABLES, TREND_VARIABLES } from '@utils/constants';
import { isFiniteNumber } from '@utils/number';
import {
  addError,
  validateBoolean,
  validateIntegerRange,
  validateNumberRange,
  validateOneOf,
  validateOpenRange
} from './helpers';

import type { VariableName } from '$types/common';
import type { GrowspaceConfig } from '$types/config';
import type { NumericRange, ValidationIssues, ValidationResult } from './types';

const UNIT: NumericRange = { min: 0, max: 1 };
const DAY_SEC: NumericRange = { min: 0, max: 86400 };

function validateConditions(config: GrowspaceConfig, issues: ValidationIssues): void {
  for (const name of CONDITION_NAMES) {
    const condition = config.conditions[name];
    const field = 'conditions.' + name;

    validateBoolean(condition.enabled, field + '.enabled', issues.errors);
    if (!condition.enabled) continue;

    validateOpenRange(condition.prior, field + '.prior', UNIT, issues.errors);
    validateOpenRange(condition.turnOnThreshold, field + '.turnOnThreshold', UNIT, issues.errors);
    validateOpenRange(condition.turnOffThreshold, field + '.turnOffThreshold', UNIT, issues.errors);
    if (condition.turnOnThreshold <= condition.turnOffThreshold) {
      addError(
        issues.errors,
        field + '.turnOnThreshold',
        field + '.turnOnThreshold must exceed turnOffThreshold (got ' +
          condition.turnOnThreshold + ' <= ' + condition.turnOffThreshold + ')'
      );
    }
    validateNumberRange(condition.minDwellSec, field + '.minDwellSec', DAY_SEC, issues, { min: 0, max: 3600 });
  }
}

function validateLight(config: GrowspaceConfig, issues: ValidationIssues): void {
  const light = config.light;

  for (const stage of GROWTH_STAGES) {
    validateNumberRange(light.hours[stage], 'light.hours.' + stage, { min: 0, max: 24 }, issues);
  }
  validateNumberRange(light.toleranceSec, 'light.toleranceSec', { min: 0, max: 7200 }, issues, { min: 300, max: 3600 });
  if (light.rolloverHourUtc !== null) {
    validateIntegerRange(light.rolloverHourUtc, 'light.rolloverHourUtc', { min: 0, max: 23 }, issues);
  }
  validateNumberRange(light.debounceSec, 'light.debounceSec', { min: 0, max: 3600 }, issues, { min: 0, max: 300 });
}

function validateLikelihood(config: GrowspaceConfig, issues: ValidationIssues): void {
  const likelihood = config.likelihood;

  validateOneOf(likelihood.shape, 'likelihood.shape', ['linear', 'gaussian'], issues.errors);
  if (!isFiniteNumber(likelihood.saturationDistance) || likelihood.saturationDistance <= 0) {
    addError(
      issues.errors,
      'likelihood.saturationDistance',
      'likelihood.saturationDistance must be positive (got ' + likelihood.saturationDistance + ')'
    );
  }
  validateOpenRange(likelihood.minRatio, 'likelihood.minRatio', UNIT, issues.errors);
  if (!isFiniteNumber(likelihood.maxRatio) || likelihood.maxRatio <= 1) {
    addError(issues.errors, 'likelihood.maxRatio', 'likelihood.maxRatio must exceed 1 (got ' + likelihood.maxRatio + ')');
  }
}

function validateTrend(config: GrowspaceConfig, issues: ValidationIssues): void {
  validateNumberRange(config.trend.windowSec, 'trend.windowSec', DAY_SEC, issues);
  for (const variable of TREND_VARIABLES) {
    const minChange = config.trend.minChange[variable];
    if (!isFiniteNumber(minChange) || minChange <= 0) {
      addError(
        issues.errors,
        'trend.minChange.' + variable,
        'trend.minChange.' + variable + ' must be positive (got ' + minChange + ')'
      );
    }
  }
}

/**
 * Validate one growspace configuration
 *
 * @param config - Configuration as built by createGrowspaceConfig
 * @returns Result with errors (fatal) and warnings (advisory)
 *
 * @example
 * ```typescript
 * const result = validateGrowspaceConfig(createGrowspaceConfig('tent-a'));
 * if (!result.valid) result.errors.forEach((e) => console.warn(e.message));
 * ```
 */
export function validateGrowspaceConfig(config: GrowspaceConfig): ValidationResult {
  const issues: ValidationIssues = { errors: [], warnings: [] };

  if (typeof config.id !== 'string' || config.id.trim() === '') {
    addError(issues.errors, 'id', 'id must be a non-empty string');
  }
  validateOneOf(config.initialStage, 'initialStage', GROWTH_STAGES, issues.errors);
  validateOneOf(config.defaultPhase, 'defaultPhase', ['day', 'night'], issues.errors);
  validateBoolean(config.deriveVpd, 'deriveVpd', issues.errors);

  const bindable: (VariableName | 'light')[] = [...NUMERIC_VARIABLES, ...STATE_VARIABLES, 'light'];
  for (const variable of bindable) {
    validateBoolean(config.sensors[variable], 'sensors.' + variable, issues.errors);
  }

  validateConditions(config, issues);
  validateLight(config, issues);
  validateLikelihood(config, issues);
  validateTrend(config, issues);
  validateNumberRange(config.maxReadingAgeSec, 'maxReadingAgeSec', DAY_SEC, issues);

  return {
    valid: issues.errors.length === 0,
    errors: issues.errors,
    warnings: issues.warnings
  };
}
