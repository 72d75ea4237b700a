/**
 * Validation helper functions
 *
 * Field checks shared by the growspace configuration validator. Each
 * check appends to the issue lists instead of throwing, so one pass
 * reports every problem in a configuration.
 */

import { isFiniteNumber, isInteger } from '@utils/number';

import type { NumericRange, ValidationError, ValidationIssues, ValidationWarning } from './types';

// ═══════════════════════════════════════════════════════════════
// ISSUE BUILDERS
// ═══════════════════════════════════════════════════════════════

export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// TYPE CHECKS
// ═══════════════════════════════════════════════════════════════

/**
 * Require a boolean (undefined is accepted)
 * @param value - Value to check
 * @param field - Dotted field path for messages
 * @param errors - Error list
 */
export function validateBoolean(value: unknown, field: string, errors: ValidationError[]): void {
  if (value !== undefined && typeof value !== 'boolean') {
    addError(errors, field, field + ' must be a boolean (got ' + typeof value + ')');
  }
}

/**
 * Require one of a fixed set of string literals
 * @param value - Value to check
 * @param field - Dotted field path for messages
 * @param allowed - Accepted values
 * @param errors - Error list
 */
export function validateOneOf(value: unknown, field: string, allowed: readonly string[], errors: ValidationError[]): void {
  if (typeof value !== 'string' || allowed.indexOf(value) === -1) {
    addError(errors, field, field + ' must be one of ' + allowed.join(', ') + ' (got ' + String(value) + ')');
  }
}

// ═══════════════════════════════════════════════════════════════
// RANGE CHECKS
// ═══════════════════════════════════════════════════════════════

/**
 * Require a number strictly between two bounds
 *
 * Used for probabilities, where both ends of the unit interval make the
 * Bayesian update degenerate.
 *
 * @param value - Value to check
 * @param field - Dotted field path for messages
 * @param bounds - Exclusive bounds
 * @param errors - Error list
 */
export function validateOpenRange(value: number, field: string, bounds: NumericRange, errors: ValidationError[]): void {
  if (!isFiniteNumber(value) || value <= bounds.min || value >= bounds.max) {
    addError(errors, field, field + ' must be strictly between ' + bounds.min + ' and ' + bounds.max + ' (got ' + value + ')');
  }
}

/**
 * Check a number against a hard range and an optional advisory one
 *
 * Outside `critical` (or not finite) is an error. Inside it but outside
 * `recommended` is a warning. Undefined is skipped.
 *
 * @param value - Value to check
 * @param field - Dotted field path for messages
 * @param critical - Inclusive hard limits
 * @param issues - Error and warning lists
 * @param recommended - Inclusive advisory limits
 *
 * @example
 * ```typescript
 * validateNumberRange(config.light.toleranceSec, 'light.toleranceSec',
 *   { min: 0, max: 7200 }, issues, { min: 300, max: 3600 });
 * ```
 */
export function validateNumberRange(
  value: number | undefined,
  field: string,
  critical: NumericRange,
  issues: ValidationIssues,
  recommended?: NumericRange
): void {
  if (value === undefined) return;

  if (!isFiniteNumber(value) || value < critical.min || value > critical.max) {
    addError(issues.errors, field, field + ' must be between ' + critical.min + ' and ' + critical.max + ' (got ' + value + ')');
    return;
  }

  if (recommended && (value < recommended.min || value > recommended.max)) {
    addWarning(
      issues.warnings,
      field,
      field + ' is outside recommended range ' + recommended.min + '-' + recommended.max + ' (got ' + value + ')'
    );
  }
}

/**
 * Same as validateNumberRange, after requiring a whole number
 * @param value - Value to check
 * @param field - Dotted field path for messages
 * @param critical - Inclusive hard limits
 * @param issues - Error and warning lists
 * @param recommended - Inclusive advisory limits
 */
export function validateIntegerRange(
  value: number | undefined,
  field: string,
  critical: NumericRange,
  issues: ValidationIssues,
  recommended?: NumericRange
): void {
  if (value === undefined) return;

  if (!isInteger(value)) {
    addError(issues.errors, field, field + ' must be an integer (got ' + String(value) + ')');
    return;
  }
  validateNumberRange(value, field, critical, issues, recommended);
}
