/**
 * Validation result types
 */

export interface ValidationError {
  field: string;
  message: string;
  level?: 'CRITICAL';
}

export interface ValidationWarning {
  field: string;
  message: string;
  level?: 'WARNING';
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Inclusive numeric bounds
 */
export interface NumericRange {
  min: number;
  max: number;
}

/**
 * Accumulators threaded through the field checks
 */
export interface ValidationIssues {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}
