/**
 * Global error types for the inference engine
 * Configuration problems are fatal at setup; evidence problems never throw
 */

/**
 * Base configuration error for all modules
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a condition prior is outside (0, 1)
 */
export class PriorValidationError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'PriorValidationError';
  }
}

/**
 * Error thrown when hysteresis gate thresholds or dwell are invalid
 */
export class GateValidationError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'GateValidationError';
  }
}

/**
 * Error thrown when the threshold profile table is incomplete or malformed
 */
export class ProfileValidationError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'ProfileValidationError';
  }
}

/**
 * Error thrown when light schedule configuration is invalid
 */
export class LightCycleValidationError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'LightCycleValidationError';
  }
}
