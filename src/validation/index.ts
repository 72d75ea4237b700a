export { validateGrowspaceConfig } from './validator';
export type { ValidationError, ValidationResult, ValidationWarning } from './types';
