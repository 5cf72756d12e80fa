export { validateConfig, CONFIG_DEFAULTS } from './validator';
export {
  addError,
  addWarning,
  validateBoolean,
  validateString,
  validateNumberRange,
  validateIntegerRange,
  validateLogLevel
} from './helpers';
export type { ValidationIssue, ValidationResult, ConfigValidationResult } from './types';
