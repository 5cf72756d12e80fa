import type { ConfigIssue } from '$types/errors';
import type { PlantConfig } from '$types/config';

export interface ValidationIssue extends ConfigIssue {
  level?: 'CRITICAL' | 'WARNING';
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * Outcome of validating a raw configuration document
 * config is null whenever valid is false
 */
export interface ConfigValidationResult extends ValidationResult {
  config: PlantConfig | null;
}
