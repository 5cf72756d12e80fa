/**
 * Validation helper functions
 * Provides reusable utilities for configuration validation
 */

import { parseLogLevel } from '@logging/helpers';
import { isFiniteNumber, isInteger } from '@utils/number';

import type { LogLevel } from '@logging/types';
import type { ValidationIssue } from './types';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationIssue[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: ValidationIssue[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// TYPE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that a value is a boolean
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 */
export function validateBoolean(
  value: unknown,
  field: string,
  errors: ValidationIssue[]
): void {
  if (value !== undefined && typeof value !== 'boolean') {
    addError(errors, field, `${field} must be a boolean (got ${typeof value})`);
  }
}

/**
 * Validate that a value is a non-empty string
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 */
export function validateString(
  value: unknown,
  field: string,
  errors: ValidationIssue[]
): void {
  if (value === undefined) return;
  if (typeof value !== 'string') {
    addError(errors, field, `${field} must be a string (got ${typeof value})`);
  } else if (value.trim() === '') {
    addError(errors, field, `${field} must not be empty`);
  }
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against critical and recommended ranges
 *
 * Critical range violations produce errors (validation fails)
 * Recommended range violations produce warnings (validation passes)
 *
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommendedMin - Recommended minimum value (optional)
 * @param recommendedMax - Recommended maximum value (optional)
 */
export function validateNumberRange(
  value: unknown,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationIssue[],
  warnings: ValidationIssue[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (value === undefined) return;

  // NaN, Infinity and non-numbers
  if (!isFiniteNumber(value)) {
    addError(
      errors,
      field,
      `${field} must be between ${criticalMin} and ${criticalMax} (got ${String(value)})`
    );
    return;
  }

  if (value < criticalMin || value > criticalMax) {
    addError(
      errors,
      field,
      `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`
    );
    return; // Don't check recommended if critical failed
  }

  if (recommendedMin !== undefined && recommendedMax !== undefined) {
    if (value < recommendedMin || value > recommendedMax) {
      addWarning(
        warnings,
        field,
        `${field} is outside recommended range ${recommendedMin}-${recommendedMax} (got ${value})`
      );
    }
  }
}

/**
 * Validate an integer against critical and recommended ranges
 *
 * First checks if the value is an integer, then validates ranges
 *
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommendedMin - Recommended minimum value (optional)
 * @param recommendedMax - Recommended maximum value (optional)
 */
export function validateIntegerRange(
  value: unknown,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationIssue[],
  warnings: ValidationIssue[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (value === undefined) return;

  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${String(value)})`);
    return;
  }

  validateNumberRange(
    value,
    field,
    criticalMin,
    criticalMax,
    errors,
    warnings,
    recommendedMin,
    recommendedMax
  );
}

/**
 * Validate a log level name
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 */
export function validateLogLevel(
  value: unknown,
  field: string,
  errors: ValidationIssue[]
): void {
  if (value === undefined) return;
  if (typeof value !== 'string' || parseLogLevel(value) === null) {
    addError(errors, field, `${field} must be one of debug, info, warning, critical (got ${String(value)})`);
  }
}

// ═══════════════════════════════════════════════════════════════
// VALUE READERS
// Used after validation; anything that failed falls back to the default
// ═══════════════════════════════════════════════════════════════

export function numberOr(value: unknown, fallback: number): number {
  return isFiniteNumber(value) ? value : fallback;
}

export function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : fallback;
}

export function booleanOr(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

export function levelOr(value: unknown, fallback: LogLevel): LogLevel {
  if (typeof value !== 'string') return fallback;
  const level = parseLogLevel(value);
  return level === null ? fallback : level;
}
