/**
 * Unit tests for validation helper functions
 */

import {
  addError,
  addWarning,
  booleanOr,
  levelOr,
  numberOr,
  stringOr,
  validateBoolean,
  validateIntegerRange,
  validateLogLevel,
  validateNumberRange,
  validateString
} from './helpers';

import type { ValidationIssue } from './types';

describe('Validation Helpers', () => {
  // ═══════════════════════════════════════════════════════════════
  // addError() / addWarning()
  // ═══════════════════════════════════════════════════════════════

  describe('addError', () => {
    it('should add error with CRITICAL level', () => {
      const errors: ValidationIssue[] = [];

      addError(errors, 'plc.host', 'plc.host is required');

      expect(errors).toEqual([{ level: 'CRITICAL', field: 'plc.host', message: 'plc.host is required' }]);
    });

    it('should accumulate multiple errors', () => {
      const errors: ValidationIssue[] = [];

      addError(errors, 'FIELD1', 'Error 1');
      addError(errors, 'FIELD2', 'Error 2');

      expect(errors.map(function(e) { return e.field; })).toEqual(['FIELD1', 'FIELD2']);
    });
  });

  describe('addWarning', () => {
    it('should add warning with WARNING level', () => {
      const warnings: ValidationIssue[] = [];

      addWarning(warnings, 'pumps', 'No pumps configured');

      expect(warnings).toEqual([{ level: 'WARNING', field: 'pumps', message: 'No pumps configured' }]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Type validators
  // ═══════════════════════════════════════════════════════════════

  describe('validateBoolean', () => {
    it('should accept booleans and undefined', () => {
      const errors: ValidationIssue[] = [];

      validateBoolean(true, 'live.enabled', errors);
      validateBoolean(false, 'live.enabled', errors);
      validateBoolean(undefined, 'live.enabled', errors);

      expect(errors).toHaveLength(0);
    });

    it('should add error for a string value', () => {
      const errors: ValidationIssue[] = [];

      validateBoolean('true', 'live.enabled', errors);

      expect(errors[0].message).toBe('live.enabled must be a boolean (got string)');
    });

    it('should add error for null value', () => {
      const errors: ValidationIssue[] = [];

      validateBoolean(null, 'logging.timestamps', errors);

      expect(errors[0].message).toBe('logging.timestamps must be a boolean (got object)');
    });
  });

  describe('validateString', () => {
    it('should accept non-empty strings and undefined', () => {
      const errors: ValidationIssue[] = [];

      validateString('logs.db', 'database', errors);
      validateString(undefined, 'database', errors);

      expect(errors).toHaveLength(0);
    });

    it('should reject other types', () => {
      const errors: ValidationIssue[] = [];

      validateString(42, 'plc.host', errors);

      expect(errors[0].message).toBe('plc.host must be a string (got number)');
    });

    it('should reject blank strings', () => {
      const errors: ValidationIssue[] = [];

      validateString('   ', 'plc.host', errors);

      expect(errors[0].message).toBe('plc.host must not be empty');
    });
  });

  describe('validateLogLevel', () => {
    it('should accept known level names', () => {
      const errors: ValidationIssue[] = [];

      validateLogLevel('warning', 'logging.level', errors);
      validateLogLevel('DEBUG', 'logging.level', errors);

      expect(errors).toHaveLength(0);
    });

    it('should reject unknown names', () => {
      const errors: ValidationIssue[] = [];

      validateLogLevel('verbose', 'LOG_LEVEL', errors);

      expect(errors[0].message).toBe('LOG_LEVEL must be one of debug, info, warning, critical (got verbose)');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Range validators
  // ═══════════════════════════════════════════════════════════════

  describe('validateNumberRange', () => {
    it('should return early for undefined', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateNumberRange(undefined, 'TEST', 0, 10, errors, warnings, 2, 8);

      expect(errors).toHaveLength(0);
      expect(warnings).toHaveLength(0);
    });

    it('should add error when value below minimum', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateNumberRange(-1, 'logging.demote_hours', 0, 8760, errors, warnings);

      expect(errors[0].message).toBe('logging.demote_hours must be between 0 and 8760 (got -1)');
    });

    it('should add error for NaN and non-numbers', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateNumberRange(NaN, 'X', 0, 10, errors, warnings);
      validateNumberRange('5', 'Y', 0, 10, errors, warnings);

      expect(errors.map(function(e) { return e.message; })).toEqual([
        'X must be between 0 and 10 (got NaN)',
        'Y must be between 0 and 10 (got 5)'
      ]);
    });

    it('should warn outside the recommended range only', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateNumberRange(120, 'poll_interval_seconds', 1, 3600, errors, warnings, 1, 60);

      expect(errors).toHaveLength(0);
      expect(warnings[0].message).toBe('poll_interval_seconds is outside recommended range 1-60 (got 120)');
    });

    it('should not warn when critical range fails', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateNumberRange(5000, 'poll_interval_seconds', 1, 3600, errors, warnings, 1, 60);

      expect(errors).toHaveLength(1);
      expect(warnings).toHaveLength(0);
    });
  });

  describe('validateIntegerRange', () => {
    it('should reject fractional values', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateIntegerRange(1.5, 'plc.rack', 0, 7, errors, warnings);

      expect(errors[0].message).toBe('plc.rack must be an integer (got 1.5)');
    });

    it('should check the range of integers', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateIntegerRange(0, 'plc.port', 1, 65535, errors, warnings);
      validateIntegerRange(102, 'plc.port', 1, 65535, errors, warnings);

      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe('plc.port must be between 1 and 65535 (got 0)');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Value readers
  // ═══════════════════════════════════════════════════════════════

  describe('value readers', () => {
    it('should fall back on missing or wrong-typed values', () => {
      expect(numberOr(undefined, 2)).toBe(2);
      expect(numberOr('5', 2)).toBe(2);
      expect(numberOr(5, 2)).toBe(5);
      expect(stringOr('  logs.db ', 'x')).toBe('logs.db');
      expect(stringOr('', 'x')).toBe('x');
      expect(booleanOr(false, true)).toBe(false);
      expect(booleanOr('no', true)).toBe(true);
      expect(levelOr('critical', 1)).toBe(3);
      expect(levelOr('loud', 1)).toBe(1);
    });
  });
});
