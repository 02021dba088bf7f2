/**
 * Unit tests for validation helper functions
 */

import { addError, addWarning, validateBooleanFlag, validateChoice } from './helpers';
import type { ValidationIssue } from './types';

describe('Validation Helpers', () => {
  // ═══════════════════════════════════════════════════════════════
  // addError()
  // ═══════════════════════════════════════════════════════════════

  describe('addError', () => {
    it('should add error with CRITICAL level', () => {
      const errors: ValidationIssue[] = [];

      addError(errors, 'TEST_FIELD', 'Test error message');

      expect(errors).toHaveLength(1);
      expect(errors[0].level).toBe('CRITICAL');
    });

    it('should add error with correct field and message', () => {
      const errors: ValidationIssue[] = [];

      addError(errors, 'LOG_LEVEL', 'Value not recognised');

      expect(errors[0]).toEqual({
        level: 'CRITICAL',
        field: 'LOG_LEVEL',
        message: 'Value not recognised'
      });
    });

    it('should accumulate multiple errors', () => {
      const errors: ValidationIssue[] = [];

      addError(errors, 'FIELD1', 'Error 1');
      addError(errors, 'FIELD2', 'Error 2');

      expect(errors).toHaveLength(2);
      expect(errors[0].field).toBe('FIELD1');
      expect(errors[1].field).toBe('FIELD2');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // addWarning()
  // ═══════════════════════════════════════════════════════════════

  describe('addWarning', () => {
    it('should add warning with correct field and message', () => {
      const warnings: ValidationIssue[] = [];

      addWarning(warnings, 'REPORT_TIMEZONE', 'Empty value');

      expect(warnings[0]).toEqual({
        level: 'WARNING',
        field: 'REPORT_TIMEZONE',
        message: 'Empty value'
      });
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateChoice()
  // ═══════════════════════════════════════════════════════════════

  describe('validateChoice', () => {
    const allowed = ['local', 'utc'];

    it('should skip undefined values', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateChoice(undefined, 'ZONE', allowed, errors, warnings);

      expect(errors).toHaveLength(0);
      expect(warnings).toHaveLength(0);
    });

    it('should accept allowed words regardless of case and padding', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateChoice(' UTC ', 'ZONE', allowed, errors, warnings);

      expect(errors).toHaveLength(0);
      expect(warnings).toHaveLength(0);
    });

    it('should reject words outside the list', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateChoice('mars', 'ZONE', allowed, errors, warnings);

      expect(errors).toEqual([
        { level: 'CRITICAL', field: 'ZONE', message: 'must be one of local, utc (got mars)' }
      ]);
    });

    it('should warn about empty values', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateChoice('  ', 'ZONE', allowed, errors, warnings);

      expect(errors).toHaveLength(0);
      expect(warnings[0].message).toBe('ZONE is empty, using the default');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateBooleanFlag()
  // ═══════════════════════════════════════════════════════════════

  describe('validateBooleanFlag', () => {
    it('should accept true and false', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateBooleanFlag('true', 'FLAG', errors, warnings);
      validateBooleanFlag('FALSE', 'FLAG', errors, warnings);

      expect(errors).toHaveLength(0);
    });

    it('should reject other words', () => {
      const errors: ValidationIssue[] = [];
      const warnings: ValidationIssue[] = [];

      validateBooleanFlag('yes', 'FLAG', errors, warnings);

      expect(errors[0].message).toBe('must be one of true, false (got yes)');
    });
  });
});
