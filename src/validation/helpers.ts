/**
 * Validation helper functions
 * Provides reusable utilities for configuration validation
 */

import type { ValidationIssue } from './types';

export const BOOLEAN_VALUES = ['true', 'false'] as const;

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
// VALUE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that a value, when present, is one of the allowed words
 *
 * Comparison ignores case and surrounding whitespace. An empty value
 * produces a warning (the default is used) rather than an error.
 *
 * @param value - Raw value (skips if undefined)
 * @param field - Field name for messages
 * @param allowed - Accepted lower-case words
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 */
export function validateChoice(
  value: string | undefined,
  field: string,
  allowed: readonly string[],
  errors: ValidationIssue[],
  warnings: ValidationIssue[]
): void {
  if (value === undefined) return;

  const normalized = value.trim().toLowerCase();

  if (normalized === '') {
    addWarning(warnings, field, `${field} is empty, using the default`);
    return;
  }

  if (allowed.indexOf(normalized) === -1) {
    addError(errors, field, `must be one of ${allowed.join(', ')} (got ${value})`);
  }
}

/**
 * Validate that a value, when present, reads as true or false
 * @param value - Raw value (skips if undefined)
 * @param field - Field name for messages
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 */
export function validateBooleanFlag(
  value: string | undefined,
  field: string,
  errors: ValidationIssue[],
  warnings: ValidationIssue[]
): void {
  validateChoice(value, field, BOOLEAN_VALUES, errors, warnings);
}
