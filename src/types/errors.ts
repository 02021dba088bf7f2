/**
 * Global error types for the climate report
 * Every failure the tool reports on purpose extends ClimateReportError
 */

import type { ValidationIssue } from '../validation/types';

/**
 * Base error for all modules
 */
export class ClimateReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClimateReportError';
  }
}

/**
 * Error raised when an input file cannot be opened or read.
 * Reported per file; the remaining files are still processed.
 */
export class FileOpenError extends ClimateReportError {
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string) {
    super(`File "${path}" ${reason}.`);
    this.name = 'FileOpenError';
    this.path = path;
    this.reason = reason;
  }
}

/**
 * Error describing a line that does not hold nine valid fields
 */
export class MalformedRecordError extends ClimateReportError {
  readonly reason: string;

  constructor(reason: string) {
    super(`Malformed record: ${reason}`);
    this.name = 'MalformedRecordError';
    this.reason = reason;
  }
}

/**
 * Error thrown when the command line names no input files
 */
export class UsageError extends ClimateReportError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Error thrown when configuration values fail validation
 */
export class ConfigValidationError extends ClimateReportError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super('Invalid configuration: ' + issues.map(function (issue) {
      return issue.field + ' ' + issue.message;
    }).join('; '));
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}
