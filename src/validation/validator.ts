import type { RawEnv, ValidationIssue, ValidationResult } from './types';
import { validateBooleanFlag, validateChoice } from './helpers';
import { LOG_LEVEL_NAMES, TIME_ZONE_MODES } from '../utils/constants';

export function validateReportEnv(env: RawEnv): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  validateChoice(env.LOG_LEVEL, 'LOG_LEVEL', LOG_LEVEL_NAMES, errors, warnings);
  validateChoice(env.REPORT_TIMEZONE, 'REPORT_TIMEZONE', TIME_ZONE_MODES, errors, warnings);
  validateBooleanFlag(env.PARALLEL_READS, 'PARALLEL_READS', errors, warnings);
  validateBooleanFlag(env.LOG_COLORS, 'LOG_COLORS', errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}
