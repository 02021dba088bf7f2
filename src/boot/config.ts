import { existsSync } from 'fs';
import { resolve } from 'path';

import * as dotenv from 'dotenv';

import type { ReportConfig } from '../types/config';
import { ConfigValidationError } from '../types/errors';
import { LOG_LEVEL_NAMES, TIME_ZONE_MODES } from '../utils/constants';
import { BOOLEAN_VALUES } from '../validation/helpers';
import type { RawEnv, ValidationIssue } from '../validation/types';
import { validateReportEnv } from '../validation/validator';

// ─────────────────────────────────────────────────────────────
// DEFAULT CONFIGURATION
//   Used for every setting that neither the environment
//   nor a command-line flag provides.
// ─────────────────────────────────────────────────────────────

export const DEFAULT_CONFIG: ReportConfig = {
  // logLevel (LOG_LEVEL, -v / -q)
  //   Role: Lowest log level written to stderr.
  //   Values: debug, info, warning, error.
  logLevel: 'info',

  // timeZone (REPORT_TIMEZONE, --utc)
  //   Role: Zone used to print the max/min temperature timestamps.
  //   Values: local (process time zone), utc.
  timeZone: 'local',

  // parallel (PARALLEL_READS, -p)
  //   Role: Read all files at once, one table per file, merged in argument order.
  //   Values: true, false.
  parallel: false,

  // colors (LOG_COLORS, --no-color)
  //   Role: Color log tags on stderr.
  //   Values: true, false.
  colors: true,
};

export const ENV_FILE_NAME = '.env';

export type ConfigOverrides = Partial<ReportConfig>;

export interface LoadedConfig {
  config: ReportConfig;
  /** Values that were ignored in favor of the default */
  warnings: ValidationIssue[];
}

function pickChoice<T extends string>(value: string | undefined, allowed: readonly T[]): T | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return allowed.find(choice => choice === normalized);
}

function pickBoolean(value: string | undefined): boolean | undefined {
  const choice = pickChoice(value, BOOLEAN_VALUES);
  return choice === undefined ? undefined : choice === 'true';
}

/**
 * Merge a .env file from a directory under the given environment
 *
 * Values already present in `env` win over the file. A missing file is
 * not an error.
 *
 * @param dir - Directory holding the .env file
 * @param env - Environment to merge over the file values
 * @returns Combined environment
 */
export function loadEnvFile(dir: string, env: RawEnv): RawEnv {
  const path = resolve(dir, ENV_FILE_NAME);
  if (!existsSync(path)) {
    return env;
  }

  const fileValues: Record<string, string> = {};
  const result = dotenv.config({ path, processEnv: fileValues });
  if (result.error) {
    throw result.error;
  }

  return { ...fileValues, ...env };
}

/**
 * Resolve the report configuration
 *
 * Precedence: overrides (command-line flags), then environment, then defaults.
 *
 * @param env - Environment variables
 * @param overrides - Values set on the command line
 * @returns Configuration and validation warnings
 * @throws {ConfigValidationError} When an environment value is not recognised
 */
export function loadReportConfig(env: RawEnv, overrides: ConfigOverrides = {}): LoadedConfig {
  const validation = validateReportEnv(env);
  if (!validation.valid) {
    throw new ConfigValidationError(validation.errors);
  }

  const config: ReportConfig = {
    logLevel: overrides.logLevel ?? pickChoice(env.LOG_LEVEL, LOG_LEVEL_NAMES) ?? DEFAULT_CONFIG.logLevel,
    timeZone: overrides.timeZone ?? pickChoice(env.REPORT_TIMEZONE, TIME_ZONE_MODES) ?? DEFAULT_CONFIG.timeZone,
    parallel: overrides.parallel ?? pickBoolean(env.PARALLEL_READS) ?? DEFAULT_CONFIG.parallel,
    colors: overrides.colors ?? pickBoolean(env.LOG_COLORS) ?? DEFAULT_CONFIG.colors,
  };

  return { config, warnings: validation.warnings };
}
