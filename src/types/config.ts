/**
 * Type definition for report configuration
 */

import type { LogLevelName, TimeZoneMode } from './common';

/**
 * Settings resolved from the environment and the command line
 */
export interface ReportConfig {
  /** Minimum level written to stderr */
  readonly logLevel: LogLevelName;
  /** Zone used for extrema timestamps */
  readonly timeZone: TimeZoneMode;
  /** Read files concurrently and merge per-file tables */
  readonly parallel: boolean;
  /** Color log tags on stderr */
  readonly colors: boolean;
}
