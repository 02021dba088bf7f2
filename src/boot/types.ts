import type { ConsoleAPI, Logger } from '../logging';
import type { ReportConfig } from '../types/config';
import type { RawEnv } from '../validation/types';

/**
 * Resolved configuration and the logger built from it
 */
export interface Runtime {
  config: ReportConfig;
  logger: Logger;
}

/**
 * Process streams the command line writes to
 */
export interface CliIO {
  /** Standard output: the report and --help text */
  out: (text: string) => void;
  /** Standard error: logs and usage messages */
  console: ConsoleAPI;
}

export interface CliContext {
  env: RawEnv;
  /** Directory searched for the .env file */
  cwd: string;
}
