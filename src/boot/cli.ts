/**
 * Command-line surface
 *
 * `climate-report [options] [files...]` reads every file in argument
 * order and prints the per-state report on stdout. Logs, errors and the
 * usage message go to stderr.
 */

import { Command, CommanderError, Option } from 'commander';

import { loadEnvFile } from './config';
import type { ConfigOverrides } from './config';
import { initialize } from './init';
import type { CliContext, CliIO } from './types';
import { ingestFiles } from '../features/ingest';
import { formatReport } from '../features/report';
import { UsageError } from '../types/errors';
import { PROGRAM_NAME, PROGRAM_VERSION } from '../utils/constants';

export const USAGE = `Usage: ${PROGRAM_NAME} tdv_file1 tdv_file2 ... tdv_fileN`;

type CliOptions = {
  parallel?: boolean;
  utc?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  color: boolean;
};

function createProgram(io: CliIO): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description('Summarize tab-delimited climate observations per state')
    .version(PROGRAM_VERSION)
    .argument('[files...]', 'observation files, read in the given order')
    .option('-p, --parallel', 'read all files at once and merge the results')
    .option('--utc', 'print timestamps in UTC instead of local time')
    .addOption(new Option('-v, --verbose', 'also log per-file totals').conflicts('quiet'))
    .option('-q, --quiet', 'log errors only')
    .option('--no-color', 'plain log output')
    .exitOverride()
    .configureOutput({
      writeOut: (str: string) => io.out(str),
      writeErr: (str: string) => io.console.error(str.trimEnd())
    });
}

function toOverrides(opts: CliOptions): ConfigOverrides {
  return {
    logLevel: opts.verbose ? 'debug' : opts.quiet ? 'error' : undefined,
    timeZone: opts.utc ? 'utc' : undefined,
    parallel: opts.parallel ? true : undefined,
    // --no-color only ever turns colors off; otherwise LOG_COLORS decides
    colors: opts.color ? undefined : false,
  };
}

/**
 * Ensure at least one input file was named
 * @throws {UsageError} When the list is empty
 */
export function requireFiles(files: readonly string[]): void {
  if (files.length === 0) {
    throw new UsageError(USAGE);
  }
}

/**
 * Run the tool once
 *
 * @param args - Arguments after the program name
 * @param io - Output streams
 * @param context - Environment and working directory
 * @returns Exit status: 0 once files are named, even when none could be opened
 */
export async function runCli(args: readonly string[], io: CliIO, context: CliContext): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync([...args], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  const files = program.args;
  try {
    requireFiles(files);
  } catch (err) {
    if (err instanceof UsageError) {
      io.console.error(err.message);
      return 1;
    }
    throw err;
  }

  const env = loadEnvFile(context.cwd, context.env);
  const runtime = initialize(env, toOverrides(program.opts<CliOptions>()), io.console);
  if (runtime === null) {
    return 1;
  }

  const result = await ingestFiles(files, { parallel: runtime.config.parallel }, runtime.logger);
  io.out(formatReport(result.table, { timeZone: runtime.config.timeZone }));

  return 0;
}
