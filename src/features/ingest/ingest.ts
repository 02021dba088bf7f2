/**
 * Observation file ingestion
 *
 * Reads sources line by line and folds every parsed observation into a
 * state table. Malformed lines are skipped with a warning; a file that
 * cannot be opened is reported and the remaining files are still read.
 */

import { createInterface } from 'readline';

import { parseRecord } from '../../core/record-parser';
import { createStateTable, foldObservation, mergeStateTables } from '../../core/state-aggregator';
import type { StateTable } from '../../core/state-aggregator';
import type { Logger } from '../../logging';
import { FileOpenError } from '../../types/errors';
import { openSource } from './helpers';
import type { IngestOptions, IngestResult, IngestSummary, SourceOutcome } from './types';

/**
 * Fold a sequence of lines into a table (MUTABLE)
 *
 * Blank lines are skipped silently. Lines that fail to parse are counted
 * and logged at WARNING with their 1-based line number.
 *
 * @param lines - Lines without terminators (or with, they are stripped)
 * @param table - State table (will be mutated)
 * @param source - Source name used in log messages
 * @param logger - Logger for skipped lines and totals
 * @returns Totals for this source
 */
export async function ingestLines(
  lines: AsyncIterable<string> | Iterable<string>,
  table: StateTable,
  source: string,
  logger: Logger
): Promise<IngestSummary> {
  const summary: IngestSummary = { source, linesRead: 0, recordsFolded: 0, malformedLines: 0 };

  for await (const line of lines) {
    summary.linesRead += 1;

    if (line.trim() === '') {
      continue;
    }

    const result = parseRecord(line);
    if (!result.ok) {
      summary.malformedLines += 1;
      logger.warning(`Skipping line ${summary.linesRead} of ${source}: ${result.error.reason}`);
      continue;
    }

    foldObservation(table, result.observation);
    summary.recordsFolded += 1;
  }

  logger.debug(
    `Finished ${source}: ${summary.recordsFolded} records, ${summary.malformedLines} malformed lines skipped`
  );

  return summary;
}

/**
 * Read one file into a table (MUTABLE)
 *
 * @param path - File path
 * @param table - State table (will be mutated)
 * @param logger - Logger
 * @returns Totals for this file
 * @throws {FileOpenError} When the file cannot be opened
 */
export async function ingestFile(path: string, table: StateTable, logger: Logger): Promise<IngestSummary> {
  logger.info(`Opening file: ${path}`);

  const handle = await openSource(path);
  const stream = handle.createReadStream({ encoding: 'utf8' });
  const lines = createInterface({ input: stream, crlfDelay: Infinity });

  try {
    return await ingestLines(lines, table, path, logger);
  } finally {
    lines.close();
    stream.destroy();
  }
}

async function ingestSource(path: string, table: StateTable, logger: Logger): Promise<SourceOutcome> {
  try {
    return { ok: true, summary: await ingestFile(path, table, logger) };
  } catch (err) {
    if (err instanceof FileOpenError) {
      logger.error(err.message);
      return { ok: false, error: err };
    }
    throw err;
  }
}

function collect(outcomes: SourceOutcome[], table: StateTable): IngestResult {
  const result: IngestResult = { table, summaries: [], failures: [] };

  for (const outcome of outcomes) {
    if (outcome.ok) {
      result.summaries.push(outcome.summary);
    } else {
      result.failures.push(outcome.error);
    }
  }

  return result;
}

/**
 * Read every file and aggregate per state
 *
 * Sequential mode folds all files into one table in argument order.
 * Parallel mode reads all files at once, each into its own table, and
 * merges the tables in argument order; codes, counts and extrema match
 * sequential mode, sums may differ in the last bits.
 *
 * @param paths - File paths in argument order
 * @param options - Ingest options
 * @param logger - Logger
 * @returns Aggregated table, per-file totals and files that could not be opened
 */
export async function ingestFiles(
  paths: readonly string[],
  options: IngestOptions,
  logger: Logger
): Promise<IngestResult> {
  if (options.parallel) {
    const tables = paths.map(() => createStateTable());
    const outcomes = await Promise.all(paths.map((path, i) => ingestSource(path, tables[i], logger)));
    return collect(outcomes, mergeStateTables(tables));
  }

  const table = createStateTable();
  const outcomes: SourceOutcome[] = [];
  for (const path of paths) {
    outcomes.push(await ingestSource(path, table, logger));
  }
  return collect(outcomes, table);
}
