import type { StateTable } from '../../core/state-aggregator/types';
import type { FileOpenError } from '../../types/errors';

/**
 * Totals for one input source
 */
export interface IngestSummary {
  /** Source name as given (file path) */
  source: string;
  /** Lines read, blank lines included */
  linesRead: number;
  /** Lines parsed and folded into the table */
  recordsFolded: number;
  /** Lines skipped as malformed */
  malformedLines: number;
}

export type SourceOutcome =
  | { ok: true; summary: IngestSummary }
  | { ok: false; error: FileOpenError };

export interface IngestOptions {
  /** Read every file concurrently into its own table, then merge in argument order */
  parallel: boolean;
}

export interface IngestResult {
  table: StateTable;
  summaries: IngestSummary[];
  failures: FileOpenError[];
}
