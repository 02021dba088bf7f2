/**
 * Shared test helpers: a logger that records lines and temporary fixture files
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { createLogger, LOG_LEVELS } from '../logging';
import type { LogLevel, Logger } from '../logging';

export interface RecordingLogger {
  logger: Logger;
  lines: string[];
}

export function createRecordingLogger(level: LogLevel = LOG_LEVELS.DEBUG): RecordingLogger {
  const lines: string[] = [];
  const logger = createLogger(
    { level: level },
    {
      sinks: [{ write: (message: string) => { lines.push(message); } }],
      fallback: { warn: (message: string) => { lines.push(message); } }
    },
    LOG_LEVELS
  );
  return { logger, lines };
}

export interface FixtureDir {
  path: string;
  write(name: string, lines: string[]): string;
  cleanup(): void;
}

export function createFixtureDir(): FixtureDir {
  const path = mkdtempSync(join(tmpdir(), 'climate-report-'));
  return {
    path,
    write(name: string, lines: string[]): string {
      const file = join(path, name);
      writeFileSync(file, lines.map(line => line + '\n').join(''));
      return file;
    },
    cleanup(): void {
      rmSync(path, { recursive: true, force: true });
    },
  };
}

/**
 * Build one tab-delimited observation line
 */
export function observationLine(
  state: string,
  timestampMs: number,
  kelvin: number,
  fields: { humidity?: number; snow?: number; cloud?: number; lightning?: number } = {}
): string {
  return [
    state,
    String(timestampMs),
    '9prcjqk3yc80',
    (fields.humidity ?? 50).toFixed(1),
    (fields.snow ?? 0).toFixed(1),
    (fields.cloud ?? 0).toFixed(1),
    (fields.lightning ?? 0).toFixed(1),
    '101325.0',
    String(kelvin),
  ].join('\t');
}
