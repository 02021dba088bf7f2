/**
 * Tests for observation file ingestion
 */

import { join } from 'path';

import { ingestFile, ingestFiles, ingestLines } from './ingest';
import { createStateTable, listStateCodes } from '../../core/state-aggregator';
import { FileOpenError } from '../../types/errors';
import { createFixtureDir, createRecordingLogger, observationLine } from '../../test-utils';
import type { FixtureDir } from '../../test-utils';

const CA_LINE = 'CA\t1428300000000\t9prcjqk3yc80\t93.0\t0.0\t100.0\t0.0\t95644.0\t277.58716';

describe('ingestLines', () => {
  it('should fold every valid line', async () => {
    const { logger } = createRecordingLogger();
    const table = createStateTable();

    const summary = await ingestLines([CA_LINE, CA_LINE], table, 'inline', logger);

    expect(summary).toEqual({ source: 'inline', linesRead: 2, recordsFolded: 2, malformedLines: 0 });
    expect(table.get('CA')?.recordCount).toBe(2);
    expect(table.get('CA')?.humiditySum).toBe(186);
  });

  it('should skip malformed lines with a warning naming the line', async () => {
    const { logger, lines } = createRecordingLogger();
    const table = createStateTable();

    const summary = await ingestLines([CA_LINE, 'CA\tbroken', CA_LINE], table, 'data.tdv', logger);

    expect(summary.malformedLines).toBe(1);
    expect(summary.recordsFolded).toBe(2);
    expect(lines).toContain(
      '[WARNING] Skipping line 2 of data.tdv: expected 9 tab-separated fields, got 2'
    );
  });

  it('should skip blank lines without counting them as malformed', async () => {
    const { logger, lines } = createRecordingLogger();
    const table = createStateTable();

    const summary = await ingestLines(['', CA_LINE, '   '], table, 'inline', logger);

    expect(summary).toEqual({ source: 'inline', linesRead: 3, recordsFolded: 1, malformedLines: 0 });
    expect(lines.filter(line => line.startsWith('[WARNING]'))).toHaveLength(0);
  });

  it('should not touch the table for a malformed line', async () => {
    const { logger } = createRecordingLogger();
    const table = createStateTable();

    await ingestLines([CA_LINE.replace('93.0', 'wet')], table, 'inline', logger);

    expect(table.size).toBe(0);
  });

  it('should log totals at debug level', async () => {
    const { logger, lines } = createRecordingLogger();

    await ingestLines([CA_LINE, 'x'], createStateTable(), 'a.tdv', logger);

    expect(lines).toContain('[DEBUG]   Finished a.tdv: 1 records, 1 malformed lines skipped');
  });

  it('should accept async line sources', async () => {
    const { logger } = createRecordingLogger();
    const table = createStateTable();
    async function* source() {
      yield CA_LINE;
      yield CA_LINE;
    }

    await ingestLines(source(), table, 'stream', logger);

    expect(table.get('CA')?.recordCount).toBe(2);
  });
});

describe('file ingestion', () => {
  let fixtures: FixtureDir;

  beforeEach(() => {
    fixtures = createFixtureDir();
  });

  afterEach(() => {
    fixtures.cleanup();
  });

  describe('ingestFile', () => {
    it('should read a file line by line', async () => {
      const { logger, lines } = createRecordingLogger();
      const path = fixtures.write('ca.tdv', [CA_LINE, CA_LINE, CA_LINE]);
      const table = createStateTable();

      const summary = await ingestFile(path, table, logger);

      expect(summary.recordsFolded).toBe(3);
      expect(table.get('CA')?.recordCount).toBe(3);
      expect(lines[0]).toBe(`[INFO]    Opening file: ${path}`);
    });

    it('should handle windows line endings', async () => {
      const { logger } = createRecordingLogger();
      const path = fixtures.write('crlf.tdv', [CA_LINE + '\r']);
      const table = createStateTable();

      const summary = await ingestFile(path, table, logger);

      expect(summary.malformedLines).toBe(0);
      expect(table.get('CA')?.recordCount).toBe(1);
    });

    it('should reject a missing file with FileOpenError', async () => {
      const { logger } = createRecordingLogger();
      const path = join(fixtures.path, 'missing.tdv');

      await expect(ingestFile(path, createStateTable(), logger)).rejects.toThrow(
        new FileOpenError(path, 'does not exist')
      );
    });

    it('should reject a directory', async () => {
      const { logger } = createRecordingLogger();

      await expect(ingestFile(fixtures.path, createStateTable(), logger)).rejects.toThrow(
        `File "${fixtures.path}" is a directory.`
      );
    });
  });

  describe('ingestFiles', () => {
    const writeStateFiles = () => [
      fixtures.write('data_tn.tdv', [
        observationLine('TN', 1428300000000, 290, { humidity: 40, lightning: 1 }),
        observationLine('TN', 1428303600000, 300, { humidity: 60 }),
      ]),
      fixtures.write('data_wa.tdv', [
        observationLine('WA', 1451448000000, 250, { humidity: 80, snow: 1 }),
      ]),
    ];

    it('should keep first-seen order across files', async () => {
      const { logger } = createRecordingLogger();

      const result = await ingestFiles(writeStateFiles(), { parallel: false }, logger);

      expect(listStateCodes(result.table)).toEqual(['TN', 'WA']);
      expect(result.summaries.map(s => s.recordsFolded)).toEqual([2, 1]);
      expect(result.failures).toHaveLength(0);
    });

    it('should keep statistics of different files apart', async () => {
      const { logger } = createRecordingLogger();

      const result = await ingestFiles(writeStateFiles(), { parallel: false }, logger);

      const tn = result.table.get('TN');
      const wa = result.table.get('WA');
      expect(tn?.recordCount).toBe(2);
      expect(tn?.humiditySum).toBe(100);
      expect(tn?.lightningCount).toBe(1);
      expect(tn?.snowCount).toBe(0);
      expect(wa?.recordCount).toBe(1);
      expect(wa?.humiditySum).toBe(80);
      expect(wa?.snowCount).toBe(1);
      expect(wa?.lightningCount).toBe(0);
    });

    it('should report a missing file and keep reading the others', async () => {
      const { logger, lines } = createRecordingLogger();
      const [tn] = writeStateFiles();
      const missing = join(fixtures.path, 'nope.tdv');

      const result = await ingestFiles([missing, tn], { parallel: false }, logger);

      expect(result.failures).toHaveLength(1);
      expect(result.failures[0].path).toBe(missing);
      expect(lines).toContain(`[ERROR]   File "${missing}" does not exist.`);
      expect(result.table.get('TN')?.recordCount).toBe(2);
    });

    it('should produce the same table in parallel mode', async () => {
      const { logger } = createRecordingLogger();
      const paths = writeStateFiles();

      const sequential = await ingestFiles(paths, { parallel: false }, logger);
      const parallel = await ingestFiles(paths, { parallel: true }, logger);

      expect(listStateCodes(parallel.table)).toEqual(listStateCodes(sequential.table));
      expect(parallel.table.get('TN')).toEqual(sequential.table.get('TN'));
      expect(parallel.table.get('WA')).toEqual(sequential.table.get('WA'));
      expect(parallel.summaries).toEqual(sequential.summaries);
    });

    it('should report failures in parallel mode', async () => {
      const { logger } = createRecordingLogger();
      const [tn, wa] = writeStateFiles();
      const missing = join(fixtures.path, 'nope.tdv');

      const result = await ingestFiles([tn, missing, wa], { parallel: true }, logger);

      expect(result.failures.map(f => f.path)).toEqual([missing]);
      expect(listStateCodes(result.table)).toEqual(['TN', 'WA']);
    });

    it('should return an empty table when no file can be read', async () => {
      const { logger } = createRecordingLogger();

      const result = await ingestFiles([join(fixtures.path, 'a'), join(fixtures.path, 'b')], { parallel: false }, logger);

      expect(result.table.size).toBe(0);
      expect(result.failures).toHaveLength(2);
    });
  });
});
