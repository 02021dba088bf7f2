/**
 * Tests for the per-state report
 */

import { formatReport, formatStateBlock, formatStateList, summarizeState } from './report';
import { createStateStats, createStateTable, foldObservation } from '../../core/state-aggregator';
import type { StateTable } from '../../core/state-aggregator';
import type { Observation } from '../../core/record-parser';

function observation(overrides: Partial<Observation>): Observation {
  return {
    state: 'TN',
    timestamp: 0,
    humidity: 50,
    snow: 0,
    cloudCover: 0,
    lightning: 0,
    temperature: 60,
    ...overrides,
  };
}

function buildTable(): StateTable {
  const table = createStateTable();
  foldObservation(table, observation({
    timestamp: 1438599600, humidity: 40, cloudCover: 50, temperature: 110.4, lightning: 1,
  }));
  foldObservation(table, observation({
    timestamp: 1424404800, humidity: 60, cloudCover: 56, temperature: -11.2, snow: 1,
  }));
  foldObservation(table, observation({
    state: 'WA', timestamp: 1451448000, humidity: 80, cloudCover: 20, temperature: 30, snow: 1,
  }));
  return table;
}

describe('summarizeState', () => {
  it('should divide sums by the record count', () => {
    const table = buildTable();
    const tn = table.get('TN');
    if (tn === undefined) throw new Error('TN missing');

    const summary = summarizeState(tn);

    expect(summary.recordCount).toBe(2);
    expect(summary.averageHumidity).toBe(50);
    expect(summary.averageCloudCover).toBe(53);
    expect(summary.averageTemperature).toBeCloseTo(49.6, 9);
    expect(summary.maxTemperature).toBe(110.4);
    expect(summary.maxTemperatureAt).toBe(1438599600);
    expect(summary.minTemperature).toBe(-11.2);
    expect(summary.minTemperatureAt).toBe(1424404800);
    expect(summary.lightningStrikes).toBe(1);
    expect(summary.snowCoverRecords).toBe(1);
  });

  it('should leave averages and extrema empty for a state without records', () => {
    const summary = summarizeState(createStateStats('ZZ'));

    expect(summary.averageHumidity).toBeNull();
    expect(summary.averageTemperature).toBeNull();
    expect(summary.averageCloudCover).toBeNull();
    expect(summary.maxTemperature).toBeNull();
    expect(summary.minTemperatureAt).toBeNull();
  });
});

describe('formatStateList', () => {
  it('should list codes in first-seen order', () => {
    expect(formatStateList(buildTable())).toBe('States found: TN WA');
  });

  it('should print only the label for an empty table', () => {
    expect(formatStateList(createStateTable())).toBe('States found:');
  });
});

describe('formatStateBlock', () => {
  it('should render n/a for a state without records', () => {
    const block = formatStateBlock(summarizeState(createStateStats('ZZ')), 'utc');

    expect(block).toEqual([
      '-- State: ZZ --',
      'Number of Records: 0',
      'Average Humidity: n/a%',
      'Average Temperature: n/aF',
      'Max Temperature: n/aF',
      'Max Temperature on: n/a',
      'Min Temperature: n/aF',
      'Min Temperature on: n/a',
      'Lightning Strikes: 0',
      'Records with Snow Cover: 0',
      'Average Cloud Cover: n/a%',
    ]);
  });
});

describe('formatReport', () => {
  it('should render the header and one block per state', () => {
    const report = formatReport(buildTable(), { timeZone: 'utc' });

    expect(report).toBe([
      'States found: TN WA',
      '-- State: TN --',
      'Number of Records: 2',
      'Average Humidity: 50.0%',
      'Average Temperature: 49.6F',
      'Max Temperature: 110.4F',
      'Max Temperature on: Mon Aug  3 11:00:00 2015',
      'Min Temperature: -11.2F',
      'Min Temperature on: Fri Feb 20 04:00:00 2015',
      'Lightning Strikes: 1',
      'Records with Snow Cover: 1',
      'Average Cloud Cover: 53.0%',
      '-- State: WA --',
      'Number of Records: 1',
      'Average Humidity: 80.0%',
      'Average Temperature: 30.0F',
      'Max Temperature: 30.0F',
      'Max Temperature on: Wed Dec 30 04:00:00 2015',
      'Min Temperature: 30.0F',
      'Min Temperature on: Wed Dec 30 04:00:00 2015',
      'Lightning Strikes: 0',
      'Records with Snow Cover: 1',
      'Average Cloud Cover: 20.0%',
      '',
    ].join('\n'));
  });

  it('should round an average on an exact tie to the even tenth', () => {
    const table = createStateTable();
    [50, 50, 50, 51].forEach(humidity => foldObservation(table, observation({ humidity })));
    foldObservation(table, observation({ state: 'WA', temperature: -10.25 }));

    const lines = formatReport(table, { timeZone: 'utc' }).split('\n');

    expect(lines).toContain('Average Humidity: 50.2%');
    expect(lines).toContain('Average Temperature: -10.2F');
    expect(lines).toContain('Max Temperature: -10.2F');
  });

  it('should render only the header for an empty table', () => {
    expect(formatReport(createStateTable(), { timeZone: 'local' })).toBe('States found:\n');
  });
});
