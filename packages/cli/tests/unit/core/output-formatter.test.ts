import { describe, it, expect } from 'vitest';
import {
  formatBacktestReport,
  formatCSV,
  formatJSON,
  formatOutput,
  formatTable,
} from '../../../src/core/output-formatter.js';
import type { BacktestReport } from '../../../src/types/index.js';

const report: BacktestReport = {
  file: './GSPC.csv',
  samples: 3,
  firstDate: '2000-01-01',
  lastDate: '2010-01-01',
  initialCapital: 100,
  numRuns: 1,
  yearsPerRun: 1,
  inflationRate: 1,
  annualCostOfLiving: 0,
  successCount: 1,
  failedCount: 1,
  naCount: 1,
  total: 3,
  successRate: 0.5,
  summary: 'success 1, failed: 1, N/A: 1, successful rate 0.500000',
};

describe('formatJSON', () => {
  it('pretty prints with two spaces', () => {
    expect(formatJSON({ a: 1 })).toBe('{\n  "a": 1\n}');
  });
});

describe('formatTable', () => {
  it('pads columns to the widest value', () => {
    const result = formatTable([
      { name: 'a', value: 1 },
      { name: 'long', value: 22 },
    ]);

    expect(result.split('\n')).toEqual([
      'name | value',
      '-----|------',
      'a    | 1    ',
      'long | 22   ',
    ]);
  });

  it('handles an empty array', () => {
    expect(formatTable([])).toBe('No data to display');
  });
});

describe('formatCSV', () => {
  it('quotes values containing separators', () => {
    expect(formatCSV([{ name: 'a,b', note: 'say "hi"' }])).toBe('name,note\n"a,b","say ""hi"""');
  });

  it('renders null as an empty cell', () => {
    expect(formatCSV([{ rate: null, total: 0 }])).toBe('rate,total\n,0');
  });

  it('handles an empty array', () => {
    expect(formatCSV([])).toBe('');
  });
});

describe('formatBacktestReport', () => {
  it('renders the summary block', () => {
    expect(formatBacktestReport(report).split('\n')).toEqual([
      '=== Backtest Summary ===',
      '',
      'Price file: ./GSPC.csv',
      'Samples: 3 (2000-01-01 to 2010-01-01)',
      'Strategy: capital 100, 1 runs x 1 years, inflation 1, cost of living 0/year',
      '',
      'Success: 1',
      'Failed: 1',
      'N/A: 1',
      'Success Rate: 50.00%',
      '',
      'success 1, failed: 1, N/A: 1, successful rate 0.500000',
    ]);
  });

  it('shows N/A without a rate and omits an empty date range', () => {
    const lines = formatBacktestReport({
      ...report,
      samples: 0,
      firstDate: null,
      lastDate: null,
      successRate: null,
    }).split('\n');

    expect(lines[3]).toBe('Samples: 0');
    expect(lines[9]).toBe('Success Rate: N/A');
  });
});

describe('formatOutput', () => {
  it('uses the report block for a report in table format', () => {
    expect(formatOutput(report, 'table')).toBe(formatBacktestReport(report));
  });

  it('serializes a report as JSON', () => {
    expect(JSON.parse(formatOutput(report, 'json'))).toEqual(report);
  });

  it('writes a report as a single CSV row', () => {
    const [header, row] = formatOutput(report, 'csv').split('\n');
    expect(header).toBe(
      'file,samples,firstDate,lastDate,initialCapital,numRuns,yearsPerRun,inflationRate,' +
        'annualCostOfLiving,successCount,failedCount,naCount,total,successRate,summary'
    );
    expect(row).toBe(
      './GSPC.csv,3,2000-01-01,2010-01-01,100,1,1,1,0,1,1,1,3,0.5,' +
        '"success 1, failed: 1, N/A: 1, successful rate 0.500000"'
    );
  });

  it('tabulates plain objects', () => {
    expect(formatOutput({ a: 1 }, 'table')).toBe('a\n-\n1');
  });

  it('stringifies primitives', () => {
    expect(formatOutput(42, 'json')).toBe('42');
  });
});
