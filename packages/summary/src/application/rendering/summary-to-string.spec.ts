import { describe, expect, it } from 'vitest';

import { SummaryReporter } from '../reporting/summary-reporter.js';
import { GlobalSummary } from '../../domain/summary/summary-nodes.js';
import { summaryToString } from './summary-to-string.js';

const typeError = {
  kind: 'TypeError',
  severity: 'severe',
  begin: 0,
  end: 1,
  message: 'x',
} as const;

describe('summaryToString', () => {
  it('renders package rows, totals, and percentages of lines of code', () => {
    const reporter = new SummaryReporter();
    const library = reporter.enterLibrary('package:p/p.dart');
    library.recordLineCount(10);
    library.log(typeError);
    library.log(typeError);
    library.leave();
    const system = reporter.enterLibrary('dart:core');
    system.recordLineCount(5);
    system.log(typeError);
    system.leave();

    expect(summaryToString(reporter.result)).toBe(
      [
        '',
        'package     AE     TE   LOC',
        '*other*      0      1     5',
        'p            0      2    10',
        '-------- -----  ----- -----',
        'package     AE     TE   LOC',
        'total        0      3    15',
        '%         0.00  20.00   100',
        '',
        'Where:',
        '  AE:   AnalyzerError',
        '  TE:   TypeError',
        '  LOC:  LinesOfCode',
        '',
      ].join('\n'),
    );
  });

  it('renders an empty summary with zero totals and percentages', () => {
    expect(summaryToString(new GlobalSummary())).toBe(
      [
        '',
        'package     AE   LOC',
        '-------- ----- -----',
        'package     AE   LOC',
        'total        0     0',
        '%         0.00   100',
        '',
        'Where:',
        '  AE:   AnalyzerError',
        '  LOC:  LinesOfCode',
        '',
      ].join('\n'),
    );
  });

  it('keeps a row of zeros for a package with lines but no messages', () => {
    const reporter = new SummaryReporter();
    const quiet = reporter.enterLibrary('package:quiet/quiet.dart');
    quiet.recordLineCount(4);
    quiet.leave();
    const noisy = reporter.enterLibrary('package:p/p.dart');
    noisy.recordLineCount(6);
    noisy.log(typeError);
    noisy.leave();

    const lines = summaryToString(reporter.result).split('\n');

    expect(lines.slice(1, 8)).toEqual([
      'package     AE     TE   LOC',
      'quiet        0      0     4',
      'p            0      1     6',
      '-------- -----  ----- -----',
      'package     AE     TE   LOC',
      'total        0      1    10',
      '%         0.00  10.00   100',
    ]);
  });

  it('does not declare the analyzer error column twice', () => {
    const reporter = new SummaryReporter();
    reporter.enterLibrary('package:p/p.dart').log({ ...typeError, kind: 'AnalyzerError' });

    const lines = summaryToString(reporter.result).split('\n');

    expect(lines[1]).toBe('package     AE   LOC');
    expect(lines[2]).toBe('p            1     0');
    expect(lines[5]).toBe('total        1     0');
    expect(lines[6]).toBe('%         0.00   100');
  });

  it('keeps every table line the same length', () => {
    const reporter = new SummaryReporter();
    const handle = reporter.enterLibrary('package:a-long-package-name/lib.dart');
    handle.recordLineCount(123456);
    for (let index = 0; index < 12; index += 1) {
      handle.log({ ...typeError, kind: index % 2 === 0 ? 'DownCastImplicit' : 'DynamicInvoke' });
    }
    handle.leave();

    const [table] = summaryToString(reporter.result).split('\n\nWhere:');
    const rows = table?.split('\n').filter((row) => row.length > 0) ?? [];

    expect(rows).toHaveLength(6);
    expect(new Set(rows.map((row) => row.length)).size).toBe(1);
    expect(rows.at(-1)).toContain('0.00');
  });
});
