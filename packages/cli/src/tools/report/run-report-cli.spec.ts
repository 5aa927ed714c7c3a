import { describe, expect, it } from 'vitest';

import { createMemoryCliIo } from '../../testing/memory-cli-io.js';
import { createReportCliKernel, runReportCli } from './run-report-cli.js';

const EVENTS = [
  '{"type":"enterLibrary","uri":"dart:core/list.dart"}',
  '{"type":"compilationUnit","lines":10}',
  '{"type":"log","kind":"AnalyzerError","severity":"severe","message":"crash"}',
  '{"type":"leaveLibrary"}',
].join('\n');

describe('report CLI entrypoints', () => {
  it('registers the report command on a new kernel', async () => {
    const io = createMemoryCliIo();
    const kernel = createReportCliKernel({ programName: 'lintstat', version: '1.2.3', io });

    const exitCode = await kernel.run(['node', 'lintstat', '--version']);

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe('1.2.3\n');
  });

  it('runs the report command with the provided argv', async () => {
    const io = createMemoryCliIo({ stdin: EVENTS });

    const exitCode = await runReportCli({
      programName: 'lintstat',
      version: '0.0.0-test',
      io,
      argv: ['node', 'lintstat', 'report', '-'],
    });

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer.split('\n').slice(1, 3)).toEqual([
      'package      AE   LOC',
      '*other*       1    10',
    ]);
  });
});
