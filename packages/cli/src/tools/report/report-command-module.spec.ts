import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createCliKernel } from '../../kernel/cli-kernel.js';
import { createMemoryCliIo, type MemoryCliIo } from '../../testing/memory-cli-io.js';
import { reportCommandModule } from './report-command-module.js';

const EVENTS = [
  '{"type":"enterLibrary","uri":"package:demo/demo.dart"}',
  '{"type":"compilationUnit","lines":2}',
  '{"type":"log","kind":"StaticInfo","severity":"info","begin":0,"end":1,"message":"hint"}',
  '{"type":"log","kind":"StaticWarning","severity":"warning","begin":0,"end":1,"message":"warn"}',
  '{"type":"leaveLibrary"}',
].join('\n');

const FULL_REPORT = [
  '',
  'package     AE     SI     SW   LOC',
  'demo         0      1      1     2',
  '-------- -----  -----  ----- -----',
  'package     AE     SI     SW   LOC',
  'total        0      1      1     2',
  '%         0.00  50.00  50.00   100',
  '',
  'Where:',
  '  AE:   AnalyzerError',
  '  SI:   StaticInfo',
  '  SW:   StaticWarning',
  '  LOC:  LinesOfCode',
  '',
].join('\n');

const WARNINGS_REPORT = [
  '',
  'package     AE     SW   LOC',
  'demo         0      1     2',
  '-------- -----  ----- -----',
  'package     AE     SW   LOC',
  'total        0      1     2',
  '%         0.00  50.00   100',
  '',
  'Where:',
  '  AE:   AnalyzerError',
  '  SW:   StaticWarning',
  '  LOC:  LinesOfCode',
  '',
].join('\n');

describe('reportCommandModule', () => {
  let workspace: string;

  const run = async (args: readonly string[], io: MemoryCliIo = createMemoryCliIo()) => {
    const kernel = createCliKernel({ programName: 'lintstat', version: '0.0.0-test', io });
    kernel.register(reportCommandModule);
    const exitCode = await kernel.run(['node', 'lintstat', ...args]);
    return { exitCode, io };
  };

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'lintstat-report-'));
    vi.spyOn(process, 'cwd').mockReturnValue(workspace);
    await writeFile(path.join(workspace, 'events.jsonl'), EVENTS, 'utf8');
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('prints the summary table for an events file', async () => {
    const { exitCode, io } = await run(['report', 'events.jsonl']);

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe(FULL_REPORT);
    expect(io.stderrBuffer).toBe('');
  });

  it('reads events from stdin when given -', async () => {
    const { exitCode, io } = await run(['report', '-'], createMemoryCliIo({ stdin: EVENTS }));

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe(FULL_REPORT);
  });

  it('applies the minimum severity from the discovered configuration', async () => {
    await writeFile(
      path.join(workspace, 'lintstat.config.json'),
      JSON.stringify({ report: { minimumSeverity: 'warning' } }),
      'utf8',
    );

    const { exitCode, io } = await run(['report', 'events.jsonl']);

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe(WARNINGS_REPORT);
  });

  it('lets --min-severity override the configuration', async () => {
    await writeFile(
      path.join(workspace, 'custom.json'),
      JSON.stringify({ report: { minimumSeverity: 'off' } }),
      'utf8',
    );

    const { exitCode, io } = await run([
      'report',
      'events.jsonl',
      '--config',
      'custom.json',
      '--min-severity',
      'WARNING',
    ]);

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe(WARNINGS_REPORT);
  });

  it('rejects unknown --min-severity values', async () => {
    const { exitCode, io } = await run(['report', 'events.jsonl', '--min-severity', 'loud']);

    expect(exitCode).toBe(1);
    expect(io.stdoutBuffer).toBe('');
    expect(io.stderrBuffer).toContain(
      'Expected one of: all, finest, finer, fine, config, info, warning, severe, shout, off.',
    );
  });

  it('names the offending line of an invalid event stream', async () => {
    await writeFile(
      path.join(workspace, 'broken.jsonl'),
      '{"type":"enterLibrary","uri":"package:demo/demo.dart"}\n{"type":"explode"}\n',
      'utf8',
    );

    const { exitCode, io } = await run(['report', 'broken.jsonl']);

    expect(exitCode).toBe(1);
    expect(io.stdoutBuffer).toBe('');
    expect(io.stderrBuffer).toMatch(
      /^Failed to build report: ReportEventError: Invalid report event on line 2: type: /,
    );
  });

  it('reports messages logged outside any unit', async () => {
    await writeFile(
      path.join(workspace, 'stray.jsonl'),
      '{"type":"log","kind":"TypeError","severity":"warning","message":"stray"}\n',
      'utf8',
    );

    const { exitCode, io } = await run(['report', 'stray.jsonl']);

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toBe(
      'Failed to build report: NoCurrentUnitError [NO_CURRENT_UNIT]: ' +
        'Cannot log a diagnostic: no library or HTML unit is currently entered.\n',
    );
  });

  it('fails when the configuration file is missing', async () => {
    const { exitCode, io } = await run(['report', 'events.jsonl', '--config', 'missing.json']);

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toBe(
      'Failed to build report: Error: Configuration file not found: missing.json\n',
    );
  });

  it('emits a completion log line with --json-logs', async () => {
    const { exitCode, io } = await run(['--json-logs', 'report', 'events.jsonl']);

    expect(exitCode).toBe(0);
    const entries = io.stderrBuffer
      .trim()
      .split('\n')
      .map((line): unknown => JSON.parse(line));
    expect(entries.at(-1)).toMatchObject({
      level: 'info',
      name: 'lintstat-cli',
      event: 'report.completed',
      data: { events: 5, droppedMessages: 0, minimumSeverity: 'all', config: null },
    });
    expect(entries[0]).toMatchObject({
      level: 'debug',
      name: 'lintstat-summary',
      event: 'summary.unit.enter',
      data: { identifier: 'package:demo/demo.dart', type: 'library' },
    });
  });

  it('writes a human-readable completion line with --verbose', async () => {
    const { exitCode, io } = await run([
      '--verbose',
      '--log-level',
      'info',
      'report',
      'events.jsonl',
    ]);

    expect(exitCode).toBe(0);
    expect(io.stderrBuffer).toMatch(
      /^\[info\] lintstat-cli report\.completed events=5 droppedMessages=0 minimumSeverity="all" config=null \(\d+\.\dms\)\n$/,
    );
  });
});
