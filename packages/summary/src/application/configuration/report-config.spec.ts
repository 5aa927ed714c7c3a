import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DEFAULT_REPORT_CONFIG, loadReportConfig, parseReportConfig } from './report-config.js';

describe('parseReportConfig', () => {
  it('applies defaults when the report section is missing', () => {
    expect(parseReportConfig({})).toEqual({ minimumSeverity: 'all' });
    expect(parseReportConfig({ unrelated: true })).toEqual(DEFAULT_REPORT_CONFIG);
  });

  it('normalises severity names', () => {
    expect(parseReportConfig({ report: { minimumSeverity: ' Warning ' } })).toEqual({
      minimumSeverity: 'warning',
    });
  });

  it('rejects unknown severities and keys', () => {
    expect(() => parseReportConfig({ report: { minimumSeverity: 'loud' } })).toThrow(
      /^Invalid lintstat configuration: report\.minimumSeverity: /,
    );
    expect(() => parseReportConfig({ report: { colors: true } })).toThrow(
      /^Invalid lintstat configuration: report: /,
    );
    expect(() => parseReportConfig('nope')).toThrow(/^Invalid lintstat configuration: <root>: /);
  });
});

describe('loadReportConfig', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), 'lintstat-report-config-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('falls back to defaults without a configuration file', async () => {
    await expect(loadReportConfig({ cwd: workspace })).resolves.toEqual({
      path: undefined,
      config: DEFAULT_REPORT_CONFIG,
    });
  });

  it('reads the report section of a discovered configuration file', async () => {
    const configPath = path.join(workspace, 'lintstat.config.json');
    await writeFile(configPath, JSON.stringify({ report: { minimumSeverity: 'severe' } }), 'utf8');

    await expect(loadReportConfig({ cwd: workspace })).resolves.toEqual({
      path: configPath,
      config: { minimumSeverity: 'severe' },
    });
  });

  it('names the file when validation fails', async () => {
    const configPath = path.join(workspace, 'custom.json');
    await writeFile(configPath, JSON.stringify({ report: { minimumSeverity: 7 } }), 'utf8');

    await expect(loadReportConfig({ cwd: workspace, configPath: 'custom.json' })).rejects.toThrow(
      `Invalid lintstat configuration at ${configPath}: report.minimumSeverity: `,
    );
  });

  it('rejects an explicit configuration path that does not exist', async () => {
    await expect(loadReportConfig({ cwd: workspace, configPath: 'absent.json' })).rejects.toThrow(
      'Configuration file not found: absent.json',
    );
  });
});
