import { loadPackageMetadata } from '@lintstat/core/testing';
import { describe, expect, it } from 'vitest';

import * as summary from './index.js';

const packageJsonUrl = new URL('../package.json', import.meta.url);

describe('@lintstat/summary public API', () => {
  it('matches the package name and description', async () => {
    const metadata = await loadPackageMetadata(packageJsonUrl);

    expect(summary.manifest.name).toBe(metadata.name);
    expect(summary.manifest.summary).toBe(metadata.description);
  });

  it('renders a report from reporter results', () => {
    const reporter = new summary.SummaryReporter({ minimumSeverity: 'warning' });
    const unit = reporter.enterLibrary('package:demo/demo.dart');
    unit.enterCompilationUnit({ uri: 'package:demo/demo.dart', content: 'main() {}\n' });
    unit.log({ kind: 'StaticInfo', severity: 'info', begin: 0, end: 4, message: 'dropped' });
    unit.log({ kind: 'StaticInfo', severity: 'warning', begin: 0, end: 4, message: 'kept' });
    unit.leave();

    const output = summary.summaryToString(reporter.result);

    expect(output.split('\n')[2]).toBe('demo         0      1     2');
    expect(reporter.droppedMessageCount).toBe(1);
  });
});
