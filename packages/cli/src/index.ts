import { createManifest, type PackageManifest } from '@lintstat/core';

export { createCliKernel } from './kernel/cli-kernel.js';
export type {
  CliCommandModule,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
  CliGlobalOptions,
  CliLogFormat,
} from './kernel/types.js';
export {
  createProcessCliIo,
  type CliProcess,
  type ProcessCliIoOptions,
} from './io/process-cli-io.js';
export type { CliIo } from './io/cli-io.js';
export { describeCliError, formatCliError } from './utils/format-cli-error.js';
export { reportCommandModule } from './tools/report/report-command-module.js';
export {
  parseReportEvents,
  ReportEventError,
  type ParsedReportEvent,
  type ReportEvent,
} from './tools/report/report-events.js';
export { replayReportEvents } from './tools/report/replay-report-events.js';
export {
  createReportCliKernel,
  runReportCli,
  type CreateReportCliKernelOptions,
  type RunReportCliOptions,
} from './tools/report/run-report-cli.js';

const manifestDefinition = {
  name: '@lintstat/cli',
  summary: 'Command line interface that replays analyzer events into lintstat summary reports.',
} as const satisfies PackageManifest;

export const manifest = createManifest(manifestDefinition);
