import process from 'node:process';

import { createCliKernel } from '../../kernel/cli-kernel.js';
import type { CliIo } from '../../io/cli-io.js';
import type { CliKernel } from '../../kernel/types.js';
import { reportCommandModule } from './report-command-module.js';

export interface CreateReportCliKernelOptions {
  readonly programName: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io?: CliIo | undefined;
}

export const createReportCliKernel = (options: CreateReportCliKernelOptions): CliKernel =>
  createCliKernel(options).register(reportCommandModule);

export interface RunReportCliOptions extends CreateReportCliKernelOptions {
  readonly argv?: readonly string[] | undefined;
}

export const runReportCli = async ({
  argv = process.argv,
  ...kernelOptions
}: RunReportCliOptions): Promise<number> => createReportCliKernel(kernelOptions).run(argv);
