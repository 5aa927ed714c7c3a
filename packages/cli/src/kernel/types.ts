import type { LogLevel, StructuredLogger } from '@lintstat/core/logging';
import type { Command } from 'commander';

import type { CliIo } from '../io/cli-io.js';

export type CliLogFormat = 'none' | 'pretty' | 'json';

export interface CliGlobalOptions {
  readonly logFormat: CliLogFormat;
  /** Entries below this level are not written, whatever the format. */
  readonly logLevel: LogLevel;
}

export interface CliKernelOptions {
  readonly programName: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io?: CliIo | undefined;
}

export interface CliKernelContext {
  readonly io: CliIo;
  readonly getGlobalOptions: () => CliGlobalOptions;
  /** Logger honouring `--json-logs`, `--verbose` and `--log-level`; silent by default. */
  readonly getLogger: () => StructuredLogger;
}

export interface CliCommandModule {
  readonly id: string;
  register(command: Command, context: CliKernelContext): void;
}

export interface CliKernel {
  register(module: CliCommandModule): CliKernel;
  run(argv?: readonly string[]): Promise<number>;
}
