import process from 'node:process';
import { text } from 'node:stream/consumers';

import type { CliIo } from './cli-io.js';

/** The parts of `process` the CLI talks to. */
export interface CliProcess {
  readonly stdin: NodeJS.ReadableStream;
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;
  readonly exitCode?: number | string | undefined;
  exit(code: number): never;
}

export interface ProcessCliIoOptions {
  readonly process?: CliProcess;
}

const readNonZeroExitCode = (target: CliProcess): number | undefined => {
  const { exitCode } = target;
  if (typeof exitCode === 'number') {
    return exitCode === 0 ? undefined : exitCode;
  }
  if (typeof exitCode === 'string') {
    const parsed = Number.parseInt(exitCode, 10);
    return Number.isNaN(parsed) || parsed === 0 ? undefined : parsed;
  }
  return undefined;
};

export const createProcessCliIo = (options: ProcessCliIoOptions = {}): CliIo => {
  const target = options.process ?? process;

  return {
    stdin: target.stdin,
    stdout: target.stdout,
    stderr: target.stderr,
    writeOut: (chunk: string) => {
      target.stdout.write(chunk);
    },
    writeErr: (chunk: string) => {
      target.stderr.write(chunk);
    },
    readStdin: () => text(target.stdin),
    exit: (code: number): never => {
      const nonZeroExitCode = readNonZeroExitCode(target);
      const resolvedCode = code === 0 && nonZeroExitCode !== undefined ? nonZeroExitCode : code;
      return target.exit(resolvedCode);
    },
  };
};
