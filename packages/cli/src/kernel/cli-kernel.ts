import process from 'node:process';

import { serialiseError } from '@lintstat/core';
import {
  createLevelFilteredLogger,
  JsonLineLogger,
  noopLogger,
  PrettyLineLogger,
  type StructuredLogger,
} from '@lintstat/core/logging';
import { CommanderError } from 'commander';

import { createCommanderProgram } from '../framework/commander/program.js';
import {
  createDefaultGlobalOptions,
  readGlobalOptions,
} from '../framework/commander/global-options.js';
import type { CliIo } from '../io/cli-io.js';
import { createProcessCliIo } from '../io/process-cli-io.js';
import { formatCliError } from '../utils/format-cli-error.js';
import type {
  CliCommandModule,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
  CliGlobalOptions,
} from './types.js';

const LOGGER_NAME = 'lintstat-cli';

const readNonZeroProcessExitCode = (): number | undefined => {
  const exitCode = process.exitCode;
  if (typeof exitCode !== 'number') {
    return undefined;
  }

  return exitCode === 0 ? undefined : exitCode;
};

const readCommanderExitCode = (error: CommanderError): number | undefined => {
  const { exitCode } = error;
  if (typeof exitCode === 'number') {
    return exitCode;
  }

  if (typeof exitCode === 'string') {
    const parsedExitCode = Number.parseInt(exitCode, 10);
    return Number.isNaN(parsedExitCode) ? undefined : parsedExitCode;
  }

  return undefined;
};

const createLogger = (options: CliGlobalOptions, io: CliIo): StructuredLogger => {
  const stderr = { write: (line: string) => io.writeErr(line) };
  switch (options.logFormat) {
    case 'json': {
      return createLevelFilteredLogger(new JsonLineLogger(stderr), options.logLevel);
    }
    case 'pretty': {
      return createLevelFilteredLogger(new PrettyLineLogger(stderr), options.logLevel);
    }
    default: {
      return noopLogger;
    }
  }
};

export const createCliKernel = (options: CliKernelOptions): CliKernel => {
  const io = options.io ?? createProcessCliIo();
  const program = createCommanderProgram({
    name: options.programName,
    version: options.version,
    description: options.description,
    io,
  });

  const initialOptions = createDefaultGlobalOptions();
  const state: { globalOptions: CliGlobalOptions; logger: StructuredLogger } = {
    globalOptions: initialOptions,
    logger: createLogger(initialOptions, io),
  };

  const applyGlobalOptions = (): void => {
    state.globalOptions = readGlobalOptions(program);
    state.logger = createLogger(state.globalOptions, io);
  };

  const context: CliKernelContext = {
    io,
    getGlobalOptions: () => state.globalOptions,
    getLogger: () => state.logger,
  };

  program.hook('preAction', applyGlobalOptions);

  const runProgram = async (argv: readonly string[]): Promise<void> => {
    const args = [...argv];
    if (args.length === 0) {
      throw new Error('Argument vector must include at least the node executable.');
    }

    await program.parseAsync(args, { from: 'node' });
    applyGlobalOptions();
  };

  return {
    register(module: CliCommandModule): CliKernel {
      module.register(program, context);
      return this;
    },
    async run(argv: readonly string[] = process.argv): Promise<number> {
      const previousExitCode = process.exitCode;

      try {
        await runProgram(argv);

        const processExitCode = readNonZeroProcessExitCode();
        return processExitCode ?? 0;
      } catch (error) {
        if (error instanceof CommanderError) {
          const processExitCode = readNonZeroProcessExitCode();
          const commanderExitCode = readCommanderExitCode(error);
          return processExitCode ?? commanderExitCode ?? 1;
        }

        state.logger.log({
          level: 'error',
          name: LOGGER_NAME,
          event: 'cli.command.failed',
          data: { error: serialiseError(error) },
        });

        const message = formatCliError(error);
        const needsNewline = message.endsWith('\n') ? '' : '\n';
        io.writeErr(`${message}${needsNewline}`);

        const processExitCode = readNonZeroProcessExitCode();
        return processExitCode ?? 1;
      } finally {
        process.exitCode = previousExitCode;
      }
    },
  };
};
