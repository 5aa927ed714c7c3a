import { LOG_LEVELS, type LogLevel } from '@lintstat/core/logging';
import { InvalidArgumentError, type Command } from 'commander';

import type { CliGlobalOptions } from '../../kernel/types.js';

const JSON_LOGS_HELP = 'Emit machine-readable JSON logs to stderr.';
const VERBOSE_HELP = 'Emit human-readable logs to stderr.';
const LOG_LEVEL_HELP = `Lowest log level written (${LOG_LEVELS.join(', ')}).`;

type RawGlobalOptions = {
  readonly jsonLogs?: boolean;
  readonly verbose?: boolean;
  readonly logLevel?: LogLevel;
};

export const defaultGlobalOptions: CliGlobalOptions = Object.freeze({
  logFormat: 'none',
  logLevel: 'debug',
} as const);

export const createDefaultGlobalOptions = (): CliGlobalOptions => ({
  logFormat: defaultGlobalOptions.logFormat,
  logLevel: defaultGlobalOptions.logLevel,
});

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const parseLogLevelOption = (value: string): LogLevel => {
  const normalized = value.trim().toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}.`);
  }
  return normalized;
};

export const registerGlobalOptions = (program: Command): void => {
  program
    .option('--json-logs', JSON_LOGS_HELP, false)
    .option('--verbose', VERBOSE_HELP, false)
    .option('--log-level <level>', LOG_LEVEL_HELP, parseLogLevelOption);
};

export const readGlobalOptions = (program: Command): CliGlobalOptions => {
  const options = program.optsWithGlobals<RawGlobalOptions>();

  let logFormat = defaultGlobalOptions.logFormat;
  if (options.jsonLogs) {
    logFormat = 'json';
  } else if (options.verbose) {
    logFormat = 'pretty';
  }

  return {
    logFormat,
    logLevel: options.logLevel ?? defaultGlobalOptions.logLevel,
  };
};
