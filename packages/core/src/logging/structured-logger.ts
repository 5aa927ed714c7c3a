import { writeLine, type WritableTarget } from '../reporting/formatting.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface StructuredLogEvent {
  readonly level: LogLevel;
  readonly name: string;
  readonly event: string;
  readonly elapsedMs?: number;
  readonly context?: Readonly<Record<string, unknown>>;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface StructuredLogger {
  log(entry: StructuredLogEvent): void;
}

export class JsonLineLogger implements StructuredLogger {
  constructor(private readonly output: WritableTarget) {}

  log(entry: StructuredLogEvent): void {
    const payload = JSON.stringify({
      ...entry,
      timestamp: new Date().toISOString(),
    });
    writeLine(this.output, payload);
  }
}

/**
 * Writes one human readable line per entry: `[level] name event key=value ...`.
 * Data values are JSON encoded so nested structures stay on a single line.
 */
export class PrettyLineLogger implements StructuredLogger {
  constructor(private readonly output: WritableTarget) {}

  log(entry: StructuredLogEvent): void {
    const fields = Object.entries(entry.data ?? {}).map(
      ([key, value]) => `${key}=${JSON.stringify(value)}`,
    );
    const elapsed = entry.elapsedMs === undefined ? [] : [`(${entry.elapsedMs.toFixed(1)}ms)`];
    const line = [`[${entry.level}]`, entry.name, entry.event, ...fields, ...elapsed].join(' ');
    writeLine(this.output, line);
  }
}

/**
 * Wraps a logger so entries below the minimum level never reach it.
 *
 * @param logger - Logger receiving the entries that pass the filter.
 * @param minimumLevel - Lowest level forwarded to the wrapped logger.
 * @returns Filtering logger.
 */
export function createLevelFilteredLogger(
  logger: StructuredLogger,
  minimumLevel: LogLevel,
): StructuredLogger {
  const threshold = LOG_LEVELS.indexOf(minimumLevel);
  return {
    log(entry) {
      if (LOG_LEVELS.indexOf(entry.level) >= threshold) {
        logger.log(entry);
      }
    },
  };
}

export const noopLogger: StructuredLogger = {
  log() {
    // noop
  },
};
