import type { LogLevel } from '@lintstat/core/logging';

/**
 * Diagnostic severities from least to most severe.
 */
export const SEVERITIES = [
  'finest',
  'finer',
  'fine',
  'config',
  'info',
  'warning',
  'severe',
  'shout',
] as const;

export type Severity = (typeof SEVERITIES)[number];

export const SEVERITY_WEIGHTS: Readonly<Record<Severity, number>> = Object.freeze({
  finest: 300,
  finer: 400,
  fine: 500,
  config: 700,
  info: 800,
  warning: 900,
  severe: 1000,
  shout: 1200,
});

/**
 * Minimum severity recorded by a reporter. `all` admits every message and `off` none.
 */
export const SEVERITY_THRESHOLDS = [
  'all',
  'finest',
  'finer',
  'fine',
  'config',
  'info',
  'warning',
  'severe',
  'shout',
  'off',
] as const;

export type SeverityThreshold = (typeof SEVERITY_THRESHOLDS)[number];

const THRESHOLD_WEIGHTS: Readonly<Record<SeverityThreshold, number>> = {
  all: 0,
  ...SEVERITY_WEIGHTS,
  off: 2000,
};

export function isSeverity(value: string): value is Severity {
  return Object.hasOwn(SEVERITY_WEIGHTS, value);
}

export function isSeverityThreshold(value: string): value is SeverityThreshold {
  return Object.hasOwn(THRESHOLD_WEIGHTS, value);
}

/**
 * Parses a case-insensitive severity threshold name.
 *
 * @returns The threshold, or `undefined` for unknown names.
 */
export function parseSeverityThreshold(value: string): SeverityThreshold | undefined {
  const normalised = value.trim().toLowerCase();
  return isSeverityThreshold(normalised) ? normalised : undefined;
}

export function meetsSeverityThreshold(severity: Severity, threshold: SeverityThreshold): boolean {
  return SEVERITY_WEIGHTS[severity] >= THRESHOLD_WEIGHTS[threshold];
}

/**
 * Maps a diagnostic severity onto the structured logger levels.
 */
export function severityToLogLevel(severity: Severity): LogLevel {
  switch (severity) {
    case 'shout':
    case 'severe': {
      return 'error';
    }
    case 'warning': {
      return 'warn';
    }
    case 'info':
    case 'config': {
      return 'info';
    }
    default: {
      return 'debug';
    }
  }
}
