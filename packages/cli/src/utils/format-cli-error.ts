import { inspect } from 'node:util';

import { formatUnknownError } from '@lintstat/core';
import { SummaryReportError } from '@lintstat/summary';

/**
 * One-line description of a failure: summary report errors carry their code,
 * anything else is rendered as `Name: message`.
 */
export const describeCliError = (error: unknown): string =>
  error instanceof SummaryReportError
    ? `${error.name} [${error.code}]: ${error.message}`
    : formatUnknownError(error);

export const formatCliError = (error: unknown): string => {
  if (error instanceof SummaryReportError) {
    return describeCliError(error);
  }

  if (error instanceof Error) {
    return error.stack ?? error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return inspect(error, { depth: 4, maxArrayLength: 10 });
};
