/**
 * Minimal interface describing a writable target suitable for reporter output streams.
 */
export interface WritableTarget {
  write(line: string): void;
}

const LINE_TERMINATOR = '\n';

/**
 * Formats `count` as a percentage of `total` with two decimal places.
 *
 * @param count - Numerator of the ratio.
 * @param total - Denominator of the ratio.
 * @returns The percentage, or `0.00` when `total` is zero.
 */
export function formatPercentage(count: number, total: number): string {
  if (total === 0) {
    return (0).toFixed(2);
  }
  return ((count * 100) / total).toFixed(2);
}

/**
 * Converts arbitrary error inputs into a stable string description.
 *
 * @param error - Error-like value to format.
 * @returns Human readable error summary.
 */
export function formatUnknownError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Serialises an unknown error into a structured payload for logging.
 *
 * Errors that expose a string `code` (summary report errors, Node system errors)
 * keep it in the payload.
 *
 * @param error - Error-like value to serialise.
 * @returns Structured error payload describing the value.
 */
export function serialiseError(error: unknown): {
  readonly name: string;
  readonly message: string;
  readonly code?: string;
  readonly stack?: string;
} {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      ...(error.stack ? { stack: error.stack } : {}),
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}

/**
 * Writes a plain-text line to the provided target followed by a newline terminator.
 *
 * @param target - Writable destination for the text content.
 * @param line - Text content to emit.
 */
export function writeLine(target: WritableTarget, line: string): void {
  target.write(`${line}${LINE_TERMINATOR}`);
}
