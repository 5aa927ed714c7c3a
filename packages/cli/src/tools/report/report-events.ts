import { SEVERITIES } from '@lintstat/summary';
import { z } from 'zod';

const uriField = z.string().min(1);

const offsetField = z.number().int().nonnegative().default(0);

const reportEventSchema = z
  .discriminatedUnion('type', [
    z.object({ type: z.literal('enterLibrary'), uri: uriField }).strict(),
    z.object({ type: z.literal('enterHtml'), uri: uriField }).strict(),
    z
      .object({
        type: z.literal('compilationUnit'),
        uri: uriField.optional(),
        content: z.string().optional(),
        lines: z.number().int().nonnegative().optional(),
      })
      .strict(),
    z
      .object({
        type: z.literal('log'),
        kind: z.string().min(1),
        severity: z
          .string()
          .transform((value) => value.trim().toLowerCase())
          .pipe(z.enum(SEVERITIES)),
        begin: offsetField,
        end: offsetField,
        message: z.string(),
      })
      .strict(),
    z.object({ type: z.literal('leaveLibrary') }).strict(),
    z.object({ type: z.literal('leaveHtml') }).strict(),
    z.object({ type: z.literal('clearLibrary'), uri: uriField }).strict(),
    z.object({ type: z.literal('clearHtml'), uri: uriField }).strict(),
    z.object({ type: z.literal('clearAll') }).strict(),
  ])
  .superRefine((event, context) => {
    if (event.type !== 'compilationUnit') {
      return;
    }
    if ((event.content === undefined) === (event.lines === undefined)) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'compilationUnit events need exactly one of "content" or "lines"',
      });
    }
  });

export type ReportEvent = z.output<typeof reportEventSchema>;

export interface ParsedReportEvent {
  /** 1-based line of the event in its source text. */
  readonly line: number;
  readonly event: ReportEvent;
}

/**
 * Raised when a line of an event stream is not valid JSON or not a known event.
 */
export class ReportEventError extends Error {
  readonly code = 'INVALID_REPORT_EVENT';

  constructor(
    readonly line: number,
    readonly reason: string,
  ) {
    super(`Invalid report event on line ${line}: ${reason}`);
    this.name = 'ReportEventError';
  }
}

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    )
    .join('; ');

const parseJson = (text: string, line: number): unknown => {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ReportEventError(line, reason);
  }
};

/**
 * Parses a JSON-lines event stream. Blank lines are skipped; the first invalid
 * line aborts parsing.
 */
export function parseReportEvents(source: string): ParsedReportEvent[] {
  const events: ParsedReportEvent[] = [];
  const lines = source.split(/\r?\n/);

  for (const [index, text] of lines.entries()) {
    if (text.trim().length === 0) {
      continue;
    }
    const line = index + 1;
    const result = reportEventSchema.safeParse(parseJson(text, line));
    if (!result.success) {
      throw new ReportEventError(line, describeIssues(result.error));
    }
    events.push({ line, event: result.data });
  }

  return events;
}
