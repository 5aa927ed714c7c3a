export interface SourcePosition {
  /** Zero-based character offset into the unit content. */
  readonly offset: number;
  /** One-based line number. */
  readonly line: number;
  /** One-based column number. */
  readonly column: number;
}

/**
 * A resolved region of a compilation unit, together with the text of the line it starts on.
 */
export interface SourceSpan {
  readonly file: string;
  readonly start: SourcePosition;
  readonly end: SourcePosition;
  readonly lineText: string;
}

/**
 * Content of one compilation unit, against which diagnostic offsets are resolved.
 */
export interface CompilationUnitSource {
  readonly uri: string;
  readonly content: string;
}

function locate(content: string, offset: number): SourcePosition {
  let line = 1;
  let lineStart = 0;
  for (let index = content.indexOf('\n'); index !== -1 && index < offset; ) {
    line += 1;
    lineStart = index + 1;
    index = content.indexOf('\n', lineStart);
  }
  return { offset, line, column: offset - lineStart + 1 };
}

function clamp(value: number, max: number): number {
  if (!Number.isFinite(value) || value < 0) {
    return 0;
  }
  return Math.min(Math.trunc(value), max);
}

/**
 * Number of lines of a compilation unit: the line on which its content ends.
 */
export function countSourceLines(content: string): number {
  return locate(content, content.length).line;
}

/**
 * Resolves the `[begin, end)` offsets of a diagnostic into a span of `source`.
 * Offsets outside the content are clamped to it and `end` is never before `begin`.
 */
export function createSourceSpan(
  source: CompilationUnitSource,
  begin: number,
  end: number,
): SourceSpan {
  const length = source.content.length;
  const startOffset = clamp(begin, length);
  const endOffset = Math.max(startOffset, clamp(end, length));
  const start = locate(source.content, startOffset);
  const lineStart = startOffset - (start.column - 1);
  const lineEnd = source.content.indexOf('\n', lineStart);
  const lineText = source.content
    .slice(lineStart, lineEnd === -1 ? length : lineEnd)
    .replace(/\r$/, '');

  return {
    file: source.uri,
    start,
    end: locate(source.content, endOffset),
    lineText,
  };
}

/**
 * Span used when a diagnostic arrives before any compilation unit content is known.
 */
export function createUnitSpan(file: string): SourceSpan {
  const origin: SourcePosition = { offset: 0, line: 0, column: 0 };
  return { file, start: origin, end: origin, lineText: '' };
}

/**
 * Renders `text` with the span's location and, when known, the source line with
 * a caret marker under the highlighted region.
 */
export function formatSpanMessage(span: SourceSpan, text: string): string {
  if (span.start.line === 0) {
    return `${span.file}: ${text}`;
  }

  const header = `line ${span.start.line}, column ${span.start.column} of ${span.file}: ${text}`;
  const sameLine = span.end.line === span.start.line;
  const available = Math.max(1, span.lineText.length - (span.start.column - 1));
  const width = sameLine
    ? Math.min(available, Math.max(1, span.end.offset - span.start.offset))
    : available;
  const marker = `${' '.repeat(span.start.column - 1)}${'^'.repeat(width)}`;

  return `${header}\n${span.lineText}\n${marker}`;
}
