/**
 * Source spans
 *
 * Every token and diagnostic points back at a half-open character range of
 * the text it was lexed from. Tokens synthesised by code (rather than lexed)
 * carry `SYNTHETIC_SPAN`.
 */

export interface Span {
  /** Zero-based offset of the first character */
  readonly start: number;
  /** Zero-based offset one past the last character */
  readonly end: number;
  /** File the span belongs to, when known */
  readonly file?: string;
}

export const SYNTHETIC_SPAN: Span = Object.freeze({ start: 0, end: 0 });

export function span(start: number, end: number, file?: string): Span {
  return file === undefined ? { start, end } : { start, end, file };
}

/**
 * Smallest span covering both `a` and `b`. The file of `a` wins.
 */
export function joinSpans(a: Span, b: Span): Span {
  return span(Math.min(a.start, b.start), Math.max(a.end, b.end), a.file ?? b.file);
}

export function isSynthetic(s: Span): boolean {
  return s.start === 0 && s.end === 0 && s.file === undefined;
}

/**
 * Convert a zero-based offset to a 1-based line and column.
 */
export function lineAndColumn(source: string, pos: number): { line: number; column: number } {
  let line = 1;
  let column = 1;
  for (let i = 0; i < pos && i < source.length; i++) {
    if (source[i] === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column };
}

export function formatSpan(s: Span, source?: string): string {
  const file = s.file ?? "<input>";
  if (source === undefined) return `${file}:${s.start}..${s.end}`;
  const { line, column } = lineAndColumn(source, s.start);
  return `${file}:${line}:${column}`;
}
