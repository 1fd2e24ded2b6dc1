import type { SourceSpan } from './ast.js';
import { makeSourceFile, rawLine, span, type SourceFile } from './source.js';

/**
 * Whitespace-delimited token with its source span.
 */
export interface Token {
  text: string;
  span: SourceSpan;
}

/**
 * One non-blank line after comment stripping. `tokens` is never empty.
 */
export interface LogicalLine {
  /** 1-based physical line number. */
  line: number;
  tokens: Token[];
  span: SourceSpan;
}

/**
 * Drop everything from the first `#` to the end of the line.
 */
export function stripComment(line: string): string {
  const hash = line.indexOf('#');
  return hash >= 0 ? line.slice(0, hash) : line;
}

/**
 * Tokenize a single physical line. Returns `undefined` for comment-only and blank lines.
 */
export function tokenizeLine(file: SourceFile, lineIndex: number): LogicalLine | undefined {
  const { raw, startOffset } = rawLine(file, lineIndex);
  const text = stripComment(raw);

  const tokens: Token[] = [];
  const re = /\S+/g;
  for (let m = re.exec(text); m !== null; m = re.exec(text)) {
    const start = startOffset + m.index;
    tokens.push({ text: m[0], span: span(file, start, start + m[0].length) });
  }
  if (tokens.length === 0) return undefined;

  const first = tokens[0];
  const last = tokens[tokens.length - 1];
  if (!first || !last) return undefined;
  return {
    line: lineIndex + 1,
    tokens,
    span: { file: file.path, start: first.span.start, end: last.span.end },
  };
}

/**
 * Split source text into logical lines, skipping blank and comment-only lines.
 */
export function tokenizeSource(path: string, text: string): LogicalLine[] {
  const file = makeSourceFile(path, text);
  const out: LogicalLine[] = [];
  for (let i = 0; i < file.lineStarts.length; i++) {
    const logical = tokenizeLine(file, i);
    if (logical) out.push(logical);
  }
  return out;
}
