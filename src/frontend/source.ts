import type { SourcePosition, SourceSpan } from './ast.js';

/**
 * Source file + precomputed line-start offsets, used to convert character offsets into line/column spans.
 */
export interface SourceFile {
  path: string;
  text: string;
  /**
   * 0-based offsets for the start of each line. The first entry is always 0.
   *
   * `\n`, `\r\n` and a lone `\r` all end a line.
   */
  lineStarts: number[];
}

/**
 * Build a {@link SourceFile} from a path and source text.
 */
export function makeSourceFile(path: string, text: string): SourceFile {
  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\n') {
      lineStarts.push(i + 1);
    } else if (ch === '\r' && text[i + 1] !== '\n') {
      lineStarts.push(i + 1);
    }
  }
  return { path, text, lineStarts };
}

/**
 * Raw text of line `lineIndex` (0-based) without its terminator, plus its offset range.
 */
export function rawLine(
  file: SourceFile,
  lineIndex: number,
): { raw: string; startOffset: number; endOffset: number } {
  const startOffset = file.lineStarts[lineIndex] ?? 0;
  const nextStart = file.lineStarts[lineIndex + 1] ?? file.text.length;
  let raw = file.text.slice(startOffset, nextStart);
  if (raw.endsWith('\n')) raw = raw.slice(0, -1);
  if (raw.endsWith('\r')) raw = raw.slice(0, -1);
  return { raw, startOffset, endOffset: startOffset + raw.length };
}

/**
 * Convert a 0-based offset in `file.text` into a 1-based line/column position.
 */
export function posAtOffset(file: SourceFile, offset: number): SourcePosition {
  const clamped = Math.max(0, Math.min(offset, file.text.length));
  let lo = 0;
  let hi = file.lineStarts.length - 1;
  while (lo < hi) {
    const mid = Math.floor((lo + hi + 1) / 2);
    const midStart = file.lineStarts[mid] ?? 0;
    if (midStart <= clamped) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  const lineStart = file.lineStarts[lo] ?? 0;
  return { line: lo + 1, column: clamped - lineStart + 1, offset: clamped };
}

/**
 * Construct a {@link SourceSpan} for the half-open offset range `[startOffset, endOffset)`.
 */
export function span(file: SourceFile, startOffset: number, endOffset: number): SourceSpan {
  return {
    file: file.path,
    start: posAtOffset(file, startOffset),
    end: posAtOffset(file, endOffset),
  };
}
