import type { InstructionNode, ProgramNode } from './ast.js';
import { LANGUAGE_ID, isHeaderToken } from './grammar.js';
import { validateInstruction } from './instruction.js';
import { tokenizeSource } from './tokenize.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

function headerDiag(
  diagnostics: Diagnostic[],
  file: string,
  message: string,
  where?: { line: number; column: number },
): void {
  diagnostics.push({
    id: DiagnosticIds.HeaderError,
    severity: 'error',
    message,
    file,
    ...(where ? { line: where.line, column: where.column } : {}),
  });
}

/**
 * Parse an IPPcode24 program from an in-memory source string.
 *
 * Implementation note:
 * - Parsing is fail-fast: the first error is appended to `diagnostics` and `undefined` is returned.
 * - The first logical line must be the `.IPPcode24` header; nothing after a bad header is validated.
 * - Order numbers start at 1 for the first instruction and are local to this call.
 */
export function parseProgram(
  path: string,
  sourceText: string,
  diagnostics: Diagnostic[],
): ProgramNode | undefined {
  const lines = tokenizeSource(path, sourceText);
  const [header, ...body] = lines;

  if (!header) {
    headerDiag(diagnostics, path, `Missing header ".${LANGUAGE_ID}"`);
    return undefined;
  }
  const headerToken = header.tokens[0];
  if (header.tokens.length !== 1 || !headerToken || !isHeaderToken(headerToken.text)) {
    headerDiag(
      diagnostics,
      path,
      `Expected header ".${LANGUAGE_ID}" as the first line, found "${header.tokens
        .map((t) => t.text)
        .join(' ')}"`,
      { line: header.span.start.line, column: header.span.start.column },
    );
    return undefined;
  }

  const instructions: InstructionNode[] = [];
  let order = 0;
  for (const line of body) {
    order++;
    const instr = validateInstruction(line, order, diagnostics);
    if (!instr) return undefined;
    instructions.push(instr);
  }

  const last = lines[lines.length - 1] ?? header;
  return {
    kind: 'Program',
    span: { file: path, start: header.span.start, end: last.span.end },
    language: LANGUAGE_ID,
    instructions,
  };
}
