import type { InstructionNode, OperandNode } from './ast.js';
import { classifyOperand } from './operands.js';
import type { LogicalLine, Token } from './tokenize.js';
import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { lookupSignature, operandCountText } from '../isa/signatures.js';

function diag(diagnostics: Diagnostic[], id: DiagnosticId, token: Token, message: string): void {
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file: token.span.file,
    line: token.span.start.line,
    column: token.span.start.column,
  });
}

function internal(diagnostics: Diagnostic[], line: LogicalLine, message: string): void {
  diagnostics.push({
    id: DiagnosticIds.InternalParseError,
    severity: 'error',
    message,
    file: line.span.file,
    line: line.line,
  });
}

/**
 * Validate one logical line against the opcode signature table.
 *
 * On failure, appends exactly one error diagnostic and returns `undefined`; the caller stops the run.
 */
export function validateInstruction(
  line: LogicalLine,
  order: number,
  diagnostics: Diagnostic[],
): InstructionNode | undefined {
  const [head, ...rest] = line.tokens;
  if (!head) {
    internal(diagnostics, line, 'Logical line without tokens');
    return undefined;
  }

  const sig = lookupSignature(head.text);
  if (!sig) {
    diag(diagnostics, DiagnosticIds.UnknownOpcode, head, `Unknown instruction "${head.text}"`);
    return undefined;
  }

  if (rest.length !== sig.arity) {
    diag(
      diagnostics,
      DiagnosticIds.OperandCountMismatch,
      head,
      `${sig.opcode} expects ${operandCountText(sig.arity)}, got ${rest.length}`,
    );
    return undefined;
  }

  const operands: OperandNode[] = [];
  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    const slot = sig.slots[i];
    if (!token || !slot) {
      internal(diagnostics, line, `${sig.opcode} slot ${i + 1} is missing from its signature`);
      return undefined;
    }
    const res = classifyOperand(token.text, token.span, slot);
    if (!res.ok) {
      diag(diagnostics, res.id, token, `${sig.opcode} operand ${i + 1}: ${res.message}`);
      return undefined;
    }
    operands.push(res.operand);
  }

  return {
    kind: 'Instruction',
    span: line.span,
    opcode: sig.opcode,
    operands,
    order,
  };
}
