import { DiagnosticIds, type Diagnostic } from '../diagnostics/types.js';
import type { InstructionNode, ProgramNode } from '../frontend/ast.js';
import type { CaseStyleMode } from '../pipeline.js';

type LetterCase = 'upper' | 'lower' | 'mixed';
type Policy = Exclude<LetterCase, 'mixed'>;

function letterCaseOf(spelling: string): LetterCase {
  if (spelling === spelling.toUpperCase()) return 'upper';
  if (spelling === spelling.toLowerCase()) return 'lower';
  return 'mixed';
}

// Opcodes match case-insensitively and are ASCII, so the source token has the canonical length.
function opcodeSpelling(source: string, instr: InstructionNode): string {
  const start = instr.span.start.offset;
  return source.slice(start, start + instr.opcode.length);
}

function caseWarning(instr: InstructionNode, message: string): Diagnostic {
  return {
    id: DiagnosticIds.CaseStyleLint,
    severity: 'warning',
    message: `Case-style lint: ${message}`,
    file: instr.span.file,
    line: instr.span.start.line,
    column: instr.span.start.column,
  };
}

/**
 * Warn about opcodes spelled against the selected casing policy.
 *
 * `consistent` adopts the case of the first opcode that is entirely upper or lower case.
 */
export function lintCaseStyle(
  program: ProgramNode,
  source: string,
  mode: CaseStyleMode,
  diagnostics: Diagnostic[],
): void {
  if (mode === 'off') return;

  let policy: Policy | undefined = mode === 'consistent' ? undefined : mode;
  for (const instr of program.instructions) {
    const spelling = opcodeSpelling(source, instr);
    const actual = letterCaseOf(spelling);
    if (policy === undefined) {
      if (actual !== 'mixed') policy = actual;
      continue;
    }
    if (actual === policy) continue;

    diagnostics.push(
      caseWarning(
        instr,
        mode === 'consistent'
          ? `opcode "${spelling}" does not match established ${policy}case style under --case-style=consistent.`
          : `opcode "${spelling}" should be ${policy}case under --case-style=${mode}.`,
      ),
    );
  }
}
