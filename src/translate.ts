import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type { ProgramNode } from './frontend/ast.js';
import { parseProgram } from './frontend/parser.js';
import type { Artifact } from './formats/types.js';
import { SerializeInvariantError } from './formats/types.js';
import { lintCaseStyle } from './lint/case_style.js';
import type {
  PipelineDeps,
  SourceInput,
  TranslateFn,
  TranslateOptions,
  TranslateResult,
} from './pipeline.js';

function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

/**
 * Run the whole pipeline over in-memory source text.
 *
 * Synchronous and free of shared state: each call owns its diagnostics, order counter and program.
 */
export function translateText(
  path: string,
  text: string,
  options: TranslateOptions,
  deps: PipelineDeps,
): TranslateResult {
  const diagnostics: Diagnostic[] = [];

  let program: ProgramNode | undefined;
  try {
    program = parseProgram(path, text, diagnostics);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.InternalParseError,
      severity: 'error',
      message: `Internal error during parse: ${String(err)}`,
      file: path,
    });
    return { diagnostics, artifacts: [] };
  }
  if (!program || hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }

  lintCaseStyle(program, text, options.caseStyle ?? 'off', diagnostics);

  const artifacts: Artifact[] = [];
  try {
    artifacts.push(
      deps.formats.writeXml(program, {
        ...(options.lineEnding ? { lineEnding: options.lineEnding } : {}),
        ...(options.indent !== undefined ? { indent: options.indent } : {}),
      }),
    );
  } catch (err) {
    if (!(err instanceof SerializeInvariantError)) throw err;
    diagnostics.push({
      id: DiagnosticIds.SerializeInvariant,
      severity: 'error',
      message: `Serializer invariant violated: ${err.message}`,
      file: path,
    });
    return { diagnostics, artifacts: [] };
  }

  return { diagnostics, artifacts, program };
}

/**
 * Translate IPPcode24 source into the XML interchange document.
 *
 * Reads `source` in full, then runs {@link translateText}. A failed read yields an internal-class
 * diagnostic and no artifacts.
 */
export const translate: TranslateFn = async (
  source: SourceInput,
  options: TranslateOptions,
  deps: PipelineDeps,
): Promise<TranslateResult> => {
  let text: string;
  try {
    text = await source.read();
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Failed to read source: ${err instanceof Error ? err.message : String(err)}`,
          file: source.path,
        },
      ],
      artifacts: [],
    };
  }
  return translateText(source.path, text, options, deps);
};
