import type { Diagnostic } from './diagnostics/types.js';
import type { ProgramNode } from './frontend/ast.js';
import type { Artifact, FormatWriters } from './formats/types.js';

export type CaseStyleMode = 'off' | 'upper' | 'lower' | 'consistent';

/**
 * Options that influence translation behavior and the shape of produced artifacts.
 */
export interface TranslateOptions {
  /** Optional case-style lint mode for opcode tokens (`off` by default). */
  caseStyle?: CaseStyleMode;
  /** Line ending of the XML document. */
  lineEnding?: '\n' | '\r\n';
  /** Indentation unit of the XML document. */
  indent?: string;
}

/**
 * Where source text comes from. Reading is the only asynchronous step of a run.
 */
export interface SourceInput {
  /** Name used in diagnostics (input path, or `<stdin>`). */
  path: string;
  /** Resolve with the whole source text; reject on I/O failure. */
  read(): Promise<string>;
}

/**
 * Result of a translation run: diagnostics plus any produced artifacts.
 *
 * When an error diagnostic is present, `artifacts` is empty and `program` is absent.
 */
export interface TranslateResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  program?: ProgramNode;
}

/**
 * Dependency injection surface for the translation pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level translate function signature used by the pipeline contract.
 */
export type TranslateFn = (
  source: SourceInput,
  options: TranslateOptions,
  deps: PipelineDeps,
) => Promise<TranslateResult>;
