export { translate, translateText } from './translate.js';
export type {
  CaseStyleMode,
  PipelineDeps,
  SourceInput,
  TranslateFn,
  TranslateOptions,
  TranslateResult,
} from './pipeline.js';

export { parseProgram } from './frontend/parser.js';
export { validateInstruction } from './frontend/instruction.js';
export { classifyOperand } from './frontend/operands.js';
export { tokenizeSource, stripComment } from './frontend/tokenize.js';
export type { LogicalLine, Token } from './frontend/tokenize.js';
export * from './frontend/ast.js';

export { SIGNATURES, SLOT_KINDS, lookupSignature } from './isa/signatures.js';
export type { OpcodeSignature, OperandSlot } from './isa/signatures.js';

export { defaultFormatWriters } from './formats/index.js';
export { writeXml } from './formats/writeXml.js';
export { escapeXml } from './formats/xml.js';
export { SerializeInvariantError } from './formats/types.js';
export type { Artifact, FormatWriters, WriteXmlOptions, XmlArtifact } from './formats/types.js';

export { DiagnosticIds, ExitCodes, exitCodeFor, failureClassOf } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity, ExitCode, FailureClass } from './diagnostics/types.js';
