/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A parser diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling (and the exit-code mapping) can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `IPP100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 *
 * The hundreds digit selects the failure class: 0xx internal, 1xx header, 2xx lexical/syntactic,
 * 3xx serializer, 5xx lint.
 */
export const DiagnosticIds = {
  /** Failed to read the source (file or standard input). */
  IoReadFailed: 'IPP001',

  /** Internal error during parsing (unexpected exception). */
  InternalParseError: 'IPP002',

  /** Missing, malformed or misplaced `.IPPcode24` header. */
  HeaderError: 'IPP100',

  /** Opcode is not part of the language. */
  UnknownOpcode: 'IPP200',

  /** Operand count does not match the opcode signature. */
  OperandCountMismatch: 'IPP201',

  /** Operand is malformed or its kind is not permitted at its position. */
  InvalidOperand: 'IPP202',

  /** Malformed `\ddd` escape, or a string decoding to a control character XML cannot carry. */
  InvalidStringEscape: 'IPP203',

  /** Serializer detected an instruction that violates its signature (upstream bug). */
  SerializeInvariant: 'IPP300',

  /** Case-style lint warning for opcode casing policy. */
  CaseStyleLint: 'IPP500',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * Classified failure an error diagnostic belongs to.
 */
export type FailureClass = 'header' | 'syntax' | 'internal';

/**
 * Process exit statuses. `usage` belongs to the CLI shell, the rest to the core.
 */
export const ExitCodes = {
  ok: 0,
  usage: 10,
  header: 21,
  syntax: 23,
  internal: 99,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export function failureClassOf(id: DiagnosticId): FailureClass {
  switch (id) {
    case DiagnosticIds.HeaderError:
      return 'header';
    case DiagnosticIds.UnknownOpcode:
    case DiagnosticIds.OperandCountMismatch:
    case DiagnosticIds.InvalidOperand:
    case DiagnosticIds.InvalidStringEscape:
      return 'syntax';
    default:
      return 'internal';
  }
}

/**
 * Exit status for a finished run: `ok` without errors, otherwise the class of the first error.
 *
 * Runs are fail-fast, so there is at most one error; taking the first keeps the mapping total anyway.
 */
export function exitCodeFor(diagnostics: readonly Diagnostic[]): ExitCode {
  const firstError = diagnostics.find((d) => d.severity === 'error');
  if (!firstError) return ExitCodes.ok;
  return ExitCodes[failureClassOf(firstError.id)];
}
