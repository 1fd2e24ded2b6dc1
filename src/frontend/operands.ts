import type { OperandNode, SourceSpan } from './ast.js';
import {
  decodeStringEscapes,
  firstNonXmlChar,
  hasMalformedEscape,
  isIdentifier,
  isLiteralKind,
  isLiteralValue,
  isStringLiteral,
  isTypeName,
  parseVariable,
  splitAt,
} from './grammar.js';
import type { DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { SLOT_KINDS, describeSlot, type OperandSlot } from '../isa/signatures.js';

export type OperandResult =
  | { ok: true; operand: OperandNode }
  | { ok: false; id: DiagnosticId; message: string };

function tryVar(token: string, tokenSpan: SourceSpan): OperandNode | undefined {
  const v = parseVariable(token);
  if (!v) return undefined;
  return { kind: 'Var', span: tokenSpan, frame: v.frame, name: v.name };
}

function tryConst(token: string, tokenSpan: SourceSpan): OperandNode | undefined {
  const parts = splitAt(token);
  if (!parts || !isLiteralKind(parts.prefix)) return undefined;
  const literal = parts.prefix;
  if (!isLiteralValue(literal, parts.rest)) return undefined;
  const value = literal === 'string' ? decodeStringEscapes(parts.rest) : parts.rest;
  if (firstNonXmlChar(value) !== undefined) return undefined;
  return { kind: 'Const', span: tokenSpan, literal, value };
}

function tryLabel(token: string, tokenSpan: SourceSpan): OperandNode | undefined {
  return isIdentifier(token) ? { kind: 'Label', span: tokenSpan, name: token } : undefined;
}

function tryType(token: string, tokenSpan: SourceSpan): OperandNode | undefined {
  return isTypeName(token) ? { kind: 'Type', span: tokenSpan, name: token } : undefined;
}

function codePointLabel(ch: string): string {
  return `U+${(ch.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0')}`;
}

const CLASSIFIERS: ReadonlyArray<(token: string, tokenSpan: SourceSpan) => OperandNode | undefined> = [
  tryVar,
  tryConst,
  tryLabel,
  tryType,
];

/**
 * Classify one operand token against the kinds permitted by `slot`.
 *
 * Grammars are tried in a fixed order (variable, constant, label, type name); the first kind that is
 * both grammatical and permitted wins. Kind and literal tag are decided here and never revisited.
 */
export function classifyOperand(
  token: string,
  tokenSpan: SourceSpan,
  slot: OperandSlot,
): OperandResult {
  const permitted = SLOT_KINDS[slot];
  for (const classify of CLASSIFIERS) {
    const operand = classify(token, tokenSpan);
    if (operand && permitted.has(operand.kind)) return { ok: true, operand };
  }

  const parts = splitAt(token);
  if (parts?.prefix === 'string' && permitted.has('Const')) {
    if (hasMalformedEscape(parts.rest)) {
      return {
        ok: false,
        id: DiagnosticIds.InvalidStringEscape,
        message: `Invalid escape sequence in string literal "${token}" (expected \\ddd)`,
      };
    }
    const control = isStringLiteral(parts.rest)
      ? firstNonXmlChar(decodeStringEscapes(parts.rest))
      : undefined;
    if (control !== undefined) {
      return {
        ok: false,
        id: DiagnosticIds.InvalidStringEscape,
        message: `String literal "${token}" contains control character ${codePointLabel(control)}, which XML cannot represent`,
      };
    }
  }

  return {
    ok: false,
    id: DiagnosticIds.InvalidOperand,
    message: `Invalid operand "${token}": expected ${describeSlot(slot)}`,
  };
}
