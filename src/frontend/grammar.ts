import type { FrameName, LiteralKind, TypeNameKind } from './ast.js';

/** Language identifier carried by the header and the output root. */
export const LANGUAGE_ID = 'IPPcode24';

const HEADER_TOKEN = `.${LANGUAGE_ID}`.toLowerCase();

const IDENT_RE = /^[A-Za-z_\-$&%*!?][\p{L}\p{N}_\-$&%*!?]*$/u;

const INT_RE = /^(?:-?0x[0-9a-fA-F]+|-?0o[0-7]+|[+-]?[0-9]+)$/;
const HEX_FLOAT_RE = /^[+-]?0[xX](?:[0-9a-fA-F]+(?:\.[0-9a-fA-F]*)?|\.[0-9a-fA-F]+)[pP][+-]?[0-9]+$/;
const DEC_FLOAT_RE = /^[+-]?(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;
const STRING_RE = /^(?:[^\\\s#]|\\[0-9]{3})*$/;
const ESCAPE_RE = /\\([0-9]{3})/g;
const BAD_ESCAPE_RE = /\\(?![0-9]{3})/;
// eslint-disable-next-line no-control-regex
const NON_XML_CHAR_RE = /[\u0000-\u0008\u000b\u000c\u000e-\u001f]/u;

const FRAMES: readonly FrameName[] = ['GF', 'LF', 'TF'];
const LITERAL_KINDS: readonly LiteralKind[] = ['int', 'bool', 'string', 'nil', 'float'];
const TYPE_NAMES: readonly TypeNameKind[] = ['int', 'bool', 'string', 'nil', 'float'];

export function isHeaderToken(token: string): boolean {
  return token.toLowerCase() === HEADER_TOKEN;
}

/**
 * Identifier used for labels and variable names. Compared case-sensitively everywhere.
 *
 * The first character is ASCII; later ones may be any Unicode letter or digit.
 */
export function isIdentifier(text: string): boolean {
  return IDENT_RE.test(text);
}

export function isFrameName(text: string): text is FrameName {
  return (FRAMES as readonly string[]).includes(text);
}

export function isLiteralKind(text: string): text is LiteralKind {
  return (LITERAL_KINDS as readonly string[]).includes(text);
}

export function isTypeName(text: string): text is TypeNameKind {
  return (TYPE_NAMES as readonly string[]).includes(text);
}

/**
 * Split `prefix@rest` at the first `@`. Returns `undefined` when there is no `@`.
 */
export function splitAt(token: string): { prefix: string; rest: string } | undefined {
  const at = token.indexOf('@');
  if (at < 0) return undefined;
  return { prefix: token.slice(0, at), rest: token.slice(at + 1) };
}

/**
 * Parse a variable reference (`GF@x`). Frame prefixes are case-sensitive.
 */
export function parseVariable(token: string): { frame: FrameName; name: string } | undefined {
  const parts = splitAt(token);
  if (!parts) return undefined;
  if (!isFrameName(parts.prefix)) return undefined;
  if (!isIdentifier(parts.rest)) return undefined;
  return { frame: parts.prefix, name: parts.rest };
}

export function isIntLiteral(text: string): boolean {
  return INT_RE.test(text);
}

export function isBoolLiteral(text: string): boolean {
  return text === 'true' || text === 'false';
}

export function isNilLiteral(text: string): boolean {
  return text === 'nil';
}

/**
 * C99 hexadecimal floating point (`0x1.8p+1`) or decimal floating point (`-2.5e3`).
 */
export function isFloatLiteral(text: string): boolean {
  return HEX_FLOAT_RE.test(text) || DEC_FLOAT_RE.test(text);
}

/**
 * Raw (undecoded) string literal: no whitespace, no `#`, backslashes only as `\ddd`.
 */
export function isStringLiteral(text: string): boolean {
  return STRING_RE.test(text);
}

/**
 * True when `text` has a backslash not followed by exactly three decimal digits.
 */
export function hasMalformedEscape(text: string): boolean {
  return BAD_ESCAPE_RE.test(text);
}

/**
 * Replace every `\ddd` escape by the character with decimal code point `ddd`.
 */
export function decodeStringEscapes(text: string): string {
  return text.replace(ESCAPE_RE, (_m, digits: string) =>
    String.fromCodePoint(Number.parseInt(digits, 10)),
  );
}

/**
 * First control character in a decoded string that XML 1.0 cannot represent (anything below U+0020
 * except tab, LF and CR).
 */
export function firstNonXmlChar(text: string): string | undefined {
  return NON_XML_CHAR_RE.exec(text)?.[0];
}

/**
 * Grammar check for the value part of a `kind@value` constant.
 */
export function isLiteralValue(kind: LiteralKind, value: string): boolean {
  switch (kind) {
    case 'int':
      return isIntLiteral(value);
    case 'bool':
      return isBoolLiteral(value);
    case 'string':
      return isStringLiteral(value);
    case 'nil':
      return isNilLiteral(value);
    case 'float':
      return isFloatLiteral(value);
  }
}
