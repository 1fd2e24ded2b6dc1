import { describe, expect, it } from 'vitest';

import {
  decodeStringEscapes,
  firstNonXmlChar,
  hasMalformedEscape,
  isBoolLiteral,
  isFloatLiteral,
  isHeaderToken,
  isIdentifier,
  isIntLiteral,
  isNilLiteral,
  isStringLiteral,
  isTypeName,
  parseVariable,
} from '../src/frontend/grammar.js';

describe('token grammar', () => {
  it('accepts identifiers with the special symbol set and rejects a leading digit', () => {
    for (const ok of ['loop', '_x', '-a', 'a1', '$&%*!?', 'Done!', 'x-y_z']) {
      expect(isIdentifier(ok), ok).toBe(true);
    }
    for (const bad of ['', '1abc', 'a@b', 'a.b', 'a b', 'a#b']) {
      expect(isIdentifier(bad), bad).toBe(false);
    }
  });

  it('accepts Unicode letters and digits after an ASCII first character', () => {
    for (const ok of ['smyčka', 'ahoj_světe', 'x٣', 'a-ž!']) {
      expect(isIdentifier(ok), ok).toBe(true);
    }
    for (const bad of ['čau', 'Ünter', '٣x', 'a·b']) {
      expect(isIdentifier(bad), bad).toBe(false);
    }
    expect(parseVariable('GF@ahoj_světe')).toEqual({ frame: 'GF', name: 'ahoj_světe' });
  });

  it('parses variables with a case-sensitive frame prefix', () => {
    expect(parseVariable('GF@x')).toEqual({ frame: 'GF', name: 'x' });
    expect(parseVariable('LF@Counter')).toEqual({ frame: 'LF', name: 'Counter' });
    expect(parseVariable('TF@_tmp')).toEqual({ frame: 'TF', name: '_tmp' });
    expect(parseVariable('gf@x')).toBeUndefined();
    expect(parseVariable('XF@x')).toBeUndefined();
    expect(parseVariable('GF@1x')).toBeUndefined();
    expect(parseVariable('GF@')).toBeUndefined();
    expect(parseVariable('GFx')).toBeUndefined();
  });

  it('accepts signed decimal, hexadecimal and octal integers', () => {
    for (const ok of ['42', '-7', '+3', '007', '0x1F', '-0x1f', '0o17', '-0o7']) {
      expect(isIntLiteral(ok), ok).toBe(true);
    }
    for (const bad of ['', '-', '0x', '0o8', '1.5', '12a', '--1', '0xG', '+0x1F', '0X1F', '0O7', '+0o7']) {
      expect(isIntLiteral(bad), bad).toBe(false);
    }
  });

  it('accepts exact bool and nil spellings only', () => {
    expect(isBoolLiteral('true')).toBe(true);
    expect(isBoolLiteral('false')).toBe(true);
    expect(isBoolLiteral('True')).toBe(false);
    expect(isBoolLiteral('1')).toBe(false);
    expect(isNilLiteral('nil')).toBe(true);
    expect(isNilLiteral('NIL')).toBe(false);
    expect(isNilLiteral('')).toBe(false);
  });

  it('accepts decimal and hexadecimal floating point', () => {
    for (const ok of ['1.5', '-0.25', '.5', '1.', '2e10', '-3.25E-2', '42', '0x1.8p+1', '0x.8p0', '-0X1P-3']) {
      expect(isFloatLiteral(ok), ok).toBe(true);
    }
    for (const bad of ['', '.', 'e5', '1.5.2', '0x1.8', '1e', 'nan']) {
      expect(isFloatLiteral(bad), bad).toBe(false);
    }
  });

  it('accepts strings without whitespace, hash or bare backslashes', () => {
    expect(isStringLiteral('')).toBe(true);
    expect(isStringLiteral('hello')).toBe(true);
    expect(isStringLiteral('a\\032b')).toBe(true);
    expect(isStringLiteral('<&>')).toBe(true);
    expect(isStringLiteral('a\\03')).toBe(false);
    expect(isStringLiteral('a b')).toBe(false);
    expect(isStringLiteral('a#b')).toBe(false);
    expect(isStringLiteral('\\')).toBe(false);
  });

  it('flags backslashes not followed by exactly three digits', () => {
    expect(hasMalformedEscape('a\\1')).toBe(true);
    expect(hasMalformedEscape('\\')).toBe(true);
    expect(hasMalformedEscape('\\12x')).toBe(true);
    expect(hasMalformedEscape('a\\123')).toBe(false);
    expect(hasMalformedEscape('\\1234')).toBe(false);
    expect(hasMalformedEscape('plain')).toBe(false);
  });

  it('decodes decimal escapes into characters', () => {
    expect(decodeStringEscapes('a\\032b')).toBe('a b');
    expect(decodeStringEscapes('\\010')).toBe('\n');
    expect(decodeStringEscapes('\\092')).toBe('\\');
    expect(decodeStringEscapes('x\\035y')).toBe('x#y');
    expect(decodeStringEscapes('\\1234')).toBe('{4');
    expect(decodeStringEscapes('none')).toBe('none');
  });

  it('finds control characters that XML cannot carry', () => {
    expect(firstNonXmlChar('a\u0001b\u0000')).toBe('\u0001');
    expect(firstNonXmlChar('\u0000')).toBe('\u0000');
    expect(firstNonXmlChar('\u001f')).toBe('\u001f');
    expect(firstNonXmlChar('tab\tlf\ncr\r del\u007f')).toBeUndefined();
  });

  it('recognizes type names case-sensitively', () => {
    for (const t of ['int', 'bool', 'string', 'nil', 'float']) {
      expect(isTypeName(t), t).toBe(true);
    }
    expect(isTypeName('Int')).toBe(false);
    expect(isTypeName('var')).toBe(false);
  });

  it('matches the header case-insensitively', () => {
    expect(isHeaderToken('.IPPcode24')).toBe(true);
    expect(isHeaderToken('.ippCODE24')).toBe(true);
    expect(isHeaderToken('IPPcode24')).toBe(false);
    expect(isHeaderToken('.IPPcode23')).toBe(false);
  });
});
