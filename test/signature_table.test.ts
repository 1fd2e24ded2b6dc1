import { describe, expect, it } from 'vitest';

import {
  SIGNATURES,
  SLOT_KINDS,
  describeSlot,
  lookupSignature,
  operandCountText,
} from '../src/isa/signatures.js';

describe('opcode signature table', () => {
  it('covers the base language plus the float and stack extensions', () => {
    expect(SIGNATURES.size).toBe(56);
    for (const opcode of ['MOVE', 'DIV', 'INT2FLOAT', 'CLEARS', 'JUMPIFEQS', 'FLOAT2INTS', 'BREAK']) {
      expect(SIGNATURES.has(opcode), opcode).toBe(true);
    }
  });

  it('looks opcodes up case-insensitively and returns the shared entry', () => {
    const move = SIGNATURES.get('MOVE');
    expect(move).toBeDefined();
    expect(lookupSignature('move')).toBe(move);
    expect(lookupSignature('MoVe')).toBe(move);
    expect(lookupSignature('FOO')).toBeUndefined();
    expect(lookupSignature('')).toBeUndefined();
  });

  it('keeps arity equal to the slot count and freezes every entry', () => {
    for (const [opcode, sig] of SIGNATURES) {
      expect(sig.opcode).toBe(opcode);
      expect(sig.arity).toBe(sig.slots.length);
      expect(Object.isFrozen(sig)).toBe(true);
      expect(Object.isFrozen(sig.slots)).toBe(true);
    }
  });

  it('records per-position slot classes', () => {
    expect(lookupSignature('MOVE')?.slots).toEqual(['var', 'symb']);
    expect(lookupSignature('READ')?.slots).toEqual(['var', 'type']);
    expect(lookupSignature('JUMPIFEQ')?.slots).toEqual(['label', 'symb', 'symb']);
    expect(lookupSignature('CALL')?.slots).toEqual(['label']);
    expect(lookupSignature('PUSHS')?.slots).toEqual(['symb']);
    expect(lookupSignature('ADDS')?.slots).toEqual([]);
    expect(lookupSignature('BREAK')?.arity).toBe(0);
  });

  it('maps slot classes to permitted operand kinds', () => {
    expect([...SLOT_KINDS.var]).toEqual(['Var']);
    expect([...SLOT_KINDS.symb]).toEqual(['Var', 'Const']);
    expect([...SLOT_KINDS.label]).toEqual(['Label']);
    expect([...SLOT_KINDS.type]).toEqual(['Type']);
  });

  it('describes slots and operand counts in words', () => {
    expect(describeSlot('symb')).toBe('a variable or constant');
    expect(describeSlot('type')).toBe('a type name');
    expect(operandCountText(0)).toBe('no operands');
    expect(operandCountText(1)).toBe('one operand');
    expect(operandCountText(3)).toBe('three operands');
    expect(operandCountText(4)).toBe('4 operands');
  });
});
