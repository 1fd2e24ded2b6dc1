import { describe, expect, it } from 'vitest';

import { defaultFormatWriters } from '../src/formats/index.js';
import {
  SIGNATURES,
  SLOT_KINDS,
  type OpcodeSignature,
  type OperandSlot,
} from '../src/isa/signatures.js';
import { translateText } from '../src/translate.js';

const sampleBySlot: Record<OperandSlot, string> = {
  var: 'LF@v',
  symb: 'int@7',
  label: 'target',
  type: 'string',
};

const tagsBySlot: Record<OperandSlot, readonly string[]> = {
  var: ['var'],
  symb: ['var', 'int', 'bool', 'string', 'nil', 'float'],
  label: ['label'],
  type: ['type'],
};

const opcodes = [...SIGNATURES.values()];

describe('signature conformance matrix', () => {
  it.each(opcodes.map((sig): [string, OpcodeSignature] => [sig.opcode, sig]))(
    '%s emits exactly its arity with permitted kinds',
    (opcode, sig) => {
      const line = [opcode.toLowerCase(), ...sig.slots.map((s) => sampleBySlot[s])].join(' ');
      const res = translateText('m.ippc', `.IPPcode24\n${line}\n`, {}, { formats: defaultFormatWriters });
      expect(res.diagnostics).toEqual([]);

      const [instr] = res.program?.instructions ?? [];
      expect(instr?.opcode).toBe(opcode);
      expect(instr?.operands).toHaveLength(sig.arity);
      instr?.operands.forEach((op, i) => {
        const slot = sig.slots[i];
        expect(slot).toBeDefined();
        if (slot) expect(SLOT_KINDS[slot].has(op.kind)).toBe(true);
      });

      const text = res.artifacts[0]?.text ?? '';
      const args = [...text.matchAll(/<arg(\d) type="([a-z]+)"/g)];
      expect(args.map((m) => Number(m[1]))).toEqual(sig.slots.map((_s, i) => i + 1));
      args.forEach((m, i) => {
        const slot = sig.slots[i];
        if (slot) expect(tagsBySlot[slot]).toContain(m[2]);
      });
    },
  );

  it.each(opcodes.map((sig): [string, number] => [sig.opcode, sig.arity]))(
    '%s rejects one operand too many',
    (opcode, arity) => {
      const line = [opcode, ...Array.from({ length: arity + 1 }, () => 'GF@a')].join(' ');
      const res = translateText('m.ippc', `.IPPcode24\n${line}\n`, {}, { formats: defaultFormatWriters });
      expect(res.diagnostics.map((d) => d.id)).toEqual(['IPP201']);
    },
  );
});
