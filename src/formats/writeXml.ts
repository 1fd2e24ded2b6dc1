import type { InstructionNode, ProgramNode } from '../frontend/ast.js';
import { operandTag, operandText } from '../frontend/ast.js';
import { SLOT_KINDS, lookupSignature } from '../isa/signatures.js';
import type { WriteXmlOptions, XmlArtifact } from './types.js';
import { SerializeInvariantError } from './types.js';
import { renderXmlDocument, type XmlElement } from './xml.js';

function checkInstruction(instr: InstructionNode, expectedOrder: number): void {
  if (instr.order !== expectedOrder) {
    throw new SerializeInvariantError(
      `instruction ${instr.opcode} has order ${instr.order}, expected ${expectedOrder}`,
    );
  }
  const sig = lookupSignature(instr.opcode);
  if (!sig || sig.opcode !== instr.opcode) {
    throw new SerializeInvariantError(`instruction ${instr.order} has unknown opcode "${instr.opcode}"`);
  }
  if (instr.operands.length !== sig.arity) {
    throw new SerializeInvariantError(
      `instruction ${instr.order} (${instr.opcode}) has ${instr.operands.length} operands, signature requires ${sig.arity}`,
    );
  }
  instr.operands.forEach((op, i) => {
    const slot = sig.slots[i];
    if (!slot || !SLOT_KINDS[slot].has(op.kind)) {
      throw new SerializeInvariantError(
        `instruction ${instr.order} (${instr.opcode}) operand ${i + 1} of kind ${op.kind} is not permitted`,
      );
    }
  });
}

function instructionElement(instr: InstructionNode): XmlElement {
  return {
    name: 'instruction',
    attrs: [
      ['order', String(instr.order)],
      ['opcode', instr.opcode],
    ],
    children: instr.operands.map((op, i) => ({
      name: `arg${i + 1}`,
      attrs: [['type', operandTag(op)]],
      children: [],
      text: operandText(op),
    })),
  };
}

/**
 * Serialize a validated program into the XML interchange document.
 *
 * Layout: `<program language>` → `<instruction order opcode>` → `<argN type>text</argN>`. Output is
 * byte-for-byte stable for a given program. Signature violations throw {@link SerializeInvariantError}.
 */
export function writeXml(program: ProgramNode, opts?: WriteXmlOptions): XmlArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const indent = opts?.indent ?? '  ';

  program.instructions.forEach((instr, i) => checkInstruction(instr, i + 1));

  const root: XmlElement = {
    name: 'program',
    attrs: [['language', program.language]],
    children: program.instructions.map(instructionElement),
  };

  return { kind: 'xml', text: renderXmlDocument(root, { indent, lineEnding }) };
}
