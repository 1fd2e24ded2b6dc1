import type { OperandKind } from '../frontend/ast.js';

/**
 * Operand slot classes used by the instruction set.
 *
 * - `var`: a variable (`GF@x`)
 * - `symb`: a variable or any constant
 * - `label`: a label name
 * - `type`: a type name
 */
export type OperandSlot = 'var' | 'symb' | 'label' | 'type';

export interface OpcodeSignature {
  /** Canonical upper-case opcode. */
  readonly opcode: string;
  readonly arity: number;
  readonly slots: readonly OperandSlot[];
}

/**
 * Operand kinds permitted by each slot class.
 */
export const SLOT_KINDS: Readonly<Record<OperandSlot, ReadonlySet<OperandKind>>> = {
  var: new Set<OperandKind>(['Var']),
  symb: new Set<OperandKind>(['Var', 'Const']),
  label: new Set<OperandKind>(['Label']),
  type: new Set<OperandKind>(['Type']),
};

const V = 'var';
const S = 'symb';
const L = 'label';
const T = 'type';

const SLOTS_BY_OPCODE: ReadonlyArray<readonly [string, readonly OperandSlot[]]> = [
  // frames, calls
  ['MOVE', [V, S]],
  ['CREATEFRAME', []],
  ['PUSHFRAME', []],
  ['POPFRAME', []],
  ['DEFVAR', [V]],
  ['CALL', [L]],
  ['RETURN', []],

  // data stack
  ['PUSHS', [S]],
  ['POPS', [V]],
  ['CLEARS', []],

  // arithmetic, relational, boolean, conversion
  ['ADD', [V, S, S]],
  ['SUB', [V, S, S]],
  ['MUL', [V, S, S]],
  ['IDIV', [V, S, S]],
  ['DIV', [V, S, S]],
  ['LT', [V, S, S]],
  ['GT', [V, S, S]],
  ['EQ', [V, S, S]],
  ['AND', [V, S, S]],
  ['OR', [V, S, S]],
  ['NOT', [V, S]],
  ['INT2CHAR', [V, S]],
  ['STRI2INT', [V, S, S]],
  ['INT2FLOAT', [V, S]],
  ['FLOAT2INT', [V, S]],

  // stack variants operate on the data stack only
  ['ADDS', []],
  ['SUBS', []],
  ['MULS', []],
  ['IDIVS', []],
  ['DIVS', []],
  ['LTS', []],
  ['GTS', []],
  ['EQS', []],
  ['ANDS', []],
  ['ORS', []],
  ['NOTS', []],
  ['INT2CHARS', []],
  ['STRI2INTS', []],
  ['INT2FLOATS', []],
  ['FLOAT2INTS', []],
  ['JUMPIFEQS', [L]],
  ['JUMPIFNEQS', [L]],

  // I/O
  ['READ', [V, T]],
  ['WRITE', [S]],

  // strings
  ['CONCAT', [V, S, S]],
  ['STRLEN', [V, S]],
  ['GETCHAR', [V, S, S]],
  ['SETCHAR', [V, S, S]],

  // types
  ['TYPE', [V, S]],

  // control flow
  ['LABEL', [L]],
  ['JUMP', [L]],
  ['JUMPIFEQ', [L, S, S]],
  ['JUMPIFNEQ', [L, S, S]],
  ['EXIT', [S]],

  // debugging
  ['DPRINT', [S]],
  ['BREAK', []],
];

function buildTable(): ReadonlyMap<string, OpcodeSignature> {
  const table = new Map<string, OpcodeSignature>();
  for (const [opcode, slots] of SLOTS_BY_OPCODE) {
    table.set(
      opcode,
      Object.freeze({ opcode, arity: slots.length, slots: Object.freeze([...slots]) }),
    );
  }
  return table;
}

/**
 * Every opcode of the language keyed by its canonical upper-case name.
 */
export const SIGNATURES: ReadonlyMap<string, OpcodeSignature> = buildTable();

/**
 * Case-insensitive opcode lookup.
 */
export function lookupSignature(opcode: string): OpcodeSignature | undefined {
  return SIGNATURES.get(opcode.toUpperCase());
}

/**
 * Human-readable slot description used in diagnostics.
 */
export function describeSlot(slot: OperandSlot): string {
  switch (slot) {
    case 'var':
      return 'a variable';
    case 'symb':
      return 'a variable or constant';
    case 'label':
      return 'a label';
    case 'type':
      return 'a type name';
  }
}

/**
 * `no operands`, `one operand`, `two operands`, ...
 */
export function operandCountText(n: number): string {
  const words = ['no', 'one', 'two', 'three'];
  const word = words[n] ?? String(n);
  return `${word} ${n === 1 ? 'operand' : 'operands'}`;
}
