/**
 * Frontend AST contracts for IPPcode24.
 *
 * This module defines types/interfaces only (no parsing/semantics). Every node is built once by the
 * parser and treated as immutable afterwards.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based character offset in the source text. */
  offset: number;
}

/**
 * Source span with inclusive start and exclusive end positions.
 */
export interface SourceSpan {
  /** User-facing source name (input path, or `<stdin>`). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all AST nodes.
 */
export interface BaseNode {
  readonly kind: string;
  readonly span: SourceSpan;
}

/** Variable storage frames: global, local and temporary. */
export type FrameName = 'GF' | 'LF' | 'TF';

/** Literal kinds a constant operand may carry (`kind@value`). */
export type LiteralKind = 'int' | 'bool' | 'string' | 'nil' | 'float';

/** Type names accepted where an operand must name a type (`READ var type`). */
export type TypeNameKind = 'int' | 'bool' | 'string' | 'nil' | 'float';

/**
 * Kind tag emitted for an operand in the XML `type` attribute.
 */
export type OperandTag = 'var' | LiteralKind | 'label' | 'type';

/**
 * Variable reference: `GF@counter`.
 */
export interface VarOperandNode extends BaseNode {
  readonly kind: 'Var';
  readonly frame: FrameName;
  /** Case-sensitive identifier after the frame prefix. */
  readonly name: string;
}

/**
 * Typed constant: `int@42`, `string@a\032b`, `nil@nil`.
 */
export interface ConstOperandNode extends BaseNode {
  readonly kind: 'Const';
  readonly literal: LiteralKind;
  /** Decoded value: escapes in `string` literals are already replaced by their characters. */
  readonly value: string;
}

/**
 * Jump target or label definition name.
 */
export interface LabelOperandNode extends BaseNode {
  readonly kind: 'Label';
  readonly name: string;
}

/**
 * Type name operand (`READ GF@x int`).
 */
export interface TypeOperandNode extends BaseNode {
  readonly kind: 'Type';
  readonly name: TypeNameKind;
}

export type OperandNode = VarOperandNode | ConstOperandNode | LabelOperandNode | TypeOperandNode;

export type OperandKind = OperandNode['kind'];

/**
 * Validated instruction.
 */
export interface InstructionNode extends BaseNode {
  readonly kind: 'Instruction';
  /** Canonical upper-case opcode. */
  readonly opcode: string;
  readonly operands: readonly OperandNode[];
  /** 1-based position in the program, contiguous across the run. */
  readonly order: number;
}

/**
 * A parsed IPPcode24 program: the header identifier plus its instructions in source order.
 */
export interface ProgramNode extends BaseNode {
  readonly kind: 'Program';
  /** Language identifier from the header, e.g. `IPPcode24`. */
  readonly language: string;
  readonly instructions: readonly InstructionNode[];
}

/**
 * Text rendering of an operand's value as it appears in the output tree.
 */
export function operandText(op: OperandNode): string {
  switch (op.kind) {
    case 'Var':
      return `${op.frame}@${op.name}`;
    case 'Const':
      return op.value;
    case 'Label':
    case 'Type':
      return op.name;
  }
}

/**
 * Kind tag of an operand as it appears in the output tree.
 */
export function operandTag(op: OperandNode): OperandTag {
  switch (op.kind) {
    case 'Var':
      return 'var';
    case 'Const':
      return op.literal;
    case 'Label':
      return 'label';
    case 'Type':
      return 'type';
  }
}
