import type { ProgramNode } from '../frontend/ast.js';

/**
 * Options for XML writing.
 */
export interface WriteXmlOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /**
   * Indentation unit for each nesting level (default: two spaces).
   */
  indent?: string;
}

/**
 * In-memory XML artifact.
 */
export interface XmlArtifact {
  kind: 'xml';
  text: string;
}

/**
 * Union of all artifact kinds produced by the parser.
 */
export type Artifact = XmlArtifact;

/**
 * Format writers used by the pipeline to turn a validated program into artifacts.
 *
 * Writers throw {@link SerializeInvariantError} when handed a program that validation should have
 * rejected.
 */
export interface FormatWriters {
  writeXml(program: ProgramNode, opts?: WriteXmlOptions): XmlArtifact;
}

/**
 * Raised by writers on a program that breaks the signature contract (a bug upstream, not bad input).
 */
export class SerializeInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SerializeInvariantError';
  }
}
