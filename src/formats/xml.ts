import { SerializeInvariantError } from './types.js';

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

// Tab, LF, CR and DEL become decimal character references; XML 1.0 has no form for other C0 controls.
// eslint-disable-next-line no-control-regex
const ESCAPE_RE = /[&<>"'\u0000-\u001f\u007f]/g;
const REFERENCEABLE = new Set(['\t', '\n', '\r', '\u007f']);

/**
 * Escape text for use in XML character data or a double-quoted attribute value.
 *
 * Throws {@link SerializeInvariantError} on a control character XML 1.0 cannot carry.
 */
export function escapeXml(text: string): string {
  return text.replace(ESCAPE_RE, (ch) => {
    const named = NAMED_ENTITIES[ch];
    if (named !== undefined) return named;
    const code = ch.charCodeAt(0);
    if (!REFERENCEABLE.has(ch)) {
      throw new SerializeInvariantError(
        `character U+${code.toString(16).toUpperCase().padStart(4, '0')} cannot be represented in XML`,
      );
    }
    return `&#${code};`;
  });
}

export type XmlAttrs = ReadonlyArray<readonly [string, string]>;

/**
 * Minimal element model for deterministic pretty-printing. Attribute order is the array order.
 */
export interface XmlElement {
  name: string;
  attrs: XmlAttrs;
  children: XmlElement[];
  text?: string;
}

function openTag(el: XmlElement): string {
  const attrs = el.attrs.map(([k, v]) => ` ${k}="${escapeXml(v)}"`).join('');
  return `<${el.name}${attrs}`;
}

function renderElement(el: XmlElement, depth: number, indent: string, out: string[]): void {
  const pad = indent.repeat(depth);
  const head = openTag(el);
  const text = el.text ?? '';

  if (el.children.length === 0) {
    out.push(text.length === 0 ? `${pad}${head}/>` : `${pad}${head}>${escapeXml(text)}</${el.name}>`);
    return;
  }

  out.push(`${pad}${head}>`);
  for (const child of el.children) {
    renderElement(child, depth + 1, indent, out);
  }
  out.push(`${pad}</${el.name}>`);
}

/**
 * Render a document with an XML declaration; elements with children are indented one level per depth.
 */
export function renderXmlDocument(
  root: XmlElement,
  opts: { indent: string; lineEnding: string },
): string {
  const lines = ['<?xml version="1.0" encoding="UTF-8"?>'];
  renderElement(root, 0, opts.indent, lines);
  return lines.join(opts.lineEnding) + opts.lineEnding;
}
