/**
 * XML Tree
 *
 * Strict in-memory XML parsing (sax) and an indenting serializer for the
 * XMLTV documents handled by the EPG reducer.
 */

import sax from 'sax';

export interface XmlText {
  type: 'text';
  value: string;
}

export interface XmlElement {
  type: 'element';
  name: string;
  /** Attributes in source order */
  attributes: Record<string, string>;
  children: XmlNode[];
}

export type XmlNode = XmlElement | XmlText;

/**
 * Raised when EPG text is not well-formed XML
 */
export class EpgParseError extends Error {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number
  ) {
    super(message);
    this.name = 'EpgParseError';
  }
}

export function createElement(
  name: string,
  attributes: Record<string, string> = {},
  children: XmlNode[] = []
): XmlElement {
  return { type: 'element', name, attributes, children };
}

export function isElement(node: XmlNode, name?: string): node is XmlElement {
  return node.type === 'element' && (name === undefined || node.name === name);
}

/**
 * Element children with the given name
 */
export function childElements(element: XmlElement, name?: string): XmlElement[] {
  return element.children.filter((child): child is XmlElement => isElement(child, name));
}

/**
 * Concatenated direct text of an element
 */
export function textContent(element: XmlElement): string {
  return element.children
    .filter((child): child is XmlText => child.type === 'text')
    .map((child) => child.value)
    .join('');
}

const isBlankText = (node: XmlNode): boolean => node.type === 'text' && node.value.trim() === '';

/**
 * Parse a document into its root element. CDATA sections are read as text.
 *
 * Whitespace-only text is dropped from elements that hold only elements
 * (indentation). Text-only and mixed content keep their text verbatim.
 *
 * @throws EpgParseError on malformed input
 */
export function parseXml(text: string): XmlElement {
  const parser = sax.parser(true, { trim: false, normalize: false });
  const stack: XmlElement[] = [];
  const roots: XmlElement[] = [];

  const appendText = (value: string): void => {
    const parent = stack[stack.length - 1];
    if (!parent) return;

    const last = parent.children[parent.children.length - 1];
    if (last?.type === 'text') {
      last.value += value;
    } else {
      parent.children.push({ type: 'text', value });
    }
  };

  parser.onopentag = (tag) => {
    const attributes: Record<string, string> = {};
    for (const [name, value] of Object.entries(tag.attributes)) {
      attributes[name] = typeof value === 'string' ? value : value.value;
    }

    const element = createElement(tag.name, attributes);
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(element);
    } else {
      roots.push(element);
    }
    stack.push(element);
  };

  parser.onclosetag = () => {
    const element = stack.pop();
    if (
      element &&
      element.children.some((child) => child.type === 'element') &&
      element.children.every((child) => child.type === 'element' || isBlankText(child))
    ) {
      element.children = element.children.filter((child) => child.type === 'element');
    }
  };

  parser.ontext = appendText;
  parser.oncdata = appendText;

  parser.onerror = (error) => {
    throw new EpgParseError(error.message.split('\n')[0], parser.line + 1, parser.column + 1);
  };

  try {
    parser.write(text.replace(/^\uFEFF/, '')).close();
  } catch (error) {
    if (error instanceof EpgParseError) throw error;
    throw new EpgParseError(error instanceof Error ? error.message : String(error));
  }

  const [root] = roots;
  if (!root) {
    throw new EpgParseError('Document has no root element');
  }
  return root;
}

// ============================================================================
// Serialization
// ============================================================================

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => ESCAPES[char] ?? char);
}

export interface SerializeOptions {
  declaration?: boolean;
  indent?: string;
}

function openTag(element: XmlElement): string {
  const attrs = Object.entries(element.attributes)
    .map(([name, value]) => ` ${name}="${escapeXml(value)}"`)
    .join('');
  return `<${element.name}${attrs}`;
}

/**
 * Single-line form with text written verbatim
 */
function writeInline(element: XmlElement): string {
  if (element.children.length === 0) {
    return `${openTag(element)} />`;
  }
  const inner = element.children
    .map((child) => (child.type === 'text' ? escapeXml(child.value) : writeInline(child)))
    .join('');
  return `${openTag(element)}>${inner}</${element.name}>`;
}

function writeElement(element: XmlElement, depth: number, indent: string, out: string[]): void {
  const pad = indent.repeat(depth);

  // Any text child means whitespace is content; indenting would change it
  if (element.children.length === 0 || element.children.some((child) => child.type === 'text')) {
    out.push(`${pad}${writeInline(element)}`);
    return;
  }

  out.push(`${pad}${openTag(element)}>`);
  for (const child of childElements(element)) {
    writeElement(child, depth + 1, indent, out);
  }
  out.push(`${pad}</${element.name}>`);
}

/**
 * Serialize an element tree, one element per line.
 * Elements holding text, alone or mixed with elements, are written on a
 * single line.
 */
export function serializeXml(root: XmlElement, options: SerializeOptions = {}): string {
  const { declaration = true, indent = '  ' } = options;
  const out: string[] = declaration ? [XML_DECLARATION] : [];
  writeElement(root, 0, indent, out);
  return out.join('\n');
}
