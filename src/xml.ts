import { XMLParser, XMLBuilder, XMLValidator } from 'fast-xml-parser';
import { FormatError } from './errors.js';

/**
 * Typed, order-preserving XML tree on top of fast-xml-parser's
 * `preserveOrder` output. Whitespace-only text is dropped and text is
 * trimmed, so parse(build(tree)) reproduces the tree exactly. Comments are
 * kept verbatim as their own node kind.
 */

export type XmlAttribute = readonly [name: string, value: string];

export interface XmlElement {
  readonly tag: string;
  readonly attributes: readonly XmlAttribute[];
  readonly children: readonly XmlNode[];
}

export interface XmlText {
  readonly text: string;
}

export interface XmlComment {
  readonly comment: string;
}

export type XmlNode = XmlElement | XmlText | XmlComment;

/** Attributes and child nodes this implementation does not interpret */
export interface OpaqueFields {
  readonly attributes: readonly XmlAttribute[];
  readonly children: readonly XmlNode[];
}

export const EMPTY_OPAQUE: OpaqueFields = { attributes: [], children: [] };

// XML parser/builder config for draw.io format
const parserOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  preserveOrder: true,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  commentPropName: '#comment',
};

const builderOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  preserveOrder: true,
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
  commentPropName: '#comment',
};

const parser = new XMLParser(parserOptions);
const builder = new XMLBuilder(builderOptions);

export function isElement(node: XmlNode): node is XmlElement {
  return 'tag' in node;
}

export function isText(node: XmlNode): node is XmlText {
  return 'text' in node;
}

export function elementChildren(node: { readonly children: readonly XmlNode[] }): XmlElement[] {
  return node.children.filter(isElement);
}

/** Concatenated text content directly under a node */
export function textContent(node: XmlElement): string {
  return node.children
    .filter(isText)
    .map((c) => c.text)
    .join('');
}

export function getAttr(node: { readonly attributes: readonly XmlAttribute[] }, name: string): string | undefined {
  return node.attributes.find(([key]) => key === name)?.[1];
}

/** Validate and parse XML text into its top-level nodes */
export function parseXml(text: string, path = ''): XmlNode[] {
  const valid = XMLValidator.validate(text);
  if (valid !== true) {
    throw new FormatError('MalformedXML', `Malformed XML: ${valid.err.msg}`, {
      path: path || undefined,
      line: valid.err.line,
      column: valid.err.col,
      fragment: lineAt(text, valid.err.line),
    });
  }
  const raw: unknown = parser.parse(text);
  return toNodes(raw);
}

export function buildXml(nodes: readonly XmlNode[]): string {
  return builder.build(toOrdered(nodes)).trim();
}

/** Serialize a single element, for error fragments */
export function fragmentOf(node: XmlElement): string {
  return buildXml([{ ...node, children: [] }]);
}

function lineAt(text: string, line: number): string {
  return text.split(/\r?\n/)[line - 1] ?? '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNodes(items: unknown): XmlNode[] {
  if (!Array.isArray(items)) return [];
  const list: unknown[] = items;
  const nodes: XmlNode[] = [];
  for (const item of list) {
    if (!isRecord(item)) continue;
    for (const [key, value] of Object.entries(item)) {
      if (key === ':@') continue;
      if (key === '#text') {
        const text = String(value).trim();
        if (text !== '') nodes.push({ text });
        continue;
      }
      if (key === '#comment') {
        nodes.push({ comment: commentText(value) });
        continue;
      }
      nodes.push({ tag: key, attributes: toAttributes(item[':@']), children: toNodes(value) });
    }
  }
  return nodes;
}

function commentText(value: unknown): string {
  if (!Array.isArray(value)) return '';
  const list: unknown[] = value;
  const first = list[0];
  return isRecord(first) && first['#text'] !== undefined ? String(first['#text']) : '';
}

function toAttributes(raw: unknown): XmlAttribute[] {
  if (!isRecord(raw)) return [];
  return Object.entries(raw).map(([key, value]): XmlAttribute => [key.replace(/^@_/, ''), String(value)]);
}

type OrderedItem = Record<string, unknown>;

function toOrdered(nodes: readonly XmlNode[]): OrderedItem[] {
  return nodes.map((node) => {
    if (isText(node)) return { '#text': node.text };
    if (!isElement(node)) return { '#comment': [{ '#text': node.comment }] };
    const item: OrderedItem = { [node.tag]: toOrdered(node.children) };
    if (node.attributes.length > 0) {
      const attrs: Record<string, string> = {};
      for (const [name, value] of node.attributes) attrs[`@_${name}`] = value;
      item[':@'] = attrs;
    }
    return item;
  });
}
