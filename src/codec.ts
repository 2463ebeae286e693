/**
 * draw.io interchange codec.
 *
 * Decoding walks `mxfile > diagram > mxGraphModel > root > mxCell` into the
 * model and keeps every attribute and node it does not interpret as opaque
 * extras, so `decodeDiagram(encodeDiagram(d))` reproduces `d` exactly.
 * Encoding never validates.
 */

import { FormatError } from './errors.js';
import { createGeometry, type Geometry, type Point } from './geometry.js';
import { compressXml, decompressXml } from './compression.js';
import {
  DEFAULT_DIAGRAM_NAME,
  DEFAULT_PAGE_SETTINGS,
  generateId,
  routingOf,
  shapeTypeOf,
  type CellWrapper,
  type ConnectorElement,
  type DanglingEndpoint,
  type DanglingPolicy,
  type Diagram,
  type DiagramElement,
  type EndpointSide,
  type Layer,
  type Page,
  type PageSettings,
  type RootCell,
} from './model.js';
import { isStyleFlagSet, readStyle, serializeStyle } from './style.js';
import { silentLogger, type Logger } from './log.js';
import {
  buildXml,
  elementChildren,
  EMPTY_OPAQUE,
  fragmentOf,
  getAttr,
  isElement,
  isText,
  parseXml,
  textContent,
  type OpaqueFields,
  type XmlAttribute,
  type XmlElement,
  type XmlNode,
} from './xml.js';

export interface DecodeOptions {
  /** Treatment of connector endpoints that name no element of their page */
  danglingReferences?: DanglingPolicy;
  /** Diagram name used when the file does not carry one */
  defaultName?: string;
  logger?: Logger;
}

export interface UnresolvedReference extends DanglingEndpoint {
  readonly pageId: string;
}

export interface DecodeResult {
  readonly diagram: Diagram;
  /** True when at least one page was stored compressed */
  readonly compressed: boolean;
  /** Dangling endpoints kept under the `retain` policy */
  readonly unresolved: UnresolvedReference[];
}

export interface EncodeOptions {
  /** Store each page as deflated, base64-encoded text */
  compressed?: boolean;
}

interface DecodeContext {
  readonly policy: DanglingPolicy;
  readonly logger: Logger;
  readonly unresolved: UnresolvedReference[];
}

const WRAPPER_TAGS = new Set(['UserObject', 'object']);
const MODEL_SETTINGS = new Set(['grid', 'gridSize', 'background', 'pageWidth', 'pageHeight']);

// ── Decode ──────────────────────────────────────────────────────────────

export function decodeDiagram(input: Uint8Array | string, options: DecodeOptions = {}): DecodeResult {
  const ctx: DecodeContext = {
    policy: options.danglingReferences ?? 'retain',
    logger: options.logger ?? silentLogger,
    unresolved: [],
  };
  const text = typeof input === 'string' ? input : decodeUtf8(input);
  const roots = elementChildren({ children: parseXml(text) });
  if (roots.length !== 1) {
    throw new FormatError('MalformedXML', `Expected one root element, found ${roots.length}`);
  }
  const root = roots[0];

  if (root.tag === 'mxGraphModel') {
    const page = decodeModel(root, 'mxGraphModel', { id: generateId(), name: 'Page-1', extras: EMPTY_OPAQUE }, ctx);
    const name = options.defaultName ?? DEFAULT_DIAGRAM_NAME;
    const diagram: Diagram = { id: generateId(), name, version: null, pages: [page], extras: EMPTY_OPAQUE };
    return { diagram, compressed: false, unresolved: ctx.unresolved };
  }
  if (root.tag !== 'mxfile') {
    throw new FormatError('MalformedXML', `Unexpected root element <${root.tag}>, expected <mxfile> or <mxGraphModel>`, {
      path: root.tag,
      fragment: fragmentOf(root),
    });
  }

  const pages: Page[] = [];
  const extraChildren: XmlNode[] = [];
  let compressed = false;
  let index = 0;
  for (const child of root.children) {
    if (!isElement(child) || child.tag !== 'diagram') {
      extraChildren.push(child);
      continue;
    }
    index++;
    const path = `mxfile/diagram[${index}]`;
    const decoded = decodePage(child, path, index, ctx);
    if (pages.some((p) => p.id === decoded.page.id)) {
      throw new FormatError('DuplicateId', `Duplicate page id "${decoded.page.id}"`, { path, fragment: fragmentOf(child) });
    }
    compressed = compressed || decoded.compressed;
    pages.push(decoded.page);
  }
  if (pages.length === 0) {
    throw new FormatError('MalformedXML', 'The file contains no <diagram> pages', { path: 'mxfile', fragment: fragmentOf(root) });
  }

  const diagram: Diagram = {
    id: getAttr(root, 'id') ?? generateId(),
    name: getAttr(root, 'name') ?? options.defaultName ?? DEFAULT_DIAGRAM_NAME,
    version: getAttr(root, 'version') ?? null,
    pages,
    extras: {
      // `compressed` is written by draw.io as a hint only; the page content decides
      attributes: root.attributes.filter(([key]) => !['id', 'name', 'version', 'compressed'].includes(key)),
      children: extraChildren,
    },
  };
  return { diagram, compressed, unresolved: ctx.unresolved };
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FormatError('MalformedXML', `Input is not valid UTF-8: ${reason}`);
  }
}

interface PageHead {
  readonly id: string;
  readonly name: string;
  readonly extras: OpaqueFields;
}

function decodePage(node: XmlElement, path: string, index: number, ctx: DecodeContext): { page: Page; compressed: boolean } {
  const attributes = node.attributes.filter(([key]) => key !== 'id' && key !== 'name');
  const head = (children: readonly XmlNode[]): PageHead => ({
    id: getAttr(node, 'id') ?? generateId(),
    name: getAttr(node, 'name') ?? `Page-${index}`,
    extras: { attributes, children },
  });

  const model = elementChildren(node).find((c) => c.tag === 'mxGraphModel');
  if (model) {
    const page = decodeModel(model, `${path}/mxGraphModel`, head(node.children.filter((c) => c !== model)), ctx);
    return { page, compressed: false };
  }

  const payload = textContent(node);
  if (payload === '') {
    const page = decodeModel(undefined, `${path}/mxGraphModel`, head(node.children), ctx);
    return { page, compressed: false };
  }

  const inner = elementChildren({ children: parseXml(decompressXml(payload, path), path) });
  const unpacked = inner.find((c) => c.tag === 'mxGraphModel');
  if (!unpacked) {
    throw new FormatError('MalformedCompression', 'Compressed page does not contain an <mxGraphModel>', {
      path,
      fragment: payload,
    });
  }
  const page = decodeModel(unpacked, `${path}/mxGraphModel`, head(node.children.filter((c) => !isText(c))), ctx);
  return { page, compressed: true };
}

function decodeSettings(model: XmlElement | undefined, path: string): PageSettings {
  if (!model) return DEFAULT_PAGE_SETTINGS;
  const numeric = (name: string, fallback: number): number => {
    const raw = getAttr(model, name);
    if (raw === undefined) return fallback;
    return parseNumber(raw, name, path, model);
  };
  return {
    grid: (getAttr(model, 'grid') ?? '1') === '1',
    gridSize: numeric('gridSize', DEFAULT_PAGE_SETTINGS.gridSize),
    background: getAttr(model, 'background') ?? null,
    pageWidth: numeric('pageWidth', DEFAULT_PAGE_SETTINGS.pageWidth),
    pageHeight: numeric('pageHeight', DEFAULT_PAGE_SETTINGS.pageHeight),
  };
}

function parseNumber(raw: string, name: string, path: string, node: XmlElement): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new FormatError('MalformedXML', `Attribute ${name}="${raw}" is not a number`, { path, fragment: fragmentOf(node) });
  }
  return value;
}

/** A cell node after unwrapping, before classification */
interface RawCell {
  readonly id: string;
  readonly parent: string | undefined;
  readonly cell: XmlElement;
  readonly wrapper: CellWrapper | null;
  readonly label: string | undefined;
  readonly path: string;
}

function decodeModel(model: XmlElement | undefined, path: string, head: PageHead, ctx: DecodeContext): Page {
  const settings = decodeSettings(model, path);
  const rootNode = model ? elementChildren(model).find((c) => c.tag === 'root') : undefined;
  const graphModel: OpaqueFields = model
    ? {
        attributes: model.attributes.filter(([key]) => !MODEL_SETTINGS.has(key)),
        children: model.children.filter((c) => c !== rootNode),
      }
    : EMPTY_OPAQUE;

  const rootPath = `${path}/root`;
  const cells: RawCell[] = [];
  const rootExtras: XmlNode[] = [];
  const tagCounts = new Map<string, number>();
  for (const child of rootNode?.children ?? []) {
    if (!isElement(child) || (child.tag !== 'mxCell' && !WRAPPER_TAGS.has(child.tag))) {
      rootExtras.push(child);
      continue;
    }
    const n = (tagCounts.get(child.tag) ?? 0) + 1;
    tagCounts.set(child.tag, n);
    cells.push(unwrapCell(child, `${rootPath}/${child.tag}[${n}]`));
  }

  const byId = new Map<string, RawCell>();
  for (const raw of cells) {
    if (byId.has(raw.id)) {
      throw new FormatError('DuplicateId', `Duplicate cell id "${raw.id}"`, { path: raw.path, fragment: fragmentOf(raw.cell) });
    }
    byId.set(raw.id, raw);
  }

  const parentless = cells.filter((raw) => raw.parent === undefined);
  if (parentless.length > 1) {
    const extra = parentless[1];
    throw new FormatError('UnresolvableReference', `Cell "${extra.id}" has no parent but "${parentless[0].id}" is already the root cell`, {
      path: extra.path,
      fragment: fragmentOf(extra.cell),
    });
  }
  const rootRaw = parentless.length === 1 ? parentless[0] : undefined;
  if (rootRaw?.wrapper) {
    throw new FormatError('MalformedXML', `Root cell "${rootRaw.id}" cannot be wrapped in <${rootRaw.wrapper.tag}>`, {
      path: rootRaw.path,
      fragment: fragmentOf(rootRaw.cell),
    });
  }
  const rootCell: RootCell | null = rootRaw ? { id: rootRaw.id, extras: opaqueOf(rootRaw.cell, ['id']) } : null;

  const layers: Layer[] = [];
  const elementCells: RawCell[] = [];
  for (const raw of cells) {
    if (raw === rootRaw) continue;
    if (rootRaw && raw.parent === rootRaw.id) {
      const known = raw.wrapper ? ['parent'] : ['id', 'value', 'parent'];
      layers.push({ id: raw.id, label: raw.label ?? '', wrapper: raw.wrapper, extras: opaqueOf(raw.cell, known) });
    } else {
      elementCells.push(raw);
    }
  }

  const layerIds = new Set(layers.map((l) => l.id));
  const hasChildren = new Set(elementCells.map((c) => c.parent));
  const elements = elementCells.map((raw) => {
    const layerId = resolveLayer(raw, byId, layerIds);
    const parentId = raw.parent !== undefined && !layerIds.has(raw.parent) ? raw.parent : null;
    return decodeElement(raw, layerId, parentId, hasChildren.has(raw.id));
  });

  const page: Page = {
    id: head.id,
    name: head.name,
    settings,
    rootCell,
    layers,
    elements: applyDanglingPolicy(head.id, elements, ctx),
    extras: { page: head.extras, graphModel, root: { attributes: rootNode?.attributes ?? [], children: rootExtras } },
  };
  return syncChildIds(page);
}

function unwrapCell(node: XmlElement, path: string): RawCell {
  if (node.tag === 'mxCell') {
    const id = getAttr(node, 'id');
    if (id === undefined) throw new FormatError('MalformedXML', 'Cell has no id', { path, fragment: fragmentOf(node) });
    return { id, parent: getAttr(node, 'parent'), cell: node, wrapper: null, label: getAttr(node, 'value'), path };
  }
  const cell = elementChildren(node).find((c) => c.tag === 'mxCell');
  const id = getAttr(node, 'id');
  if (!cell || id === undefined) {
    throw new FormatError('MalformedXML', `<${node.tag}> needs an id and an <mxCell> child`, { path, fragment: fragmentOf(node) });
  }
  const wrapper: CellWrapper = {
    tag: node.tag,
    attributes: node.attributes.filter(([key]) => key !== 'id' && key !== 'label'),
    children: node.children.filter((c) => c !== cell),
  };
  return { id, parent: getAttr(cell, 'parent'), cell, wrapper, label: getAttr(node, 'label'), path };
}

/** Walk up the parent chain to the layer that holds the cell */
function resolveLayer(raw: RawCell, byId: Map<string, RawCell>, layerIds: Set<string>): string {
  const seen = new Set<string>([raw.id]);
  let current = raw;
  for (;;) {
    const parent = current.parent === undefined ? undefined : byId.get(current.parent);
    if (!parent) {
      throw new FormatError('UnresolvableReference', `Parent "${current.parent ?? ''}" of cell "${current.id}" does not exist`, {
        path: current.path,
        fragment: fragmentOf(current.cell),
      });
    }
    if (layerIds.has(parent.id)) return parent.id;
    if (seen.has(parent.id)) {
      throw new FormatError('UnresolvableReference', `Cell "${raw.id}" is part of a parent cycle`, {
        path: raw.path,
        fragment: fragmentOf(raw.cell),
      });
    }
    seen.add(parent.id);
    current = parent;
  }
}

function decodeElement(raw: RawCell, layerId: string, parentId: string | null, hasChildren: boolean): DiagramElement {
  const cell = raw.cell;
  const style = readStyle(getAttr(cell, 'style') ?? '');
  const isEdge = getAttr(cell, 'edge') === '1';
  const isGroup = !isEdge && (hasChildren || isStyleFlagSet(style, 'group'));
  const geometryNode = elementChildren(cell).find((c) => c.tag === 'mxGeometry' && getAttr(c, 'as') === 'geometry');

  const known = ['style', 'parent', 'visible', isEdge ? 'edge' : 'vertex'];
  if (!raw.wrapper) known.push('id', 'value');
  if (isEdge) known.push('source', 'target');
  if (isGroup) known.push('collapsed');

  const base = {
    id: raw.id,
    label: raw.label ?? '',
    geometry: geometryNode ? decodeGeometry(geometryNode, `${raw.path}/mxGeometry`) : createGeometry(),
    style,
    parentId,
    layerId,
    visible: getAttr(cell, 'visible') !== '0',
    locked: isStyleFlagSet(style, 'locked'),
    wrapper: raw.wrapper,
    extras: {
      attributes: cell.attributes.filter(([key]) => !known.includes(key)),
      children: cell.children.filter((c) => c !== geometryNode),
    },
  };

  if (isEdge) {
    return {
      ...base,
      kind: 'connector',
      sourceId: getAttr(cell, 'source') ?? null,
      targetId: getAttr(cell, 'target') ?? null,
      routing: routingOf(style),
    };
  }
  if (isGroup) {
    return { ...base, kind: 'group', childIds: [], collapsed: getAttr(cell, 'collapsed') === '1' };
  }
  return { ...base, kind: 'shape', shapeType: shapeTypeOf(style) };
}

function decodeGeometry(node: XmlElement, path: string): Geometry {
  const numeric = (name: string): number => {
    const raw = getAttr(node, name);
    return raw === undefined ? 0 : parseNumber(raw, name, path, node);
  };
  let sourcePoint: Point | null = null;
  let targetPoint: Point | null = null;
  let points: Point[] = [];
  const children: XmlNode[] = [];
  for (const child of node.children) {
    if (isPlainPoint(child, 'sourcePoint') && sourcePoint === null) {
      sourcePoint = decodePoint(child, path);
    } else if (isPlainPoint(child, 'targetPoint') && targetPoint === null) {
      targetPoint = decodePoint(child, path);
    } else if (isPointArray(child) && points.length === 0) {
      points = elementChildren(child).map((p) => decodePoint(p, path));
    } else {
      children.push(child);
    }
  }
  return {
    x: numeric('x'),
    y: numeric('y'),
    width: numeric('width'),
    height: numeric('height'),
    relative: getAttr(node, 'relative') === '1',
    points,
    sourcePoint,
    targetPoint,
    extras: {
      attributes: node.attributes.filter(([key]) => !['x', 'y', 'width', 'height', 'relative', 'as'].includes(key)),
      children,
    },
  };
}

/** An `mxPoint` carrying nothing but coordinates and the given role */
function isPlainPoint(node: XmlNode, as?: string): node is XmlElement {
  if (!isElement(node) || node.tag !== 'mxPoint' || node.children.length > 0) return false;
  if (getAttr(node, 'as') !== as) return false;
  return node.attributes.every(([key]) => key === 'x' || key === 'y' || key === 'as');
}

function isPointArray(node: XmlNode): node is XmlElement {
  return (
    isElement(node) &&
    node.tag === 'Array' &&
    node.attributes.length === 1 &&
    getAttr(node, 'as') === 'points' &&
    node.children.length > 0 &&
    node.children.every((c) => isPlainPoint(c))
  );
}

function decodePoint(node: XmlElement, path: string): Point {
  const coordinate = (name: string): number => {
    const raw = getAttr(node, name);
    return raw === undefined ? 0 : parseNumber(raw, name, path, node);
  };
  return { x: coordinate('x'), y: coordinate('y') };
}

function applyDanglingPolicy(pageId: string, elements: DiagramElement[], ctx: DecodeContext): DiagramElement[] {
  const ids = new Set(elements.map((e) => e.id));
  return elements.map((element) => {
    if (element.kind !== 'connector') return element;
    let next = element;
    for (const side of ['source', 'target'] as const) {
      const ref = side === 'source' ? next.sourceId : next.targetId;
      if (ref === null || ids.has(ref)) continue;
      const description = `connector "${element.id}" ${side} "${ref}" on page "${pageId}" does not resolve`;
      switch (ctx.policy) {
        case 'reject':
          throw new FormatError('UnresolvableReference', `Dangling reference: ${description}`);
        case 'detach':
          ctx.logger.warn(`Detached dangling reference: ${description}`);
          next = detachSide(next, side);
          break;
        case 'retain':
          ctx.logger.warn(`Keeping dangling reference: ${description}`);
          ctx.unresolved.push({ pageId, connectorId: element.id, side, ref });
          break;
      }
    }
    return next;
  });
}

function detachSide(connector: ConnectorElement, side: EndpointSide): ConnectorElement {
  return side === 'source' ? { ...connector, sourceId: null } : { ...connector, targetId: null };
}

function syncChildIds(page: Page): Page {
  const children = new Map<string, string[]>();
  for (const element of page.elements) {
    if (element.parentId === null) continue;
    children.set(element.parentId, [...(children.get(element.parentId) ?? []), element.id]);
  }
  return {
    ...page,
    elements: page.elements.map((e) => (e.kind === 'group' ? { ...e, childIds: children.get(e.id) ?? [] } : e)),
  };
}

function opaqueOf(node: XmlElement, known: readonly string[]): OpaqueFields {
  const attributes = node.attributes.filter(([key]) => !known.includes(key));
  if (attributes.length === 0 && node.children.length === 0) return EMPTY_OPAQUE;
  return { attributes, children: node.children };
}

// ── Encode ──────────────────────────────────────────────────────────────

export function encodeDiagram(diagram: Diagram, options: EncodeOptions = {}): string {
  const attributes: XmlAttribute[] = [['id', diagram.id], ['name', diagram.name]];
  if (diagram.version !== null) attributes.push(['version', diagram.version]);
  const pages = diagram.pages.map((page) => encodePage(page, options.compressed ?? false));
  const mxfile: XmlElement = {
    tag: 'mxfile',
    attributes: [...attributes, ...diagram.extras.attributes],
    children: [...pages, ...diagram.extras.children],
  };
  return buildXml([mxfile]);
}

function encodePage(page: Page, compressed: boolean): XmlElement {
  const model = encodeModel(page);
  const content: XmlNode = compressed ? { text: compressXml(buildXml([model])) } : model;
  return {
    tag: 'diagram',
    attributes: [['id', page.id], ['name', page.name], ...page.extras.page.attributes],
    children: [content, ...page.extras.page.children],
  };
}

function encodeModel(page: Page): XmlElement {
  const s = page.settings;
  const attributes: XmlAttribute[] = [['grid', s.grid ? '1' : '0'], ['gridSize', String(s.gridSize)]];
  if (s.background !== null) attributes.push(['background', s.background]);
  attributes.push(['pageWidth', String(s.pageWidth)], ['pageHeight', String(s.pageHeight)]);

  const cells: XmlElement[] = [];
  const rootCell = page.rootCell;
  if (rootCell) {
    cells.push(cellNode([['id', rootCell.id]], rootCell.extras));
    for (const layer of page.layers) {
      const attrs: XmlAttribute[] = [];
      if (!layer.wrapper) {
        attrs.push(['id', layer.id]);
        if (layer.label !== '') attrs.push(['value', layer.label]);
      }
      attrs.push(['parent', rootCell.id]);
      cells.push(wrapCell(layer, cellNode(attrs, layer.extras)));
    }
  }
  for (const element of page.elements) cells.push(encodeElement(element));

  const root: XmlElement = {
    tag: 'root',
    attributes: page.extras.root.attributes,
    children: [...cells, ...page.extras.root.children],
  };
  return {
    tag: 'mxGraphModel',
    attributes: [...attributes, ...page.extras.graphModel.attributes],
    children: [root, ...page.extras.graphModel.children],
  };
}

function cellNode(attributes: XmlAttribute[], extras: OpaqueFields): XmlElement {
  return { tag: 'mxCell', attributes: [...attributes, ...extras.attributes], children: extras.children };
}

function encodeElement(element: DiagramElement): XmlElement {
  const attributes: XmlAttribute[] = [];
  if (!element.wrapper) attributes.push(['id', element.id], ['value', element.label]);
  const style = serializeStyle(element.style);
  if (style !== '') attributes.push(['style', style]);
  attributes.push(element.kind === 'connector' ? ['edge', '1'] : ['vertex', '1']);
  attributes.push(['parent', element.parentId ?? element.layerId]);
  if (element.kind === 'connector') {
    if (element.sourceId !== null) attributes.push(['source', element.sourceId]);
    if (element.targetId !== null) attributes.push(['target', element.targetId]);
  }
  if (!element.visible) attributes.push(['visible', '0']);
  if (element.kind === 'group' && element.collapsed) attributes.push(['collapsed', '1']);

  const cell: XmlElement = {
    tag: 'mxCell',
    attributes: [...attributes, ...element.extras.attributes],
    children: [encodeGeometry(element.geometry), ...element.extras.children],
  };
  return wrapCell(element, cell);
}

/** Put a cell back inside its `UserObject`/`object` wrapper, if it had one */
function wrapCell(owner: { id: string; label: string; wrapper: CellWrapper | null }, cell: XmlElement): XmlElement {
  if (!owner.wrapper) return cell;
  return {
    tag: owner.wrapper.tag,
    attributes: [['label', owner.label], ...owner.wrapper.attributes, ['id', owner.id]],
    children: [cell, ...owner.wrapper.children],
  };
}

function encodeGeometry(g: Geometry): XmlElement {
  const attributes: XmlAttribute[] = [];
  if (g.x !== 0) attributes.push(['x', String(g.x)]);
  if (g.y !== 0) attributes.push(['y', String(g.y)]);
  if (g.width !== 0) attributes.push(['width', String(g.width)]);
  if (g.height !== 0) attributes.push(['height', String(g.height)]);
  if (g.relative) attributes.push(['relative', '1']);
  attributes.push(...g.extras.attributes, ['as', 'geometry']);

  const children: XmlNode[] = [];
  if (g.sourcePoint) children.push(pointNode(g.sourcePoint, 'sourcePoint'));
  if (g.targetPoint) children.push(pointNode(g.targetPoint, 'targetPoint'));
  if (g.points.length > 0) {
    children.push({ tag: 'Array', attributes: [['as', 'points']], children: g.points.map((p) => pointNode(p)) });
  }
  return { tag: 'mxGeometry', attributes, children: [...children, ...g.extras.children] };
}

function pointNode(p: Point, as?: string): XmlElement {
  const attributes: XmlAttribute[] = [];
  if (p.x !== 0) attributes.push(['x', String(p.x)]);
  if (p.y !== 0) attributes.push(['y', String(p.y)]);
  if (as !== undefined) attributes.push(['as', as]);
  return { tag: 'mxPoint', attributes, children: [] };
}

// ── Byte-level API ──────────────────────────────────────────────────────

export function open(bytes: Uint8Array | string, options: DecodeOptions = {}): Diagram {
  return decodeDiagram(bytes, options).diagram;
}

export function save(diagram: Diagram, compressed = false): Uint8Array {
  return new TextEncoder().encode(encodeDiagram(diagram, { compressed }));
}
