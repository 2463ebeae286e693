/**
 * Diagram document model.
 *
 * Elements are a tagged union over `kind` with a shared attribute set.
 * Every record is immutable: mutations build new records and share the
 * untouched ones, which lets history keep whole-document snapshots cheaply.
 *
 * Ownership is flat: a page owns all its elements. Group membership, connector
 * endpoints and attached connector labels are id references resolved through
 * the owning page.
 */

import { getStyleValue, isStyleFlagSet, withStyleFlag, type Style } from './style.js';
import { centerOf, type Geometry, type Point, type Rect } from './geometry.js';
import type { OpaqueFields, XmlAttribute } from './xml.js';

export const DELETE_POLICIES = ['detach', 'cascade'] as const;
/** What happens to connectors attached to a removed element */
export type DeletePolicy = (typeof DELETE_POLICIES)[number];

export const DANGLING_POLICIES = ['retain', 'detach', 'reject'] as const;
/** How the codec treats connector endpoints that do not resolve in their page */
export type DanglingPolicy = (typeof DANGLING_POLICIES)[number];

export type EndpointSide = 'source' | 'target';

/** `UserObject` / `object` node wrapping a cell that carries custom properties */
export interface CellWrapper {
  readonly tag: string;
  readonly attributes: readonly XmlAttribute[];
  readonly children: OpaqueFields['children'];
}

interface ElementBase {
  readonly id: string;
  readonly label: string;
  readonly geometry: Geometry;
  readonly style: Style;
  /** Owning group (or connector, for attached labels); null when directly in a layer */
  readonly parentId: string | null;
  readonly layerId: string;
  readonly visible: boolean;
  /** Mirrors the `locked` style key */
  readonly locked: boolean;
  readonly wrapper: CellWrapper | null;
  /** Unknown mxCell attributes and child nodes */
  readonly extras: OpaqueFields;
}

export interface ShapeElement extends ElementBase {
  readonly kind: 'shape';
  /** Derived from the style: `shape=…`, a known bare flag, or `rectangle` */
  readonly shapeType: string;
}

export interface ConnectorElement extends ElementBase {
  readonly kind: 'connector';
  readonly sourceId: string | null;
  readonly targetId: string | null;
  /** Derived from the style: `edgeStyle=…`, `curved`, or `straight` */
  readonly routing: string;
}

export interface GroupElement extends ElementBase {
  readonly kind: 'group';
  /** Ids of elements whose parent is this group, in z-order */
  readonly childIds: readonly string[];
  readonly collapsed: boolean;
}

export type DiagramElement = ShapeElement | ConnectorElement | GroupElement;

export type ElementKind = DiagramElement['kind'];

export interface RootCell {
  readonly id: string;
  readonly extras: OpaqueFields;
}

export interface Layer {
  readonly id: string;
  readonly label: string;
  readonly wrapper: CellWrapper | null;
  readonly extras: OpaqueFields;
}

export interface PageSettings {
  readonly grid: boolean;
  readonly gridSize: number;
  readonly background: string | null;
  readonly pageWidth: number;
  readonly pageHeight: number;
}

export interface PageExtras {
  /** Unknown attributes/children of the `diagram` node */
  readonly page: OpaqueFields;
  /** Unknown attributes/children of `mxGraphModel` */
  readonly graphModel: OpaqueFields;
  /** Unknown attributes/children of `root` that are not cells */
  readonly root: OpaqueFields;
}

export interface Page {
  readonly id: string;
  readonly name: string;
  readonly settings: PageSettings;
  readonly rootCell: RootCell | null;
  readonly layers: readonly Layer[];
  /** Array order is z-order */
  readonly elements: readonly DiagramElement[];
  readonly extras: PageExtras;
}

export interface Diagram {
  readonly id: string;
  readonly name: string;
  readonly version: string | null;
  readonly pages: readonly Page[];
  /** Unknown attributes/children of `mxfile` */
  readonly extras: OpaqueFields;
}

export const DEFAULT_PAGE_SETTINGS: PageSettings = {
  grid: true,
  gridSize: 10,
  background: null,
  pageWidth: 1169,
  pageHeight: 827,
};

export const DEFAULT_DIAGRAM_NAME = 'Untitled Diagram';

// ── Derived attributes ─────────────────────────────────────────────────

/** Bare style flags that select a built-in draw.io shape */
const SHAPE_FLAGS = new Set([
  'ellipse', 'rhombus', 'triangle', 'swimlane', 'text', 'image', 'label', 'line',
  'cylinder', 'doubleEllipse', 'hexagon', 'cloud', 'actor', 'arrow',
]);

export function shapeTypeOf(style: Style): string {
  const shape = getStyleValue(style, 'shape');
  if (typeof shape === 'string' && shape !== '') return shape;
  for (const { key, value } of style.entries) {
    if (value === true && SHAPE_FLAGS.has(key)) return key;
  }
  return 'rectangle';
}

export function routingOf(style: Style): string {
  const edgeStyle = getStyleValue(style, 'edgeStyle');
  if (typeof edgeStyle === 'string' && edgeStyle !== '' && edgeStyle !== 'none') return edgeStyle;
  if (isStyleFlagSet(style, 'curved')) return 'curved';
  return 'straight';
}

/** Recompute the attributes that mirror style keys */
export function withStyle(element: DiagramElement, style: Style): DiagramElement {
  const locked = isStyleFlagSet(style, 'locked');
  switch (element.kind) {
    case 'shape':
      return { ...element, style, locked, shapeType: shapeTypeOf(style) };
    case 'connector':
      return { ...element, style, locked, routing: routingOf(style) };
    case 'group':
      return { ...element, style: withStyleFlag(style, 'group'), locked };
  }
}

// ── Queries ────────────────────────────────────────────────────────────

export function findElement(page: Page, id: string): DiagramElement | undefined {
  return page.elements.find((e) => e.id === id);
}

export function findPage(diagram: Diagram, id: string): Page | undefined {
  return diagram.pages.find((p) => p.id === id);
}

/** z-order index of an element, or -1 */
export function zIndexOf(page: Page, id: string): number {
  return page.elements.findIndex((e) => e.id === id);
}

/** Every id in use on the page: root cell, layers and elements */
export function pageCellIds(page: Page): Set<string> {
  const ids = new Set<string>();
  if (page.rootCell) ids.add(page.rootCell.id);
  for (const layer of page.layers) ids.add(layer.id);
  for (const element of page.elements) ids.add(element.id);
  return ids;
}

export function isConnector(element: DiagramElement | undefined): element is ConnectorElement {
  return element?.kind === 'connector';
}

export function isGroup(element: DiagramElement | undefined): element is GroupElement {
  return element?.kind === 'group';
}

/** Ids of the element's ancestors, nearest first */
export function ancestorsOf(page: Page, id: string): string[] {
  const byId = new Map(page.elements.map((e) => [e.id, e]));
  const chain: string[] = [];
  const seen = new Set<string>([id]);
  let parentId = byId.get(id)?.parentId ?? null;
  while (parentId !== null && !seen.has(parentId)) {
    chain.push(parentId);
    seen.add(parentId);
    parentId = byId.get(parentId)?.parentId ?? null;
  }
  return chain;
}

/** The element's descendants (group members, attached labels), in z-order */
export function descendantsOf(page: Page, id: string): string[] {
  const found = new Set<string>([id]);
  let grew = true;
  while (grew) {
    grew = false;
    for (const element of page.elements) {
      if (element.parentId !== null && found.has(element.parentId) && !found.has(element.id)) {
        found.add(element.id);
        grew = true;
      }
    }
  }
  return page.elements.filter((e) => e.id !== id && found.has(e.id)).map((e) => e.id);
}

/**
 * Where `moveElement` places an element: its x/y, or for a connector its
 * first routing point (free source point, else first waypoint, else free
 * target point). A connector without such points has no position.
 */
export function positionOf(element: DiagramElement): Point | null {
  const g = element.geometry;
  if (element.kind !== 'connector') return { x: g.x, y: g.y };
  return g.sourcePoint ?? g.points[0] ?? g.targetPoint;
}

/**
 * Origin of a container's coordinate space in page coordinates. Groups
 * translate their members; connectors (for attached labels) do not.
 */
export function originOf(page: Page, containerId: string | null): Point {
  let x = 0;
  let y = 0;
  const seen = new Set<string>();
  let current = containerId;
  while (current !== null && !seen.has(current)) {
    seen.add(current);
    const container = findElement(page, current);
    if (!container) break;
    if (container.kind === 'group') {
      x += container.geometry.x;
      y += container.geometry.y;
    }
    current = container.parentId;
  }
  return { x, y };
}

/** Bounds of an element in page coordinates */
export function absoluteBounds(page: Page, element: DiagramElement): Rect {
  const origin = originOf(page, element.parentId);
  const g = element.geometry;
  return { x: g.x + origin.x, y: g.y + origin.y, width: g.width, height: g.height };
}

export function absoluteCenter(page: Page, element: DiagramElement): Point {
  return centerOf(absoluteBounds(page, element));
}

export interface DanglingEndpoint {
  readonly connectorId: string;
  readonly side: EndpointSide;
  /** The id the endpoint names, kept verbatim */
  readonly ref: string;
}

/** Connector endpoints whose id does not resolve to an element of the page */
export function danglingEndpoints(page: Page): DanglingEndpoint[] {
  const ids = new Set(page.elements.map((e) => e.id));
  const result: DanglingEndpoint[] = [];
  for (const element of page.elements) {
    if (element.kind !== 'connector') continue;
    if (element.sourceId !== null && !ids.has(element.sourceId)) {
      result.push({ connectorId: element.id, side: 'source', ref: element.sourceId });
    }
    if (element.targetId !== null && !ids.has(element.targetId)) {
      result.push({ connectorId: element.id, side: 'target', ref: element.targetId });
    }
  }
  return result;
}

/**
 * Structural problems on a page. Dangling connector endpoints are reported
 * separately by `danglingEndpoints` and are not listed here.
 */
export function checkPageInvariants(page: Page): string[] {
  const problems: string[] = [];
  const seen = new Set<string>();
  const cellIds = [
    ...(page.rootCell ? [page.rootCell.id] : []),
    ...page.layers.map((l) => l.id),
    ...page.elements.map((e) => e.id),
  ];
  for (const id of cellIds) {
    if (seen.has(id)) problems.push(`duplicate id "${id}"`);
    seen.add(id);
  }

  const byId = new Map(page.elements.map((e) => [e.id, e]));
  const layerIds = new Set(page.layers.map((l) => l.id));
  for (const element of page.elements) {
    if (!layerIds.has(element.layerId)) {
      problems.push(`element "${element.id}" is in unknown layer "${element.layerId}"`);
    }
    if (element.parentId !== null) {
      const parent = byId.get(element.parentId);
      if (!parent || parent.kind === 'shape') {
        problems.push(`element "${element.id}" has invalid parent "${element.parentId}"`);
      } else if (parent.layerId !== element.layerId) {
        problems.push(`element "${element.id}" is not in the layer of its parent "${parent.id}"`);
      }
    }
    if (hasParentCycle(byId, element.id)) {
      problems.push(`element "${element.id}" is part of a containment cycle`);
    }
    if (element.kind === 'group') {
      const expected = page.elements.filter((e) => e.parentId === element.id).map((e) => e.id);
      if (expected.join('\u0000') !== element.childIds.join('\u0000')) {
        problems.push(`group "${element.id}" child list is out of sync`);
      }
    }
  }
  return problems;
}

function hasParentCycle(byId: Map<string, DiagramElement>, id: string): boolean {
  const seen = new Set<string>();
  let current: string | null = id;
  while (current !== null) {
    if (seen.has(current)) return true;
    seen.add(current);
    current = byId.get(current)?.parentId ?? null;
  }
  return false;
}

const ID_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

export function generateId(): string {
  let result = '';
  for (let i = 0; i < 20; i++) {
    result += ID_CHARS.charAt(Math.floor(Math.random() * ID_CHARS.length));
  }
  return result;
}
