/**
 * Validated, pure page and diagram transforms.
 *
 * Each function either returns a new record or throws
 * `InvariantViolationError` without touching its input, so a caller that
 * commits only returned records never exposes a partial mutation.
 */

import { InvariantViolationError, type InvariantReason } from './errors.js';
import {
  boundsOfPoints,
  translateGeometry,
  translateRoute,
  unionRects,
  type Geometry,
  type Point,
  type Rect,
} from './geometry.js';
import {
  absoluteCenter,
  ancestorsOf,
  DEFAULT_PAGE_SETTINGS,
  descendantsOf,
  findElement,
  findPage,
  originOf,
  pageCellIds,
  positionOf,
  withStyle,
  zIndexOf,
  type ConnectorElement,
  type DeletePolicy,
  type Diagram,
  type DiagramElement,
  type EndpointSide,
  type GroupElement,
  type Page,
  type PageSettings,
} from './model.js';
import { EMPTY_OPAQUE } from './xml.js';
import { withStyleFlag, type Style } from './style.js';

function fail(reason: InvariantReason, message: string, ids: string[] = []): never {
  throw new InvariantViolationError(reason, message, ids);
}

export function requireElement(page: Page, id: string): DiagramElement {
  const element = findElement(page, id);
  if (!element) fail('unknown-id', `Element "${id}" not found on page "${page.id}"`, [id]);
  return element;
}

export function requireConnector(page: Page, id: string): ConnectorElement {
  const element = requireElement(page, id);
  if (element.kind !== 'connector') fail('scope', `Element "${id}" is not a connector`, [id]);
  return element;
}

export function requireGroup(page: Page, id: string): GroupElement {
  const element = requireElement(page, id);
  if (element.kind !== 'group') fail('scope', `Element "${id}" is not a group`, [id]);
  return element;
}

function requireFinite(values: Record<string, number>): void {
  for (const [name, value] of Object.entries(values)) {
    if (!Number.isFinite(value)) fail('invalid-value', `${name} must be a finite number, got ${value}`);
  }
}

function requirePoints(points: readonly Point[]): void {
  points.forEach((p, i) => requireFinite({ [`point[${i}].x`]: p.x, [`point[${i}].y`]: p.y }));
}

/** Keep every group's child list equal to the elements that name it as parent */
function syncGroupChildren(elements: readonly DiagramElement[]): DiagramElement[] {
  const children = new Map<string, string[]>();
  for (const element of elements) {
    if (element.parentId === null) continue;
    const list = children.get(element.parentId) ?? [];
    list.push(element.id);
    children.set(element.parentId, list);
  }
  return elements.map((element) => {
    if (element.kind !== 'group') return element;
    const ids = children.get(element.id) ?? [];
    const same = ids.length === element.childIds.length && ids.every((id, i) => element.childIds[i] === id);
    const synced = same ? element : { ...element, childIds: ids };
    if (ids.length > 0) return synced;
    // Without members only the flag marks a group in the file
    const style = withStyleFlag(synced.style, 'group');
    return style === synced.style ? synced : { ...synced, style };
  });
}

function withElements(page: Page, elements: readonly DiagramElement[]): Page {
  return { ...page, elements: syncGroupChildren(elements) };
}

function updateElement(page: Page, id: string, update: (element: DiagramElement) => DiagramElement): Page {
  const index = zIndexOf(page, id);
  if (index === -1) fail('unknown-id', `Element "${id}" not found on page "${page.id}"`, [id]);
  const elements = [...page.elements];
  elements[index] = update(page.elements[index]);
  return { ...page, elements };
}

function requireResolvable(page: Page, connectorId: string, ref: string): void {
  if (ref === connectorId) fail('detached-reference', `Connector "${connectorId}" cannot connect to itself`, [connectorId]);
  if (!findElement(page, ref)) {
    fail('detached-reference', `Connector "${connectorId}" endpoint "${ref}" does not exist on page "${page.id}"`, [connectorId, ref]);
  }
}

// ── Elements ───────────────────────────────────────────────────────────

export function insertElement(page: Page, element: DiagramElement, index = page.elements.length): Page {
  if (pageCellIds(page).has(element.id)) {
    fail('id-collision', `Duplicate ID "${element.id}": an element with this ID already exists on page "${page.id}"`, [element.id]);
  }
  if (!page.layers.some((l) => l.id === element.layerId)) {
    fail('scope', `Layer "${element.layerId}" does not exist on page "${page.id}"`, [element.id]);
  }
  if (element.parentId !== null) {
    const parent = findElement(page, element.parentId);
    if (!parent) fail('detached-reference', `Parent "${element.parentId}" does not exist`, [element.id, element.parentId]);
    if (parent.kind === 'shape') fail('scope', `Parent "${parent.id}" is not a group or connector`, [element.id, parent.id]);
    if (parent.layerId !== element.layerId) fail('scope', `Element "${element.id}" must be in the layer of its parent`, [element.id]);
  }
  if (element.kind === 'connector') {
    if (element.sourceId !== null) requireResolvable(page, element.id, element.sourceId);
    if (element.targetId !== null) requireResolvable(page, element.id, element.targetId);
  }
  const g = element.geometry;
  requireFinite({ x: g.x, y: g.y, width: g.width, height: g.height });
  requirePoints(g.points);
  if (g.width < 0 || g.height < 0) fail('invalid-value', 'Width and height must not be negative', [element.id]);
  if (!Number.isInteger(index) || index < 0 || index > page.elements.length) {
    fail('invalid-value', `Z-order index ${index} is out of range 0..${page.elements.length}`, [element.id]);
  }

  const elements = [...page.elements];
  elements.splice(index, 0, element);
  return withElements(page, elements);
}

/**
 * Set the element's position. A connector's route follows its first routing
 * point; one without routing points stays put.
 */
export function moveElement(page: Page, id: string, position: Point): Page {
  requireFinite({ x: position.x, y: position.y });
  return updateElement(page, id, (element) => {
    if (element.kind === 'connector') {
      const anchor = positionOf(element);
      if (!anchor) return element;
      return { ...element, geometry: translateRoute(element.geometry, position.x - anchor.x, position.y - anchor.y) };
    }
    return { ...element, geometry: { ...element.geometry, x: position.x, y: position.y } };
  });
}

/** Move an element by an offset, keeping a connector's label placement */
function shiftElement(element: DiagramElement, dx: number, dy: number): Geometry {
  return element.kind === 'connector'
    ? translateRoute(element.geometry, dx, dy)
    : translateGeometry(element.geometry, dx, dy);
}

export function resizeElement(page: Page, id: string, width: number, height: number): Page {
  requireFinite({ width, height });
  if (width < 0 || height < 0) fail('invalid-value', 'Width and height must not be negative', [id]);
  if (requireElement(page, id).kind === 'connector') fail('scope', `Connector "${id}" cannot be resized`, [id]);
  return updateElement(page, id, (element) => ({ ...element, geometry: { ...element.geometry, width, height } }));
}

export function restyleElement(page: Page, id: string, style: Style): Page {
  return updateElement(page, id, (element) => withStyle(element, style));
}

export function relabelElement(page: Page, id: string, label: string): Page {
  return updateElement(page, id, (element) => ({ ...element, label }));
}

export function setElementVisibility(page: Page, id: string, visible: boolean): Page {
  return updateElement(page, id, (element) => ({ ...element, visible }));
}

export function setGroupCollapsed(page: Page, id: string, collapsed: boolean): Page {
  requireGroup(page, id);
  return updateElement(page, id, (element) => (element.kind === 'group' ? { ...element, collapsed } : element));
}

export function reorderElement(page: Page, id: string, index: number): Page {
  const from = zIndexOf(page, id);
  if (from === -1) fail('unknown-id', `Element "${id}" not found on page "${page.id}"`, [id]);
  if (!Number.isInteger(index) || index < 0 || index >= page.elements.length) {
    fail('invalid-value', `Z-order index ${index} is out of range 0..${page.elements.length - 1}`, [id]);
  }
  const elements = [...page.elements];
  const [moved] = elements.splice(from, 1);
  elements.splice(index, 0, moved);
  return withElements(page, elements);
}

// ── Connectors ─────────────────────────────────────────────────────────

/** Point where a detached endpoint stays: the terminal's centre, in the connector's coordinate space */
function pinPoint(page: Page, connector: ConnectorElement, terminal: DiagramElement): Point {
  const center = absoluteCenter(page, terminal);
  const origin = originOf(page, connector.parentId);
  return { x: center.x - origin.x, y: center.y - origin.y };
}

function withEndpoint(connector: ConnectorElement, side: EndpointSide, ref: string | null, point: Point | null): ConnectorElement {
  return side === 'source'
    ? { ...connector, sourceId: ref, geometry: { ...connector.geometry, sourcePoint: point } }
    : { ...connector, targetId: ref, geometry: { ...connector.geometry, targetPoint: point } };
}

/** Attach one endpoint of a connector to an existing element */
export function reconnectEndpoint(page: Page, connectorId: string, side: EndpointSide, ref: string): Page {
  const connector = requireConnector(page, connectorId);
  requireResolvable(page, connectorId, ref);
  return updateElement(page, connectorId, () => withEndpoint(connector, side, ref, null));
}

/** Float one endpoint, pinned where its terminal was */
export function disconnectEndpoint(page: Page, connectorId: string, side: EndpointSide): Page {
  const connector = requireConnector(page, connectorId);
  const ref = side === 'source' ? connector.sourceId : connector.targetId;
  if (ref === null) return page;
  const terminal = findElement(page, ref);
  const current = side === 'source' ? connector.geometry.sourcePoint : connector.geometry.targetPoint;
  const point = terminal ? pinPoint(page, connector, terminal) : current;
  return updateElement(page, connectorId, () => withEndpoint(connector, side, null, point));
}

export function setWaypoints(page: Page, connectorId: string, points: readonly Point[]): Page {
  const connector = requireConnector(page, connectorId);
  requirePoints(points);
  return updateElement(page, connectorId, () => ({ ...connector, geometry: { ...connector.geometry, points: [...points] } }));
}

// ── Groups ─────────────────────────────────────────────────────────────

function boundsOf(element: DiagramElement): Rect | null {
  const g = element.geometry;
  if (element.kind !== 'connector') return { x: g.x, y: g.y, width: g.width, height: g.height };
  const points = [...g.points];
  if (g.sourcePoint) points.push(g.sourcePoint);
  if (g.targetPoint) points.push(g.targetPoint);
  return boundsOfPoints(points);
}

function relayer(elements: DiagramElement[], ids: ReadonlySet<string>, layerId: string): void {
  for (let i = 0; i < elements.length; i++) {
    if (ids.has(elements[i].id) && elements[i].layerId !== layerId) {
      elements[i] = { ...elements[i], layerId };
    }
  }
}

/** Wrap elements sharing a parent into a new group sized to their bounds */
export function groupElements(page: Page, ids: readonly string[], group: GroupElement): Page {
  if (ids.length === 0) fail('invalid-value', 'A group needs at least one member');
  if (new Set(ids).size !== ids.length) fail('invalid-value', 'Group members must be distinct', [...ids]);
  if (pageCellIds(page).has(group.id)) {
    fail('id-collision', `Duplicate ID "${group.id}": an element with this ID already exists on page "${page.id}"`, [group.id]);
  }
  const members = ids.map((id) => requireElement(page, id));
  const { parentId, layerId } = members[0];
  for (const member of members) {
    if (member.parentId !== parentId || member.layerId !== layerId) {
      fail('scope', 'Group members must share the same parent and layer', [...ids]);
    }
  }
  if (parentId !== null && findElement(page, parentId)?.kind === 'connector') {
    fail('scope', 'Connector labels cannot be grouped', [...ids]);
  }

  const rects = members.map(boundsOf).filter((r): r is Rect => r !== null);
  const bounds = unionRects(rects) ?? { x: 0, y: 0, width: 0, height: 0 };
  const memberIds = new Set(ids);
  const elements = page.elements.map((element): DiagramElement =>
    memberIds.has(element.id)
      ? { ...element, parentId: group.id, geometry: shiftElement(element, -bounds.x, -bounds.y) }
      : element,
  );
  const newGroup: GroupElement = {
    ...group,
    parentId,
    layerId,
    childIds: [],
    geometry: { ...group.geometry, x: bounds.x, y: bounds.y, width: bounds.width, height: bounds.height },
  };
  const index = Math.min(...ids.map((id) => zIndexOf(page, id)));
  elements.splice(index, 0, newGroup);
  return withElements(page, elements);
}

/** Move elements into an existing group, keeping their page position */
export function addToGroup(page: Page, groupId: string, ids: readonly string[]): Page {
  const group = requireGroup(page, groupId);
  if (ids.length === 0) fail('invalid-value', 'No elements given');
  const ancestors = new Set(ancestorsOf(page, groupId));
  for (const id of ids) {
    const member = requireElement(page, id);
    if (id === groupId || ancestors.has(id)) {
      fail('group-cycle', `Adding "${id}" to group "${groupId}" would make the group contain itself`, [groupId, id]);
    }
    if (member.parentId !== null && findElement(page, member.parentId)?.kind === 'connector') {
      fail('scope', `Connector label "${id}" cannot be grouped`, [id]);
    }
  }

  const target = originOf(page, groupId);
  const moving = new Set(ids.filter((id) => requireElement(page, id).parentId !== groupId));
  const relayered = new Set<string>();
  const elements = page.elements.map((element): DiagramElement => {
    if (!moving.has(element.id)) return element;
    const from = originOf(page, element.parentId);
    relayered.add(element.id);
    for (const d of descendantsOf(page, element.id)) relayered.add(d);
    return {
      ...element,
      parentId: groupId,
      geometry: shiftElement(element, from.x - target.x, from.y - target.y),
    };
  });
  relayer(elements, relayered, group.layerId);
  return withElements(page, elements);
}

/** Lift group members to the group's parent, keeping their page position */
export function removeFromGroup(page: Page, ids: readonly string[]): Page {
  const lifted = new Map<string, GroupElement>();
  for (const id of ids) {
    const member = requireElement(page, id);
    const parent = member.parentId === null ? undefined : findElement(page, member.parentId);
    if (!parent || parent.kind !== 'group') fail('scope', `Element "${id}" is not in a group`, [id]);
    lifted.set(id, parent);
  }
  const elements = page.elements.map((element): DiagramElement => {
    const group = lifted.get(element.id);
    if (!group) return element;
    return {
      ...element,
      parentId: group.parentId,
      geometry: shiftElement(element, group.geometry.x, group.geometry.y),
    };
  });
  return withElements(page, elements);
}

export interface RemovalResult {
  readonly page: Page;
  readonly removed: string[];
  /** Connectors whose endpoints were detached */
  readonly detached: string[];
}

/**
 * Remove an element with its descendants. Connectors attached to anything
 * removed are either detached (endpoint nulled and pinned) or removed too.
 */
export function removeElement(page: Page, id: string, policy: DeletePolicy): RemovalResult {
  requireElement(page, id);
  const removed = new Set<string>([id, ...descendantsOf(page, id)]);

  if (policy === 'cascade') {
    let grew = true;
    while (grew) {
      grew = false;
      for (const element of page.elements) {
        if (element.kind !== 'connector' || removed.has(element.id)) continue;
        const hit =
          (element.sourceId !== null && removed.has(element.sourceId)) ||
          (element.targetId !== null && removed.has(element.targetId));
        if (hit) {
          removed.add(element.id);
          for (const d of descendantsOf(page, element.id)) removed.add(d);
          grew = true;
        }
      }
    }
  }

  const detached: string[] = [];
  const elements: DiagramElement[] = [];
  for (const element of page.elements) {
    if (removed.has(element.id)) continue;
    if (element.kind !== 'connector') {
      elements.push(element);
      continue;
    }
    let next = element;
    for (const side of ['source', 'target'] as const) {
      const ref = side === 'source' ? next.sourceId : next.targetId;
      if (ref === null || !removed.has(ref)) continue;
      const terminal = findElement(page, ref);
      next = withEndpoint(next, side, null, terminal ? pinPoint(page, element, terminal) : null);
    }
    if (next !== element) detached.push(element.id);
    elements.push(next);
  }

  const order = page.elements.map((e) => e.id).filter((e) => removed.has(e));
  return { page: withElements(page, elements), removed: order, detached };
}

/** Dissolve a group: members move to its parent, the group is removed */
export function ungroupElement(page: Page, groupId: string): { page: Page; childIds: string[] } {
  const group = requireGroup(page, groupId);
  const childIds = [...group.childIds];
  const lifted = childIds.length > 0 ? removeFromGroup(page, childIds) : page;
  return { page: removeElement(lifted, groupId, 'detach').page, childIds };
}

// ── Pages ──────────────────────────────────────────────────────────────

export function createPage(id: string, name: string): Page {
  return {
    id,
    name,
    settings: DEFAULT_PAGE_SETTINGS,
    rootCell: { id: '0', extras: EMPTY_OPAQUE },
    layers: [{ id: '1', label: '', wrapper: null, extras: EMPTY_OPAQUE }],
    elements: [],
    extras: { page: EMPTY_OPAQUE, graphModel: EMPTY_OPAQUE, root: EMPTY_OPAQUE },
  };
}

export function requirePage(diagram: Diagram, pageId: string): Page {
  const page = findPage(diagram, pageId);
  if (!page) fail('unknown-id', `Page "${pageId}" not found`, [pageId]);
  return page;
}

export function replacePage(diagram: Diagram, page: Page): Diagram {
  const index = diagram.pages.findIndex((p) => p.id === page.id);
  if (index === -1) fail('unknown-id', `Page "${page.id}" not found`, [page.id]);
  const pages = [...diagram.pages];
  pages[index] = page;
  return { ...diagram, pages };
}

export function insertPage(diagram: Diagram, page: Page, index = diagram.pages.length): Diagram {
  if (findPage(diagram, page.id)) fail('id-collision', `Duplicate page ID "${page.id}"`, [page.id]);
  if (!Number.isInteger(index) || index < 0 || index > diagram.pages.length) {
    fail('invalid-value', `Page index ${index} is out of range 0..${diagram.pages.length}`, [page.id]);
  }
  const pages = [...diagram.pages];
  pages.splice(index, 0, page);
  return { ...diagram, pages };
}

export function removePage(diagram: Diagram, pageId: string): Diagram {
  requirePage(diagram, pageId);
  if (diagram.pages.length === 1) fail('scope', 'A diagram must keep at least one page', [pageId]);
  return { ...diagram, pages: diagram.pages.filter((p) => p.id !== pageId) };
}

export function movePage(diagram: Diagram, pageId: string, index: number): Diagram {
  const page = requirePage(diagram, pageId);
  if (!Number.isInteger(index) || index < 0 || index >= diagram.pages.length) {
    fail('invalid-value', `Page index ${index} is out of range 0..${diagram.pages.length - 1}`, [pageId]);
  }
  const pages = diagram.pages.filter((p) => p.id !== pageId);
  pages.splice(index, 0, page);
  return { ...diagram, pages };
}

export function updatePageSettings(page: Page, settings: Partial<PageSettings>): Page {
  const next = { ...page.settings, ...settings };
  requireFinite({ gridSize: next.gridSize, pageWidth: next.pageWidth, pageHeight: next.pageHeight });
  if (next.gridSize <= 0 || next.pageWidth <= 0 || next.pageHeight <= 0) {
    fail('invalid-value', 'Grid size and page dimensions must be positive', [page.id]);
  }
  return { ...page, settings: next };
}
