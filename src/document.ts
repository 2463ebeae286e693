import { InvariantViolationError, isDiagramError, ReentrantMutationError, type DiagramError } from './errors.js';
import { createGeometry, type Point } from './geometry.js';
import {
  checkPageInvariants,
  danglingEndpoints,
  DEFAULT_DIAGRAM_NAME,
  findElement,
  generateId,
  routingOf,
  shapeTypeOf,
  type ConnectorElement,
  type DanglingEndpoint,
  type DeletePolicy,
  type Diagram,
  type DiagramElement,
  type EndpointSide,
  type GroupElement,
  type Page,
  type PageSettings,
  type ShapeElement,
} from './model.js';
import * as ops from './mutations.js';
import { ChangeBus, type ChangeEvent, type ChangeKind, type ChangeObserver, type ChangeOrigin } from './events.js';
import {
  isStyleFlagSet,
  joinStyleText,
  parseStyle,
  setStyleValues,
  withStyleFlag,
  type Style,
  type StylePatch,
  type StyleRegistry,
} from './style.js';
import { buildConnectionStyle, createDefaultRegistry, DEFAULT_GEOMETRY, GROUP_STYLE, SHAPE_STYLES } from './styles.js';
import { silentLogger, type Logger } from './log.js';
import { EMPTY_OPAQUE } from './xml.js';

export interface ShapeInput {
  id?: string;
  /** `group` creates an empty group container */
  kind?: 'shape' | 'group';
  label?: string;
  /** Registered style name, e.g. `ellipse` or `cylinder` */
  preset?: string;
  /** Inline style, appended after the preset */
  style?: string;
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  parentId?: string | null;
  layerId?: string;
  /** z-order position; defaults to the top */
  index?: number;
}

export interface ConnectInput {
  id?: string;
  sourceId: string | null;
  targetId: string | null;
  label?: string;
  preset?: string;
  style?: string;
  /** Named connection point on the source, e.g. `right` */
  exitPoint?: string;
  /** Named connection point on the target, e.g. `left` */
  entryPoint?: string;
  waypoints?: Point[];
  sourcePoint?: Point;
  targetPoint?: Point;
  parentId?: string | null;
  layerId?: string;
  index?: number;
}

export interface GroupInput {
  id?: string;
  label?: string;
  style?: string;
}

export interface PageInput {
  id?: string;
  name?: string;
  index?: number;
}

export interface RemovalSummary {
  readonly removed: string[];
  readonly detached: string[];
}

export interface DocumentOptions {
  registry?: StyleRegistry;
  deletePolicy?: DeletePolicy;
  logger?: Logger;
}

export function createDiagram(name = DEFAULT_DIAGRAM_NAME, pageName = 'Page-1'): Diagram {
  return {
    id: generateId(),
    name,
    version: null,
    pages: [ops.createPage(generateId(), pageName)],
    extras: EMPTY_OPAQUE,
  };
}

type Change = Omit<ChangeEvent, 'origin'>;

/**
 * The single owner of a diagram's state. Every mutation goes through a
 * validated transform and is committed whole, then announced with exactly
 * one change event.
 */
export class DiagramDocument {
  readonly registry: StyleRegistry;
  readonly deletePolicy: DeletePolicy;
  private readonly bus = new ChangeBus();
  private readonly logger: Logger;
  private state: Diagram;
  private deferred: Change[] | null = null;
  private previewing = 0;

  constructor(diagram: Diagram = createDiagram(), options: DocumentOptions = {}) {
    this.state = diagram;
    this.registry = options.registry ?? createDefaultRegistry();
    this.deletePolicy = options.deletePolicy ?? 'detach';
    this.logger = options.logger ?? silentLogger;
  }

  get diagram(): Diagram {
    return this.state;
  }

  getPage(pageId: string): Page {
    return ops.requirePage(this.state, pageId);
  }

  getElement(pageId: string, id: string): DiagramElement {
    return ops.requireElement(this.getPage(pageId), id);
  }

  danglingEndpoints(pageId: string): DanglingEndpoint[] {
    return danglingEndpoints(this.getPage(pageId));
  }

  /** Structural problems across all pages, prefixed with the page id */
  checkInvariants(): string[] {
    const problems: string[] = [];
    const pageIds = new Set<string>();
    for (const page of this.state.pages) {
      if (pageIds.has(page.id)) problems.push(`duplicate page id "${page.id}"`);
      pageIds.add(page.id);
      for (const problem of checkPageInvariants(page)) problems.push(`${page.id}: ${problem}`);
    }
    return problems;
  }

  // ── Observation ───────────────────────────────────────────────────────

  subscribe(observer: ChangeObserver): () => void {
    return this.bus.subscribe(observer);
  }

  unsubscribe(observer: ChangeObserver): boolean {
    return this.bus.unsubscribe(observer);
  }

  get dispatching(): boolean {
    return this.bus.dispatching;
  }

  /** Run `fn`, collecting its change events instead of publishing them */
  deferEvents<T>(fn: () => T): { result: T; events: Change[] } {
    this.guard();
    const outer = this.deferred;
    const events: Change[] = [];
    this.deferred = events;
    try {
      return { result: fn(), events };
    } finally {
      this.deferred = outer;
    }
  }

  publish(events: readonly Change[], origin: ChangeOrigin): void {
    for (const event of events) this.bus.publish({ ...event, origin });
  }

  /** Replace the whole state silently; used to restore history snapshots */
  restore(diagram: Diagram): void {
    this.guard();
    this.state = diagram;
  }

  /** Replace the whole state and announce it */
  load(diagram: Diagram): void {
    this.guard();
    this.state = diagram;
    this.bus.publish({ kind: 'diagram-replaced', pageId: null, ids: diagram.pages.map((p) => p.id), origin: 'load' });
  }

  /**
   * Dry run: apply `fn`, report the failure it raised (null when it would
   * succeed) and put the state back. No events are published.
   */
  preview(fn: () => void): DiagramError | null {
    this.guard();
    const saved = this.state;
    this.previewing++;
    try {
      fn();
      return null;
    } catch (err) {
      if (isDiagramError(err)) return err;
      throw err;
    } finally {
      this.previewing--;
      this.state = saved;
    }
  }

  // ── Elements ──────────────────────────────────────────────────────────

  createElement(pageId: string, input: ShapeInput = {}): DiagramElement {
    const page = this.mutable(pageId);
    const kind = input.kind ?? 'shape';
    const placement = this.placement(page, input.parentId ?? null, input.layerId);
    const fallback = kind === 'group' ? GROUP_STYLE : SHAPE_STYLES.roundedRectangle;
    const styled = this.styleFor(input.preset, input.style, fallback);
    const style = kind === 'group' ? withStyleFlag(styled, 'group') : styled;
    const geometry = createGeometry({
      x: input.x ?? DEFAULT_GEOMETRY.x,
      y: input.y ?? DEFAULT_GEOMETRY.y,
      width: input.width ?? DEFAULT_GEOMETRY.width,
      height: input.height ?? DEFAULT_GEOMETRY.height,
    });
    const base = {
      id: input.id ?? generateId(),
      label: input.label ?? '',
      geometry,
      style,
      ...placement,
      visible: true,
      locked: isStyleFlagSet(style, 'locked'),
      wrapper: null,
      extras: EMPTY_OPAQUE,
    };
    const element: ShapeElement | GroupElement =
      kind === 'group'
        ? { ...base, kind: 'group', childIds: [], collapsed: false }
        : { ...base, kind: 'shape', shapeType: shapeTypeOf(style) };
    this.commitPage(ops.insertElement(page, element, input.index), 'element-added', [element.id]);
    return element;
  }

  connect(pageId: string, input: ConnectInput): ConnectorElement {
    const page = this.mutable(pageId);
    const placement = this.placement(page, input.parentId ?? null, input.layerId);
    const style = this.styleFor(input.preset, input.style, '', buildConnectionStyle(input.exitPoint, input.entryPoint));
    const connector: ConnectorElement = {
      kind: 'connector',
      id: input.id ?? generateId(),
      label: input.label ?? '',
      geometry: {
        ...createGeometry(),
        relative: true,
        points: input.waypoints ?? [],
        sourcePoint: input.sourcePoint ?? null,
        targetPoint: input.targetPoint ?? null,
      },
      style,
      ...placement,
      visible: true,
      locked: isStyleFlagSet(style, 'locked'),
      wrapper: null,
      extras: EMPTY_OPAQUE,
      sourceId: input.sourceId,
      targetId: input.targetId,
      routing: routingOf(style),
    };
    this.commitPage(ops.insertElement(page, connector, input.index), 'element-added', [connector.id]);
    return connector;
  }

  reconnect(pageId: string, connectorId: string, side: EndpointSide, ref: string): void {
    const page = this.mutable(pageId);
    this.commitPage(ops.reconnectEndpoint(page, connectorId, side, ref), 'connector-changed', [connectorId, ref]);
  }

  disconnect(pageId: string, connectorId: string, side: EndpointSide): void {
    const page = this.mutable(pageId);
    this.commitPage(ops.disconnectEndpoint(page, connectorId, side), 'connector-changed', [connectorId]);
  }

  setWaypoints(pageId: string, connectorId: string, points: readonly Point[]): void {
    const page = this.mutable(pageId);
    this.commitPage(ops.setWaypoints(page, connectorId, points), 'connector-changed', [connectorId]);
  }

  moveElement(pageId: string, id: string, position: Point): void {
    const page = this.mutable(pageId);
    this.commitPage(ops.moveElement(page, id, position), 'element-moved', [id]);
  }

  resizeElement(pageId: string, id: string, width: number, height: number): void {
    const page = this.mutable(pageId);
    this.commitPage(ops.resizeElement(page, id, width, height), 'element-resized', [id]);
  }

  /** Replace the style text, or patch individual keys (`null` removes one) */
  restyleElement(pageId: string, id: string, style: string | StylePatch): void {
    const page = this.mutable(pageId);
    const element = ops.requireElement(page, id);
    const next = typeof style === 'string' ? parseStyle(style) : setStyleValues(element.style, style);
    this.commitPage(ops.restyleElement(page, id, next), 'element-restyled', [id]);
  }

  relabelElement(pageId: string, id: string, label: string): void {
    const page = this.mutable(pageId);
    this.commitPage(ops.relabelElement(page, id, label), 'element-relabeled', [id]);
  }

  setVisibility(pageId: string, id: string, visible: boolean): void {
    const page = this.mutable(pageId);
    this.commitPage(ops.setElementVisibility(page, id, visible), 'element-visibility', [id]);
  }

  setLocked(pageId: string, id: string, locked: boolean): void {
    this.restyleElement(pageId, id, { locked: locked ? 1 : null });
  }

  setCollapsed(pageId: string, groupId: string, collapsed: boolean): void {
    const page = this.mutable(pageId);
    this.commitPage(ops.setGroupCollapsed(page, groupId, collapsed), 'group-changed', [groupId]);
  }

  group(pageId: string, ids: readonly string[], input: GroupInput = {}): GroupElement {
    const page = this.mutable(pageId);
    const style = withStyleFlag(parseStyle(input.style ?? GROUP_STYLE), 'group');
    const draft: GroupElement = {
      kind: 'group',
      id: input.id ?? generateId(),
      label: input.label ?? '',
      geometry: createGeometry(),
      style,
      parentId: null,
      layerId: '',
      visible: true,
      locked: isStyleFlagSet(style, 'locked'),
      wrapper: null,
      extras: EMPTY_OPAQUE,
      childIds: [],
      collapsed: false,
    };
    const next = ops.groupElements(page, ids, draft);
    this.commitPage(next, 'group-changed', [draft.id, ...ids]);
    return ops.requireGroup(next, draft.id);
  }

  /** Dissolve a group; returns the ids of its former members */
  ungroup(pageId: string, groupId: string): string[] {
    const page = this.mutable(pageId);
    const { page: next, childIds } = ops.ungroupElement(page, groupId);
    this.commitPage(next, 'group-changed', [groupId, ...childIds]);
    return childIds;
  }

  addToGroup(pageId: string, groupId: string, ids: readonly string[]): void {
    const page = this.mutable(pageId);
    this.commitPage(ops.addToGroup(page, groupId, ids), 'group-changed', [groupId, ...ids]);
  }

  removeFromGroup(pageId: string, ids: readonly string[]): void {
    const page = this.mutable(pageId);
    this.commitPage(ops.removeFromGroup(page, ids), 'group-changed', [...ids]);
  }

  deleteElement(pageId: string, id: string, policy: DeletePolicy = this.deletePolicy): RemovalSummary {
    const page = this.mutable(pageId);
    const { page: next, removed, detached } = ops.removeElement(page, id, policy);
    this.commitPage(next, 'element-removed', [...removed, ...detached]);
    return { removed, detached };
  }

  reorderElement(pageId: string, id: string, index: number): void {
    const page = this.mutable(pageId);
    this.commitPage(ops.reorderElement(page, id, index), 'z-order-changed', [id]);
  }

  // ── Pages ─────────────────────────────────────────────────────────────

  addPage(input: PageInput = {}): Page {
    this.guard();
    const page = ops.createPage(input.id ?? generateId(), input.name ?? `Page-${this.state.pages.length + 1}`);
    this.commit(ops.insertPage(this.state, page, input.index), { kind: 'page-added', pageId: page.id, ids: [page.id] });
    return page;
  }

  removePage(pageId: string): void {
    this.guard();
    this.commit(ops.removePage(this.state, pageId), { kind: 'page-removed', pageId, ids: [pageId] });
  }

  renamePage(pageId: string, name: string): void {
    const page = this.mutable(pageId);
    this.commitPage({ ...page, name }, 'page-changed', [pageId]);
  }

  movePage(pageId: string, index: number): void {
    this.guard();
    this.commit(ops.movePage(this.state, pageId, index), { kind: 'page-moved', pageId, ids: [pageId] });
  }

  updatePageSettings(pageId: string, settings: Partial<PageSettings>): void {
    const page = this.mutable(pageId);
    this.commitPage(ops.updatePageSettings(page, settings), 'page-changed', [pageId]);
  }

  setMetadata(metadata: { name?: string; version?: string | null }): void {
    this.guard();
    const next: Diagram = {
      ...this.state,
      name: metadata.name ?? this.state.name,
      version: metadata.version === undefined ? this.state.version : metadata.version,
    };
    this.commit(next, { kind: 'diagram-changed', pageId: null, ids: [next.id] });
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private guard(): void {
    if (this.bus.dispatching) throw new ReentrantMutationError();
  }

  private mutable(pageId: string): Page {
    this.guard();
    return this.getPage(pageId);
  }

  private commitPage(page: Page, kind: ChangeKind, ids: string[]): void {
    this.commit(ops.replacePage(this.state, page), { kind, pageId: page.id, ids });
  }

  private commit(next: Diagram, change: Change): void {
    this.state = next;
    if (this.previewing > 0) return;
    if (this.deferred) {
      this.deferred.push(change);
      return;
    }
    this.logger.debug(`${change.kind} ${change.ids.join(', ')}`);
    this.bus.publish({ ...change, origin: 'direct' });
  }

  private placement(page: Page, parentId: string | null, layerId: string | undefined): { parentId: string | null; layerId: string } {
    const parent = parentId === null ? undefined : findElement(page, parentId);
    const resolved = layerId ?? parent?.layerId ?? page.layers[0]?.id;
    if (resolved === undefined) {
      throw new InvariantViolationError('scope', `Page "${page.id}" has no layer to place elements in`);
    }
    return { parentId, layerId: resolved };
  }

  private styleFor(preset: string | undefined, inline: string | undefined, fallback: string, extra = ''): Style {
    let base = '';
    if (preset !== undefined) {
      const named = this.registry.get(preset);
      if (!named) {
        const available = this.registry.names().join(', ');
        throw new InvariantViolationError('invalid-value', `Unknown preset "${preset}". Available presets: ${available}`);
      }
      base = named.text;
    } else if (inline === undefined) {
      base = fallback;
    }
    return parseStyle(joinStyleText(base, extra, inline ?? ''));
  }
}
