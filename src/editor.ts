import { decodeDiagram, encodeDiagram, type UnresolvedReference } from './codec.js';
import * as commands from './commands.js';
import type { Command } from './commands.js';
import { resolveConfig, type EditorConfig, type EditorConfigInput } from './config.js';
import {
  createDiagram,
  DiagramDocument,
  type ConnectInput,
  type GroupInput,
  type PageInput,
  type RemovalSummary,
  type ShapeInput,
} from './document.js';
import { isDiagramError, type DiagramError } from './errors.js';
import type { ChangeObserver } from './events.js';
import type { Point } from './geometry.js';
import { CommandManager } from './history.js';
import { createLogger, type Logger } from './log.js';
import {
  generateId,
  type ConnectorElement,
  type DeletePolicy,
  type Diagram,
  type DiagramElement,
  type EndpointSide,
  type GroupElement,
  type Page,
  type PageSettings,
} from './model.js';
import type { StylePatch, StyleRegistry } from './style.js';

/** Outcome of an edit: the operation's value, or the reason it was refused */
export type EditResult<T> =
  | { success: true; changeId: string; value: T }
  | { success: false; error: DiagramError };

export type EditorOptions = EditorConfigInput & {
  logger?: Logger;
  registry?: StyleRegistry;
};

/**
 * Entry point for hosts. Every edit runs as a command through the history,
 * so it can be undone, and reports a typed result instead of throwing.
 */
export class DiagramEditor {
  readonly document: DiagramDocument;
  readonly history: CommandManager;
  readonly config: EditorConfig;
  /** Dangling endpoints found when the diagram was opened */
  readonly unresolved: readonly UnresolvedReference[];
  private readonly compressed: boolean;

  private constructor(
    diagram: Diagram,
    config: EditorConfig,
    options: EditorOptions,
    loaded: { compressed: boolean; unresolved: readonly UnresolvedReference[] },
  ) {
    this.config = config;
    const logger = options.logger ?? createLogger(config.logLevel);
    this.document = new DiagramDocument(diagram, {
      registry: options.registry,
      deletePolicy: config.deletePolicy,
      logger,
    });
    this.history = new CommandManager(this.document, { maxHistory: config.maxHistory, logger });
    this.compressed = loaded.compressed;
    this.unresolved = loaded.unresolved;
  }

  static create(options: EditorOptions & { name?: string; pageName?: string } = {}): DiagramEditor {
    const config = resolveConfig(options);
    const diagram = createDiagram(options.name, options.pageName);
    return new DiagramEditor(diagram, config, options, { compressed: config.compress, unresolved: [] });
  }

  /** Decode a file's bytes; throws `FormatError` when they cannot be read */
  static open(bytes: Uint8Array | string, options: EditorOptions & { defaultName?: string } = {}): DiagramEditor {
    const config = resolveConfig(options);
    const logger = options.logger ?? createLogger(config.logLevel);
    const { diagram, compressed, unresolved } = decodeDiagram(bytes, {
      danglingReferences: config.danglingReferences,
      defaultName: options.defaultName,
      logger,
    });
    return new DiagramEditor(diagram, config, { ...options, logger }, { compressed, unresolved });
  }

  get diagram(): Diagram {
    return this.document.diagram;
  }

  get pages(): readonly Page[] {
    return this.document.diagram.pages;
  }

  /** Encode the diagram; by default in the envelope it was loaded with */
  toXml(options: { compressed?: boolean } = {}): string {
    return encodeDiagram(this.document.diagram, { compressed: options.compressed ?? this.compressed });
  }

  save(options: { compressed?: boolean } = {}): Uint8Array {
    return new TextEncoder().encode(this.toXml(options));
  }

  // ── Edits ─────────────────────────────────────────────────────────────

  execute<T>(command: Command<T>): EditResult<T> {
    try {
      const value = this.history.execute(command);
      return { success: true, changeId: generateId(), value };
    } catch (err) {
      if (isDiagramError(err)) return { success: false, error: err };
      throw err;
    }
  }

  batch(label: string, steps: readonly Command[]): EditResult<unknown[]> {
    return this.execute(commands.batch(label, steps));
  }

  createElement(pageId: string, input: ShapeInput = {}): EditResult<DiagramElement> {
    return this.execute(commands.createElement(pageId, input));
  }

  moveElement(pageId: string, id: string, position: Point): EditResult<void> {
    return this.execute(commands.moveElement(pageId, id, position));
  }

  resizeElement(pageId: string, id: string, width: number, height: number): EditResult<void> {
    return this.execute(commands.resizeElement(pageId, id, width, height));
  }

  restyleElement(pageId: string, id: string, style: string | StylePatch): EditResult<void> {
    return this.execute(commands.restyleElement(pageId, id, style));
  }

  relabelElement(pageId: string, id: string, label: string): EditResult<void> {
    return this.execute(commands.relabelElement(pageId, id, label));
  }

  setVisibility(pageId: string, id: string, visible: boolean): EditResult<void> {
    return this.execute(commands.setVisibility(pageId, id, visible));
  }

  setLocked(pageId: string, id: string, locked: boolean): EditResult<void> {
    return this.execute(commands.setLocked(pageId, id, locked));
  }

  setCollapsed(pageId: string, groupId: string, collapsed: boolean): EditResult<void> {
    return this.execute(commands.setCollapsed(pageId, groupId, collapsed));
  }

  connect(pageId: string, input: ConnectInput): EditResult<ConnectorElement> {
    return this.execute(commands.connect(pageId, input));
  }

  disconnect(pageId: string, connectorId: string, side: EndpointSide): EditResult<void> {
    return this.execute(commands.disconnect(pageId, connectorId, side));
  }

  reconnect(pageId: string, connectorId: string, side: EndpointSide, ref: string): EditResult<void> {
    return this.execute(commands.reconnect(pageId, connectorId, side, ref));
  }

  setWaypoints(pageId: string, connectorId: string, points: readonly Point[]): EditResult<void> {
    return this.execute(commands.setWaypoints(pageId, connectorId, points));
  }

  group(pageId: string, ids: readonly string[], input: GroupInput = {}): EditResult<GroupElement> {
    return this.execute(commands.group(pageId, ids, input));
  }

  ungroup(pageId: string, groupId: string): EditResult<string[]> {
    return this.execute(commands.ungroup(pageId, groupId));
  }

  addToGroup(pageId: string, groupId: string, ids: readonly string[]): EditResult<void> {
    return this.execute(commands.addToGroup(pageId, groupId, ids));
  }

  removeFromGroup(pageId: string, ids: readonly string[]): EditResult<void> {
    return this.execute(commands.removeFromGroup(pageId, ids));
  }

  deleteElement(pageId: string, id: string, policy?: DeletePolicy): EditResult<RemovalSummary> {
    return this.execute(commands.deleteElement(pageId, id, policy));
  }

  reorderElement(pageId: string, id: string, index: number): EditResult<void> {
    return this.execute(commands.reorderElement(pageId, id, index));
  }

  addPage(input: PageInput = {}): EditResult<Page> {
    return this.execute(commands.addPage(input));
  }

  removePage(pageId: string): EditResult<void> {
    return this.execute(commands.removePage(pageId));
  }

  renamePage(pageId: string, name: string): EditResult<void> {
    return this.execute(commands.renamePage(pageId, name));
  }

  movePage(pageId: string, index: number): EditResult<void> {
    return this.execute(commands.movePage(pageId, index));
  }

  updatePageSettings(pageId: string, settings: Partial<PageSettings>): EditResult<void> {
    return this.execute(commands.updatePageSettings(pageId, settings));
  }

  setMetadata(metadata: { name?: string; version?: string | null }): EditResult<void> {
    return this.execute(commands.setMetadata(metadata));
  }

  // ── History ───────────────────────────────────────────────────────────

  /** Undo the last edit; the value is the label of the undone command */
  undo(): EditResult<string> {
    return this.historyStep(() => this.history.undo());
  }

  redo(): EditResult<string> {
    return this.historyStep(() => this.history.redo());
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  canExecute(command: Command): boolean {
    return this.history.canExecute(command);
  }

  // ── Observation ───────────────────────────────────────────────────────

  subscribe(observer: ChangeObserver): () => void {
    return this.document.subscribe(observer);
  }

  unsubscribe(observer: ChangeObserver): boolean {
    return this.document.unsubscribe(observer);
  }

  private historyStep(step: () => string): EditResult<string> {
    try {
      return { success: true, changeId: generateId(), value: step() };
    } catch (err) {
      if (isDiagramError(err)) return { success: false, error: err };
      throw err;
    }
  }
}
