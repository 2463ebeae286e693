import * as path from 'node:path';
import type { EditorConfig } from './config.js';
import type { EditResult, DiagramEditor } from './editor.js';
import { createDiagramFile, listDiagramFiles, openDiagramFile, saveDiagramFile } from './files.js';
import type { Logger } from './log.js';
import { isConnector, positionOf, type Page } from './model.js';
import type { Point } from './geometry.js';
import type { StylePatch } from './style.js';
import * as commands from './commands.js';
import type { Command } from './commands.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

interface FileArgs {
  filePath: string;
}

interface PageArgs extends FileArgs {
  /** 0-based, default 0 */
  pageIndex?: number;
}

export interface AddNodeArgs extends PageArgs {
  label: string;
  shape?: string;
  style?: string;
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  parentId?: string;
  id?: string;
}

export interface AddEdgeArgs extends PageArgs {
  sourceId: string;
  targetId: string;
  label?: string;
  edgeStyle?: string;
  style?: string;
  exitPoint?: string;
  entryPoint?: string;
  waypoints?: Point[];
  id?: string;
}

export interface UpdateElementArgs extends PageArgs {
  id: string;
  label?: string;
  style?: string;
  styleValues?: StylePatch;
  x?: number;
  y?: number;
  width?: number;
  height?: number;
}

export interface RemoveElementArgs extends PageArgs {
  id: string;
  cascade?: boolean;
}

export interface GroupArgs extends PageArgs {
  ids: string[];
  label?: string;
  id?: string;
}

function text(message: string): ToolResult {
  return { content: [{ type: 'text', text: message }] };
}

function errorResult(err: unknown): ToolResult {
  const message = err instanceof Error ? err.message : String(err);
  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}

function unwrap<T>(result: EditResult<T>): T {
  if (!result.success) throw result.error;
  return result.value;
}

/**
 * Tool handlers over open diagram files. Each file is opened once and kept
 * as an editor session so undo/redo spans tool calls; every successful edit
 * is written back to disk immediately.
 */
export class DiagramTools {
  private readonly sessions = new Map<string, DiagramEditor>();

  constructor(
    private readonly config: EditorConfig,
    private readonly logger: Logger,
  ) {}

  async createDiagram({ filePath, pageName }: FileArgs & { pageName?: string }): Promise<ToolResult> {
    return this.run(async () => {
      const resolved = path.resolve(filePath);
      const editor = await createDiagramFile(resolved, pageName, { ...this.config, logger: this.logger });
      this.sessions.set(resolved, editor);
      return `Created diagram: ${resolved}`;
    });
  }

  async readDiagram({ filePath }: FileArgs): Promise<ToolResult> {
    return this.run(async () => formatDiagramSummary(path.resolve(filePath), await this.session(filePath)));
  }

  async listDiagrams({ dir }: { dir: string }): Promise<ToolResult> {
    return this.run(async () => {
      const files = await listDiagramFiles(dir, this.logger);
      return files.length === 0 ? `No diagram files found in ${path.resolve(dir)}` : files.join('\n');
    });
  }

  async addNode(args: AddNodeArgs): Promise<ToolResult> {
    return this.edit(args, (editor, page) => {
      const element = unwrap(
        editor.createElement(page.id, {
          id: args.id,
          label: args.label,
          preset: args.shape,
          style: args.style,
          x: args.x,
          y: args.y,
          width: args.width,
          height: args.height,
          parentId: args.parentId,
        }),
      );
      return `Added node "${args.label}" with ID: ${element.id}`;
    });
  }

  async addEdge(args: AddEdgeArgs): Promise<ToolResult> {
    return this.edit(args, (editor, page) => {
      const connector = unwrap(
        editor.connect(page.id, {
          id: args.id,
          sourceId: args.sourceId,
          targetId: args.targetId,
          label: args.label,
          preset: args.edgeStyle,
          style: args.style,
          exitPoint: args.exitPoint,
          entryPoint: args.entryPoint,
          waypoints: args.waypoints,
        }),
      );
      return `Added edge from ${args.sourceId} → ${args.targetId} with ID: ${connector.id}`;
    });
  }

  /** All requested changes land as one undoable step */
  async updateElement(args: UpdateElementArgs): Promise<ToolResult> {
    return this.edit(args, (editor, page) => {
      const current = editor.document.getElement(page.id, args.id);
      const steps: Command[] = [];
      if (args.label !== undefined) steps.push(commands.relabelElement(page.id, args.id, args.label));
      if (args.style !== undefined) steps.push(commands.restyleElement(page.id, args.id, args.style));
      if (args.styleValues !== undefined) steps.push(commands.restyleElement(page.id, args.id, args.styleValues));
      if (args.x !== undefined || args.y !== undefined) {
        const from = positionOf(current) ?? { x: 0, y: 0 };
        const position = { x: args.x ?? from.x, y: args.y ?? from.y };
        steps.push(commands.moveElement(page.id, args.id, position));
      }
      if (args.width !== undefined || args.height !== undefined) {
        const width = args.width ?? current.geometry.width;
        const height = args.height ?? current.geometry.height;
        steps.push(commands.resizeElement(page.id, args.id, width, height));
      }
      if (steps.length === 0) throw new Error('Nothing to update: pass a label, style or geometry');
      unwrap(editor.batch('Update element', steps));
      return `Updated element ${args.id}`;
    });
  }

  async removeElement(args: RemoveElementArgs): Promise<ToolResult> {
    return this.edit(args, (editor, page) => {
      const { removed, detached } = unwrap(editor.deleteElement(page.id, args.id, args.cascade ? 'cascade' : 'detach'));
      let message = `Removed ${removed.join(', ')}`;
      if (detached.length > 0) message += `\nDetached connectors: ${detached.join(', ')}`;
      return message;
    });
  }

  async groupElements(args: GroupArgs): Promise<ToolResult> {
    return this.edit(args, (editor, page) => {
      const group = unwrap(editor.group(page.id, args.ids, { id: args.id, label: args.label }));
      return `Grouped ${args.ids.join(', ')} into ${group.id}`;
    });
  }

  async ungroupElements(args: PageArgs & { groupId: string }): Promise<ToolResult> {
    return this.edit(args, (editor, page) => {
      const members = unwrap(editor.ungroup(page.id, args.groupId));
      return `Ungrouped ${args.groupId}; members: ${members.join(', ') || '(none)'}`;
    });
  }

  async addPage(args: FileArgs & { name: string }): Promise<ToolResult> {
    return this.edit({ filePath: args.filePath }, (editor) => {
      const page = unwrap(editor.addPage({ name: args.name }));
      return `Added page "${page.name}" with ID: ${page.id}`;
    });
  }

  async undo({ filePath }: FileArgs): Promise<ToolResult> {
    return this.edit({ filePath }, (editor) => `Undid: ${unwrap(editor.undo())}`);
  }

  async redo({ filePath }: FileArgs): Promise<ToolResult> {
    return this.edit({ filePath }, (editor) => `Redid: ${unwrap(editor.redo())}`);
  }

  async getHistory({ filePath }: FileArgs): Promise<ToolResult> {
    return this.run(async () => {
      const editor = await this.session(filePath);
      const history = editor.history;
      return [
        `History: ${history.position}/${history.size} steps applied`,
        `Undo: ${history.undoLabel() ?? '(nothing)'}`,
        `Redo: ${history.redoLabel() ?? '(nothing)'}`,
      ].join('\n');
    });
  }

  private async session(filePath: string): Promise<DiagramEditor> {
    const resolved = path.resolve(filePath);
    const existing = this.sessions.get(resolved);
    if (existing) return existing;
    const editor = await openDiagramFile(resolved, { ...this.config, logger: this.logger });
    this.sessions.set(resolved, editor);
    return editor;
  }

  private async edit(args: PageArgs, action: (editor: DiagramEditor, page: Page) => string): Promise<ToolResult> {
    return this.run(async () => {
      const editor = await this.session(args.filePath);
      const pageIndex = args.pageIndex ?? 0;
      const page = editor.pages[pageIndex];
      if (!page) throw new Error(`Page index ${pageIndex} out of range (${editor.pages.length} pages)`);
      const message = action(editor, page);
      await saveDiagramFile(args.filePath, editor);
      return message;
    });
  }

  private async run(action: () => Promise<string>): Promise<ToolResult> {
    try {
      return text(await action());
    } catch (err) {
      this.logger.debug(`tool failed: ${err instanceof Error ? err.message : String(err)}`);
      return errorResult(err);
    }
  }
}

export function formatDiagramSummary(filePath: string, editor: DiagramEditor): string {
  const pages = editor.pages;
  const count = (kind: string) => pages.reduce((n, p) => n + p.elements.filter((e) => e.kind === kind).length, 0);
  const lines: string[] = [
    `Diagram: ${filePath}`,
    `Pages: ${pages.length} | Shapes: ${count('shape')} | Connectors: ${count('connector')} | Groups: ${count('group')}`,
    '',
  ];

  for (const page of pages) {
    lines.push(`Page: "${page.name}" (ID: ${page.id})`);
    const nodes = page.elements.filter((e) => e.kind !== 'connector');
    if (nodes.length > 0) {
      lines.push('  Nodes:');
      for (const v of nodes) {
        const g = v.geometry;
        const parent = v.parentId ? ` in ${v.parentId}` : '';
        lines.push(`    • ${v.id}: "${v.label}" ${v.kind === 'shape' ? v.shapeType : 'group'} @ (${g.x}, ${g.y}) [${g.width}×${g.height}]${parent}`);
      }
    }
    const edges = page.elements.filter(isConnector);
    if (edges.length > 0) {
      lines.push('  Edges:');
      for (const e of edges) {
        const label = e.label ? ` "${e.label}"` : '';
        lines.push(`    → ${e.id}: ${e.sourceId ?? '(floating)'} → ${e.targetId ?? '(floating)'}${label}`);
      }
    }
    const dangling = editor.document.danglingEndpoints(page.id);
    if (dangling.length > 0) {
      lines.push('  Dangling references:');
      for (const d of dangling) lines.push(`    ! ${d.connectorId} ${d.side} → ${d.ref}`);
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}
