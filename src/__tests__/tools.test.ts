import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { DiagramTools, type ToolResult } from '../tools.js';
import { resolveConfig } from '../config.js';
import { silentLogger } from '../log.js';

let tmpDir: string;
let filePath: string;
let tools: DiagramTools;

function textOf(result: ToolResult): string {
  return result.content.map((c) => c.text).join('\n');
}

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mxdoc-tools-'));
  filePath = path.join(tmpDir, 'test.drawio');
  tools = new DiagramTools(resolveConfig(), silentLogger);
  await tools.createDiagram({ filePath });
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

async function addPair(): Promise<void> {
  await tools.addNode({ filePath, label: 'Alpha', id: 'A' });
  await tools.addNode({ filePath, label: 'Beta', id: 'B', x: 200 });
  await tools.addEdge({ filePath, sourceId: 'A', targetId: 'B', label: 'uses', id: 'E' });
}

describe('DiagramTools', () => {
  it('should report created files and nodes', async () => {
    const created = await tools.createDiagram({ filePath: path.join(tmpDir, 'other.drawio') });
    expect(textOf(created)).toBe(`Created diagram: ${path.join(tmpDir, 'other.drawio')}`);
    expect(textOf(await tools.addNode({ filePath, label: 'Alpha', id: 'A' }))).toBe('Added node "Alpha" with ID: A');
    expect(textOf(await tools.addNode({ filePath, label: 'Beta', id: 'B' }))).toBe('Added node "Beta" with ID: B');
    expect(textOf(await tools.addEdge({ filePath, sourceId: 'A', targetId: 'B', id: 'E' }))).toBe(
      'Added edge from A → B with ID: E',
    );
  });

  it('should summarise a diagram', async () => {
    await addPair();
    const lines = textOf(await tools.readDiagram({ filePath })).split('\n');
    expect(lines[0]).toBe(`Diagram: ${filePath}`);
    expect(lines[1]).toBe('Pages: 1 | Shapes: 2 | Connectors: 1 | Groups: 0');
    expect(lines.slice(4)).toEqual([
      '  Nodes:',
      '    • A: "Alpha" rectangle @ (0, 0) [120×60]',
      '    • B: "Beta" rectangle @ (200, 0) [120×60]',
      '  Edges:',
      '    → E: A → B "uses"',
    ]);
  });

  it('should write every edit to disk', async () => {
    await addPair();
    const fresh = new DiagramTools(resolveConfig(), silentLogger);
    expect(textOf(await fresh.readDiagram({ filePath }))).toContain('    → E: A → B "uses"');
  });

  it('should detach connectors when removing a node', async () => {
    await addPair();
    expect(textOf(await tools.removeElement({ filePath, id: 'A' }))).toBe('Removed A\nDetached connectors: E');
    expect(textOf(await tools.undo({ filePath }))).toBe('Undid: Delete');
    expect(textOf(await tools.getHistory({ filePath }))).toBe('History: 3/4 steps applied\nUndo: Add connector\nRedo: Delete');
    expect(textOf(await tools.redo({ filePath }))).toBe('Redid: Delete');
  });

  it('should remove attached connectors on cascade', async () => {
    await addPair();
    expect(textOf(await tools.removeElement({ filePath, id: 'A', cascade: true }))).toBe('Removed A, E');
  });

  it('should apply updates as a single step', async () => {
    await addPair();
    const result = await tools.updateElement({ filePath, id: 'A', label: 'Renamed', x: 10, width: 90 });
    expect(textOf(result)).toBe('Updated element A');
    expect(textOf(await tools.readDiagram({ filePath }))).toContain('    • A: "Renamed" rectangle @ (10, 0) [90×60]');
    expect(textOf(await tools.undo({ filePath }))).toBe('Undid: Update element');
  });

  it('should group and ungroup', async () => {
    await addPair();
    expect(textOf(await tools.groupElements({ filePath, ids: ['A', 'B'], id: 'G' }))).toBe('Grouped A, B into G');
    expect(textOf(await tools.ungroupElements({ filePath, groupId: 'G' }))).toBe('Ungrouped G; members: A, B');
  });

  it('should add pages and address them by index', async () => {
    expect(textOf(await tools.addPage({ filePath, name: 'Second' }))).toMatch(/^Added page "Second" with ID: /);
    expect(textOf(await tools.addNode({ filePath, label: 'X', id: 'X', pageIndex: 1 }))).toBe('Added node "X" with ID: X');
    const missing = await tools.addNode({ filePath, label: 'Y', pageIndex: 3 });
    expect(missing.isError).toBe(true);
    expect(textOf(missing)).toBe('Error: Page index 3 out of range (2 pages)');
  });

  it('should turn failures into error results', async () => {
    const duplicate = await tools.addNode({ filePath, label: 'A', id: '1' });
    expect(duplicate.isError).toBe(true);
    expect(textOf(duplicate)).toMatch(/^Error: Duplicate ID "1"/);

    await tools.addNode({ filePath, label: 'A', id: 'A' });
    const empty = await tools.updateElement({ filePath, id: 'A' });
    expect(textOf(empty)).toBe('Error: Nothing to update: pass a label, style or geometry');

    const fresh = new DiagramTools(resolveConfig(), silentLogger);
    expect(textOf(await fresh.undo({ filePath }))).toBe('Error: Nothing to undo');

    const absent = await tools.readDiagram({ filePath: path.join(tmpDir, 'absent.drawio') });
    expect(absent.isError).toBe(true);
  });

  it('should list diagrams in a directory', async () => {
    expect(textOf(await tools.listDiagrams({ dir: tmpDir }))).toBe(filePath);
    const empty = path.join(tmpDir, 'empty');
    await fs.mkdir(empty);
    expect(textOf(await tools.listDiagrams({ dir: empty }))).toBe(`No diagram files found in ${empty}`);
  });
});
