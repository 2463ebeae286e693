import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { createDiagramFile, listDiagramFiles, openDiagramFile, saveDiagramFile } from '../files.js';
import { silentLogger } from '../log.js';
import { findElement } from '../model.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mxdoc-test-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('diagram files', () => {
  it('should create a file named after itself', async () => {
    const filePath = path.join(tmpDir, 'test.drawio');
    const created = await createDiagramFile(filePath, 'Main', { logger: silentLogger });
    expect(created.diagram.name).toBe('test');

    const opened = await openDiagramFile(filePath, { logger: silentLogger });
    expect(opened.diagram).toEqual(created.diagram);
    expect(opened.pages[0].name).toBe('Main');
  });

  it('should persist edits', async () => {
    const filePath = path.join(tmpDir, 'edit.drawio');
    const editor = await createDiagramFile(filePath, undefined, { logger: silentLogger });
    editor.createElement(editor.pages[0].id, { id: 'A', label: 'Saved' });
    const written = await saveDiagramFile(path.join(tmpDir, 'nested', 'copy.drawio'), editor);
    expect(written).toBe(path.join(tmpDir, 'nested', 'copy.drawio'));

    const reopened = await openDiagramFile(written, { logger: silentLogger });
    expect(findElement(reopened.pages[0], 'A')?.label).toBe('Saved');
  });

  it('should name an unnamed diagram after its file', async () => {
    const filePath = path.join(tmpDir, 'bare.drawio');
    await fs.writeFile(filePath, '<mxGraphModel><root><mxCell id="0"/><mxCell id="1" parent="0"/></root></mxGraphModel>');
    const editor = await openDiagramFile(filePath, { logger: silentLogger });
    expect(editor.diagram.name).toBe('bare');
  });

  it('should keep compression when asked', async () => {
    const filePath = path.join(tmpDir, 'packed.drawio');
    const editor = await createDiagramFile(filePath, undefined, { logger: silentLogger });
    await saveDiagramFile(filePath, editor, { compressed: true });
    const content = await fs.readFile(filePath, 'utf-8');
    expect(content).not.toContain('<mxGraphModel');
  });
});

describe('listDiagramFiles', () => {
  it('should find draw.io files recursively', async () => {
    await fs.mkdir(path.join(tmpDir, 'sub'));
    await fs.mkdir(path.join(tmpDir, 'node_modules'));
    await fs.mkdir(path.join(tmpDir, '.hidden'));
    await fs.writeFile(path.join(tmpDir, 'a.drawio'), '');
    await fs.writeFile(path.join(tmpDir, 'sub', 'b.dio'), '');
    await fs.writeFile(path.join(tmpDir, 'node_modules', 'c.drawio'), '');
    await fs.writeFile(path.join(tmpDir, '.hidden', 'd.drawio'), '');
    await fs.writeFile(path.join(tmpDir, 'e.txt'), '');

    expect(await listDiagramFiles(tmpDir)).toEqual([path.join(tmpDir, 'a.drawio'), path.join(tmpDir, 'sub', 'b.dio')]);
  });

  it('should return nothing for a missing directory', async () => {
    expect(await listDiagramFiles(path.join(tmpDir, 'missing'))).toEqual([]);
  });
});
