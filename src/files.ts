import type { Dirent } from 'node:fs';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import { DiagramEditor, type EditorOptions } from './editor.js';
import { silentLogger, type Logger } from './log.js';

const DIAGRAM_EXTENSIONS = ['.drawio', '.dio'];

function baseName(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/** Open a draw.io file; a file without a diagram name takes the file's name */
export async function openDiagramFile(filePath: string, options: EditorOptions = {}): Promise<DiagramEditor> {
  const resolved = path.resolve(filePath);
  const bytes = await fsp.readFile(resolved);
  return DiagramEditor.open(bytes, { ...options, defaultName: baseName(resolved) });
}

/** Write the editor's diagram; returns the resolved path */
export async function saveDiagramFile(
  filePath: string,
  editor: DiagramEditor,
  options: { compressed?: boolean } = {}
): Promise<string> {
  const resolved = path.resolve(filePath);
  await fsp.mkdir(path.dirname(resolved), { recursive: true });
  await fsp.writeFile(resolved, editor.save(options));
  return resolved;
}

/** Create a new draw.io diagram file with one empty page */
export async function createDiagramFile(
  filePath: string,
  pageName: string = 'Page-1',
  options: EditorOptions = {}
): Promise<DiagramEditor> {
  const editor = DiagramEditor.create({ ...options, name: baseName(filePath), pageName });
  await saveDiagramFile(filePath, editor);
  return editor;
}

/** List all .drawio files in a directory recursively */
export async function listDiagramFiles(dir: string, logger: Logger = silentLogger): Promise<string[]> {
  const resolvedDir = path.resolve(dir);
  const files: string[] = [];

  async function walk(currentDir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fsp.readdir(currentDir, { withFileTypes: true });
    } catch (err) {
      // Unreadable directories are skipped
      logger.debug(`Skipping ${currentDir}: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }
    for (const entry of entries) {
      const fullPath = path.join(currentDir, entry.name);
      if (entry.isDirectory() && !entry.name.startsWith('.') && entry.name !== 'node_modules') {
        await walk(fullPath);
      } else if (entry.isFile() && DIAGRAM_EXTENSIONS.includes(path.extname(entry.name))) {
        files.push(fullPath);
      }
    }
  }

  await walk(resolvedDir);
  return files.sort();
}
