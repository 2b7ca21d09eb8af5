import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import JSZip from 'jszip';
import type { ArchiveTree } from '../services/archive-tree.js';

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'javadoc-lookup-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write a ZIP file containing the given entries (path => content).
 */
export async function writeArchive(dir: string, fileName: string, entries: Record<string, string>): Promise<string> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.file(name, content);
  }
  const buffer = await zip.generateAsync({ type: 'nodebuffer' });
  const file = path.join(dir, fileName);
  await fs.writeFile(file, buffer);
  return file;
}

export function classXml(modifiers: string, body = ''): string {
  return `<?xml version="1.0" encoding="UTF-8"?>\n<class modifiers="${modifiers}">${body}</class>`;
}

/**
 * In-memory archive tree for tests that don't need a real ZIP file.
 */
export class MemoryTree implements ArchiveTree {
  private entries: Map<string, string>;

  constructor(entries: Record<string, string>) {
    this.entries = new Map(Object.entries(entries));
  }

  list(): string[] {
    return [...this.entries.keys()];
  }

  exists(entryPath: string): boolean {
    return this.entries.has(entryPath);
  }

  async read(entryPath: string): Promise<string | undefined> {
    return this.entries.get(entryPath);
  }
}
