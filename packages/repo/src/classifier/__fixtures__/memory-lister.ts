import { DirectoryOpenError } from '@gitree/shared';
import type { DirectoryEntry, DirectoryLister, EntryKind } from '../types';

export type MemoryNode = MemoryTree | 'file' | 'symlink' | 'unknown';
export interface MemoryTree {
  [name: string]: MemoryNode;
}

function kindOf(node: MemoryNode): EntryKind {
  if (typeof node !== 'string') return 'directory';
  if (node === 'symlink') return 'other';
  return node;
}

/**
 * In-memory stand-in for the filesystem. Records every listed path.
 */
export class MemoryLister implements DirectoryLister {
  readonly calls: string[] = [];

  constructor(
    private readonly root: string,
    private readonly tree: MemoryTree,
  ) {}

  async list(dirPath: string): Promise<DirectoryEntry[]> {
    this.calls.push(dirPath);
    const node = this.lookup(dirPath);
    if (node === undefined || typeof node === 'string') {
      throw new DirectoryOpenError(dirPath);
    }
    return Object.entries(node).map(([name, child]) => ({ name, kind: kindOf(child) }));
  }

  private lookup(dirPath: string): MemoryNode | undefined {
    if (dirPath === this.root) return this.tree;
    if (!dirPath.startsWith(`${this.root}/`)) return undefined;

    let node: MemoryNode | undefined = this.tree;
    for (const segment of dirPath.slice(this.root.length + 1).split('/')) {
      if (node === undefined || typeof node === 'string') return undefined;
      node = node[segment];
    }
    return node;
  }
}
